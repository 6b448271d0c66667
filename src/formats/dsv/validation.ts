/**
 * @module formats/dsv/validation
 * @description ArkType schemas for DSV reader and writer options
 */

import { type } from "arktype";
import { BYTES } from "./constants";

/**
 * A single byte value
 */
export const ByteSchema = type("0<=number.integer<=255");

/**
 * ArkType validation schema for DSV reader options
 */
export const DSVReaderOptionsSchema = type({
  "delimiter?": ByteSchema,
  "quote?": ByteSchema.or("null"),
}).narrow((options, ctx) => {
  const delimiter = options.delimiter ?? BYTES.COMMA;
  const quote = options.quote === undefined ? BYTES.QUOTE : options.quote;

  if (delimiter === BYTES.LF || delimiter === BYTES.CR) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "a delimiter other than a line terminator",
    });
  }

  if (delimiter === quote) {
    return ctx.reject({
      path: ["quote", "delimiter"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }

  return true;
});

/**
 * ArkType validation schema for DSV writer options
 */
export const DSVWriterOptionsSchema = type({
  "bufferSize?": "number.integer>=1",
  "delimiter?": ByteSchema,
  "quote?": ByteSchema.or("null"),
}).narrow((options, ctx) => {
  const delimiter = options.delimiter ?? BYTES.COMMA;
  const quote = options.quote === undefined ? BYTES.QUOTE : options.quote;

  if (delimiter === quote) {
    return ctx.reject({
      path: ["quote", "delimiter"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }

  return true;
});
