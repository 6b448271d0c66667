/**
 * Command-line parsing and conversion of merged settings into run options
 */

import { parseArgs } from "node:util";
import { ConfigError } from "../errors";
import { DEFAULT_DELIMITER, DEFAULT_QUOTE } from "../formats/dsv/constants";
import type { DSVReaderOptions } from "../formats/dsv/types";
import { parseCharSpecifier } from "../formats/dsv/utils";
import { compileNullPattern } from "../operations/cell-cleaner";
import type { ScrubOptions } from "../operations/types";
import type { RowscrubConfig } from "./config";

export const VERSION = "0.1.0";

export const HELP = `rowscrub - clean up delimited text tables

Usage: rowscrub [options] [input]

Reads input (a file, or standard input when omitted or "-") and writes a
normalized CSV table to standard output. Rows with the wrong number of
fields are counted as bad; the run fails with exit code 2 when more than
10% of rows are bad.

Options:
  -d, --delimiter <CHAR>       Field delimiter (default ",", accepts "\\t", "tab")
      --quote <CHAR>           Quote character, or "none" (default '"')
  -n, --null <REGEX>           Blank values matching REGEX in full
      --replace-newlines       Replace CR, LF and CRLF inside values with a space
      --trim-whitespace        Strip ASCII whitespace around every value
      --clean-column-names     Lowercase, sanitize and de-duplicate header names
      --drop-row-if-null <COL> Reject rows whose COL is empty (repeatable)
      --bad-rows-path <PATH>   Save rejected rows to PATH
  -q, --quiet                  Do not print the summary line
  -h, --help                   Show this help message
  -V, --version                Show version number

Config files:
  .rowscrubrc, .rowscrubrc.json or rowscrub.config.json in the current
  directory or a parent, then ~/.rowscrubrc

Environment:
  ROWSCRUB_DELIMITER, ROWSCRUB_QUOTE, ROWSCRUB_NULL, ROWSCRUB_QUIET
  ROWSCRUB_LOG    Log level: debug, info, warning, error, none
`;

export type Command =
  | { kind: "help" }
  | { kind: "version" }
  | {
      kind: "run";
      /** Input path; undefined or "-" reads standard input */
      input: string | undefined;
      badRowsPath: string | undefined;
      config: RowscrubConfig;
    };

/**
 * Everything a run needs, resolved and validated
 */
export interface RunSettings {
  reader: DSVReaderOptions;
  scrub: ScrubOptions;
  quiet: boolean;
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws {ConfigError} for unknown flags, missing values or extra arguments
 */
export function parseCommandLine(argv: readonly string[]): Command {
  const { values, positionals } = readArgs(argv);

  if (values.help === true) return { kind: "help" };
  if (values.version === true) return { kind: "version" };

  if (positionals.length > 1) {
    throw new ConfigError(
      `expected at most one input, got ${positionals.length}`,
      "try 'rowscrub --help'"
    );
  }

  const config: RowscrubConfig = {};
  if (values.delimiter !== undefined) config.delimiter = values.delimiter;
  if (values.quote !== undefined) config.quote = values.quote;
  if (values.null !== undefined) config.null = values.null;
  if (values["replace-newlines"] === true) config.replaceNewlines = true;
  if (values["trim-whitespace"] === true) config.trimWhitespace = true;
  if (values["clean-column-names"] === true) config.cleanColumnNames = true;
  if (values["drop-row-if-null"] !== undefined) config.dropRowIfNull = values["drop-row-if-null"];
  if (values.quiet === true) config.quiet = true;

  return {
    kind: "run",
    input: positionals[0],
    badRowsPath: values["bad-rows-path"],
    config,
  };
}

/**
 * Turn merged settings into tokenizer and pipeline options.
 *
 * @throws {ConfigError} for bad character specifiers or null patterns
 */
export function resolveSettings(config: RowscrubConfig): RunSettings {
  const delimiter = parseCharSpecifier(config.delimiter ?? DEFAULT_DELIMITER);
  if (delimiter === null) {
    throw new ConfigError("the delimiter cannot be 'none'", config.delimiter);
  }
  const quote = parseCharSpecifier(config.quote ?? DEFAULT_QUOTE);

  const scrub: ScrubOptions = {
    replaceNewlines: config.replaceNewlines ?? false,
    trimWhitespace: config.trimWhitespace ?? false,
    cleanColumnNames: config.cleanColumnNames ?? false,
    dropRowIfNull: config.dropRowIfNull ?? [],
  };
  if (config.null !== undefined) {
    scrub.nullPattern = compileNullPattern(config.null);
  }

  return {
    reader: { delimiter, quote },
    scrub,
    quiet: config.quiet ?? false,
  };
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        delimiter: { type: "string", short: "d" },
        quote: { type: "string" },
        null: { type: "string", short: "n" },
        "replace-newlines": { type: "boolean" },
        "trim-whitespace": { type: "boolean" },
        "clean-column-names": { type: "boolean" },
        "drop-row-if-null": { type: "string", multiple: true },
        "bad-rows-path": { type: "string" },
        quiet: { type: "boolean", short: "q" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "V" },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid arguments: ${detail}`, "try 'rowscrub --help'", {
      cause: error,
    });
  }
}
