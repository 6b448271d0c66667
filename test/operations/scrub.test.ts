/**
 * Row pipeline tests: shape checks, cleaning paths, bad-row diversion
 */

import { describe, expect, test } from "vitest";
import { ByteRecord, DSVParser, type DSVReaderOptions, DSVWriter } from "../../src/formats/dsv";
import { fromBytes, MemorySink } from "../../src/io/stream-utils";
import { compileNullPattern } from "../../src/operations/cell-cleaner";
import { ScrubProcessor } from "../../src/operations/scrub";
import type { RecordSink, ScrubOptions } from "../../src/operations/types";

async function scrub(input: string, options: ScrubOptions = {}, reader: DSVReaderOptions = {}) {
  const output = new MemorySink();
  const badRows = new MemorySink();
  const processor = new ScrubProcessor(options);
  const result = await processor.process(
    new DSVParser(reader).parse(fromBytes(input)),
    new DSVWriter(output),
    new DSVWriter(badRows)
  );
  return { result, output: output.text(), badRows: badRows.text(), processor };
}

describe("ScrubProcessor", () => {
  describe("path selection", () => {
    test("takes the fast path with nothing to clean or check", () => {
      expect(new ScrubProcessor().path).toBe("fast");
      expect(new ScrubProcessor({ cleanColumnNames: true }).path).toBe("fast");
    });

    test("cleans when any cell step is enabled", () => {
      expect(new ScrubProcessor({ trimWhitespace: true }).path).toBe("clean");
      expect(new ScrubProcessor({ replaceNewlines: true }).path).toBe("clean");
      expect(new ScrubProcessor({ nullPattern: compileNullPattern("x") }).path).toBe("clean");
    });

    test("checks required columns when any are named", () => {
      expect(new ScrubProcessor({ dropRowIfNull: ["a"] }).path).toBe("clean-and-check");
    });
  });

  describe("fast path", () => {
    test("normalizes quoting and keeps stray-quote content", async () => {
      const { result, output, badRows } = await scrub(
        'a,b,c\n1,"2",3\n"Paris, France","Broken " quotes",\n'
      );

      expect(output).toBe('a,b,c\n1,2,3\n"Paris, France","Broken  quotes""",\n');
      expect(badRows).toBe("");
      expect(result).toEqual({
        rows: 3,
        badRows: 0,
        header: ["a", "b", "c"],
        path: "fast",
      });
    });

    test("rewrites another delimiter as commas", async () => {
      const { output } = await scrub("a|b|c\n1|2|3\n", {}, { delimiter: 0x7c });
      expect(output).toBe("a,b,c\n1,2,3\n");
    });

    test("matches the check path when no required column exists", async () => {
      const input = 'x,y\n" padded ","multi\nline"\n1,2,3\n,\n';
      const fast = await scrub(input);
      const slow = await scrub(input, { dropRowIfNull: ["missing"] });

      expect(slow.result.path).toBe("clean-and-check");
      expect(slow.output).toBe(fast.output);
      expect(slow.badRows).toBe(fast.badRows);
      expect(fast.output).toBe('x,y\n padded ,"multi\nline"\n,\n');
    });
  });

  describe("shape check", () => {
    test("diverts short and long rows verbatim", async () => {
      const { result, output, badRows } = await scrub("a,b,c\n1,2\n1,2,3\n1,2,3,4\n");

      expect(output).toBe("a,b,c\n1,2,3\n");
      expect(badRows).toBe("1,2\n1,2,3,4\n");
      expect(result.rows).toBe(4);
      expect(result.badRows).toBe(2);
    });

    test("counts without a bad-row sink", async () => {
      const output = new MemorySink();
      const processor = new ScrubProcessor();
      const result = await processor.process(
        new DSVParser().parse(fromBytes("a,b,c\n1,2\n")),
        new DSVWriter(output)
      );

      expect(output.text()).toBe("a,b,c\n");
      expect(result.badRows).toBe(1);
      expect(processor.counters).toEqual({ rows: 2, badRows: 1 });
    });

    test("starts counting afresh on each run", async () => {
      const processor = new ScrubProcessor();
      const input = "a,b\n1\n1,2\n";

      await processor.process(new DSVParser().parse(fromBytes(input)), new DSVWriter(new MemorySink()));
      const second = await processor.process(
        new DSVParser().parse(fromBytes(input)),
        new DSVWriter(new MemorySink())
      );

      expect(second.rows).toBe(3);
      expect(second.badRows).toBe(1);
      expect(processor.counters).toEqual({ rows: 3, badRows: 1 });
    });

    test("counts the header as a row", async () => {
      const good = "1,2\n".repeat(100);
      const { result } = await scrub(`a,b\n${good}oops\n`);

      expect(result.rows).toBe(102);
      expect(result.badRows).toBe(1);
    });
  });

  describe("cleaning", () => {
    test("blanks null-pattern matches", async () => {
      const { output } = await scrub("a,b,c,d,e\nnull,NIL,nil,,not null\n", {
        nullPattern: compileNullPattern("(?i)null|NIL"),
      });
      expect(output).toBe("a,b,c,d,e\n,,,,not null\n");
    });

    test("folds newlines inside values", async () => {
      const { output } = await scrub('a,b\n"x\r\ny",z\n', { replaceNewlines: true });
      expect(output).toBe("a,b\nx y,z\n");
    });

    test("trims values but not the header", async () => {
      const { output } = await scrub(" a , b \n 1 ,2\t\n", { trimWhitespace: true });
      expect(output).toBe(" a , b \n1,2\n");
    });
  });

  describe("required columns", () => {
    test("rejects rows with an empty required value", async () => {
      const { result, output, badRows } = await scrub("c1,c2,c3\n1,,\n,2,\nNULL,3,\na,b,c\n", {
        dropRowIfNull: ["c1", "c2"],
        nullPattern: compileNullPattern("NULL"),
      });

      expect(output).toBe("c1,c2,c3\na,b,c\n");
      expect(badRows).toBe("1,,\n,2,\nNULL,3,\n");
      expect(result.rows).toBe(5);
      expect(result.badRows).toBe(3);
      expect(result.path).toBe("clean-and-check");
    });

    test("diverts the original record, not the cleaned one", async () => {
      const { output, badRows } = await scrub("a,b\n x , \n", {
        trimWhitespace: true,
        dropRowIfNull: ["b"],
      });

      expect(output).toBe("a,b\n");
      expect(badRows).toBe(" x , \n");
    });

    test("writes cleaned values for rows that pass", async () => {
      const { output } = await scrub("a,b\n x , y \n", {
        trimWhitespace: true,
        dropRowIfNull: ["b"],
      });
      expect(output).toBe("a,b\nx,y\n");
    });

    test("matches against cleaned column names", async () => {
      const { result, output, badRows } = await scrub("First Name,Age\n,3\nbo,4\n", {
        cleanColumnNames: true,
        dropRowIfNull: ["first_name"],
      });

      expect(result.header).toEqual(["first_name", "age"]);
      expect(output).toBe("first_name,age\nbo,4\n");
      expect(badRows).toBe(",3\n");
    });
  });

  describe("header", () => {
    test("cleans and de-duplicates column names", async () => {
      const { result, output } = await scrub(",,a,a\n1,2,3,4\n", { cleanColumnNames: true });

      expect(result.header).toEqual(["_", "__2", "a", "a_2"]);
      expect(output).toBe("_,__2,a,a_2\n1,2,3,4\n");
    });

    test("writes a header-only table unchanged", async () => {
      const { result, output } = await scrub("a,b\n");
      expect(output).toBe("a,b\n");
      expect(result.rows).toBe(1);
    });

    test("writes nothing for empty input", async () => {
      const { result, output, badRows } = await scrub("");

      expect(output).toBe("");
      expect(badRows).toBe("");
      expect(result).toEqual({ rows: 1, badRows: 0, header: [], path: "fast" });
    });
  });

  describe("sink failures", () => {
    test("closes the record source when a write fails", async () => {
      let closed = false;
      async function* records() {
        try {
          yield ByteRecord.from(["a", "b"]);
          yield ByteRecord.from(["1", "2"]);
        } finally {
          closed = true;
        }
      }
      const failing: RecordSink = {
        writeRecord: async () => {
          throw new Error("disk full");
        },
        flush: async () => undefined,
      };

      await expect(new ScrubProcessor().process(records(), failing)).rejects.toThrow("disk full");
      expect(closed).toBe(true);
    });
  });
});
