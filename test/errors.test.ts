import { describe, expect, test } from "vitest";
import {
  ConfigError,
  exitCodeFor,
  FileError,
  formatErrorChain,
  RowscrubError,
  StreamError,
  TooManyBadRowsError,
} from "../src/errors";

describe("Error hierarchy", () => {
  test("subclasses carry their code and name", () => {
    const config = new ConfigError("bad flag");
    expect(config).toBeInstanceOf(RowscrubError);
    expect(config.code).toBe("CONFIG_ERROR");
    expect(config.name).toBe("ConfigError");

    const stream = new StreamError("cannot write to standard output", "write", 42);
    expect(stream.code).toBe("STREAM_ERROR");
    expect(stream.bytesProcessed).toBe(42);
  });

  test("toString includes the context", () => {
    expect(new ConfigError("bad pattern", "(?x)").toString()).toBe(
      "ConfigError: bad pattern\nContext: (?x)"
    );
  });

  test("FileError.fromSystemError adds a hint for known failures", () => {
    const cause = new Error("ENOENT: no such file or directory, open '/data/in.csv'");
    const error = FileError.fromSystemError("open", "/data/in.csv", cause);

    expect(error.message).toBe(
      "cannot open /data/in.csv (check that the file path is correct and the file exists)"
    );
    expect(error.cause).toBe(cause);
    expect(error.operation).toBe("open");
  });

  test("FileError.fromSystemError leaves unknown failures without a hint", () => {
    const error = FileError.fromSystemError("write", "/out.csv", new Error("EIO"));
    expect(error.message).toBe("cannot write /out.csv");
  });
});

describe("exitCodeFor", () => {
  test("maps the quality gate to 2 and everything else to 1", () => {
    expect(exitCodeFor(new TooManyBadRowsError(5, 10))).toBe(2);
    expect(exitCodeFor(new ConfigError("x"))).toBe(1);
    expect(exitCodeFor(new Error("x"))).toBe(1);
    expect(exitCodeFor("x")).toBe(1);
  });
});

describe("formatErrorChain", () => {
  test("prints the quality-gate verdict on its own", () => {
    expect(formatErrorChain(new TooManyBadRowsError(1, 2))).toEqual([
      "Too many rows (1 of 2) were bad",
    ]);
  });

  test("walks the cause chain outermost first", () => {
    const root = new Error("permission denied");
    const middle = new Error("cannot open out.csv", { cause: root });
    const outer = new StreamError("cannot write to standard output", "write", 0, {
      cause: middle,
    });

    expect(formatErrorChain(outer)).toEqual([
      "ERROR: cannot write to standard output",
      "  caused by: cannot open out.csv",
      "  caused by: permission denied",
    ]);
  });

  test("stops at a cycle", () => {
    const first = new Error("first");
    const second = new Error("second", { cause: first });
    first.cause = second;

    expect(formatErrorChain(first)).toEqual(["ERROR: first", "  caused by: second"]);
  });

  test("renders thrown non-errors", () => {
    expect(formatErrorChain("boom")).toEqual(["ERROR: boom"]);
  });
});
