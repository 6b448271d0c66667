/**
 * rowscrub command-line front end
 *
 * `run` does all the work and returns the exit code, so it can be driven
 * with in-memory streams as well as the real process streams.
 */

import type { Readable, Writable } from "node:stream";
import { exitCodeFor, formatErrorChain } from "../errors";
import { DSVParser } from "../formats/dsv/parser";
import { DSVWriter } from "../formats/dsv/writer";
import { openFileSource } from "../io/file-reader";
import { openForWriting } from "../io/file-writer";
import { fromReadable, WritableSink } from "../io/stream-utils";
import { logDebug, logInfo, logWarning, parseLogLevel, setLogLevel } from "../logging";
import { enforceQualityGate } from "../operations/quality-gate";
import { ScrubProcessor } from "../operations/scrub";
import type { ScrubResult } from "../operations/types";
import type { ByteSource } from "../types";
import { configFromEnv, loadConfig, mergeConfig } from "./config";
import { HELP, parseCommandLine, type RunSettings, resolveSettings, VERSION } from "./options";
import { formatSummary } from "./summary";

/**
 * Process streams and environment a run works against
 */
export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  /** Where the config file search starts */
  cwd: string;
  /** Checked for ~/.rowscrubrc when set */
  homeDir?: string;
}

/**
 * Run the CLI and return the process exit code: 0 on success, 1 for
 * errors, 2 when the quality gate fails.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  setLogLevel(parseLogLevel(io.env.ROWSCRUB_LOG));

  try {
    const command = parseCommandLine(argv);
    if (command.kind === "help") {
      io.stdout.write(HELP);
      return 0;
    }
    if (command.kind === "version") {
      io.stdout.write(`rowscrub ${VERSION}\n`);
      return 0;
    }

    const loaded = await loadConfig({ startDir: io.cwd, homeDir: io.homeDir });
    const merged = mergeConfig(command.config, configFromEnv(io.env), loaded.config);
    const settings = resolveSettings(merged);
    logDebug("resolved settings", { configFile: loaded.path, settings: merged });

    const startTime = performance.now();
    const parser = new DSVParser(settings.reader);
    const result = await scrubInput(command.input, command.badRowsPath, parser, settings, io);
    const seconds = (performance.now() - startTime) / 1000;

    if (!settings.quiet) {
      printSummary(io.stderr, formatSummary(result, seconds, parser.bytesRead));
    }

    enforceQualityGate(result);
    return 0;
  } catch (error) {
    for (const line of formatErrorChain(error)) {
      io.stderr.write(`${line}\n`);
    }
    return exitCodeFor(error);
  }
}

async function scrubInput(
  input: string | undefined,
  badRowsPath: string | undefined,
  parser: DSVParser,
  settings: RunSettings,
  io: CliIO
): Promise<ScrubResult> {
  const source = await openSource(input, io);
  const output = new DSVWriter(new WritableSink(io.stdout));
  const processor = new ScrubProcessor(settings.scrub);

  if (badRowsPath === undefined) {
    return processor.process(parser.parse(source), output);
  }

  // Rejected rows keep the input's delimiter and quote.
  const result = await openForWriting(badRowsPath, (handle) =>
    processor.process(
      parser.parse(source),
      output,
      new DSVWriter(handle, {
        delimiter: settings.reader.delimiter,
        quote: settings.reader.quote,
      })
    )
  );
  logInfo("saved rejected rows", { path: badRowsPath, badRows: result.badRows });
  return result;
}

async function openSource(input: string | undefined, io: CliIO): Promise<ByteSource> {
  if (input === undefined || input === "-") {
    logDebug("reading standard input");
    return fromReadable(io.stdin);
  }
  logDebug("reading file", { path: input });
  return openFileSource(input);
}

function printSummary(stderr: Writable, summary: string): void {
  try {
    stderr.write(`${summary}\n`);
  } catch (error) {
    logWarning("cannot print summary", { error: String(error) });
  }
}
