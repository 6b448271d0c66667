import { Readable, Writable } from "stream";
import type { CliIO } from "../../src/cli";

export interface CapturedIO {
  io: CliIO;
  stdout: () => string;
  stderr: () => string;
}

function capture(): { stream: Writable; text: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(Buffer.from(chunk));
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString("utf8") };
}

/**
 * In-memory process streams for driving `run`
 */
export function fakeIO(
  stdin: string,
  options: { cwd: string; env?: NodeJS.ProcessEnv; homeDir?: string; stdout?: Writable }
): CapturedIO {
  const stdout = capture();
  const stderr = capture();
  return {
    io: {
      stdin: Readable.from([Buffer.from(stdin)]),
      stdout: options.stdout ?? stdout.stream,
      stderr: stderr.stream,
      env: options.env ?? {},
      cwd: options.cwd,
      homeDir: options.homeDir,
    },
    stdout: stdout.text,
    stderr: stderr.text,
  };
}

/**
 * A stdout whose reader has gone away: every write fails
 */
export function closedPipe(): Writable {
  return new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback(new Error("write EPIPE"));
    },
  });
}
