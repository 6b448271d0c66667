/**
 * Adapters between web streams, Node.js streams and the byte source/sink
 * interfaces the pipeline works with
 */

import type { Readable, Writable } from "node:stream";
import { StreamError } from "../errors";
import { logDebug } from "../logging";
import type { ByteSink, ByteSource } from "../types";

/**
 * Iterate the chunks of a web ReadableStream
 *
 * Stopping early (a `break`, or an error downstream) cancels the stream.
 *
 * @param wrapError - turns a read failure into the error callers should see
 */
export async function* readChunks(
  stream: ReadableStream<Uint8Array>,
  wrapError: (error: unknown) => Error
): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  let open = true;

  try {
    while (true) {
      const result = await reader.read().catch((error: unknown) => {
        open = false;
        throw wrapError(error);
      });
      if (result.done) {
        open = false;
        break;
      }
      yield result.value;
    }
  } finally {
    if (open) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Read a Node.js stream (standard input) as a {@link ByteSource}
 */
export async function* fromReadable(readable: Readable): AsyncGenerator<Uint8Array> {
  let bytesProcessed = 0;
  const iterator = readable[Symbol.asyncIterator]();

  while (true) {
    const result: IteratorResult<unknown> = await iterator.next().catch((error: unknown) => {
      throw new StreamError("cannot read standard input", "read", bytesProcessed, {
        cause: error,
      });
    });
    if (result.done === true) break;

    const chunk = toBytes(result.value);
    bytesProcessed += chunk.length;
    yield chunk;
  }
}

/**
 * {@link ByteSink} over a Node.js writable (standard output)
 *
 * Each write resolves once the stream has taken the chunk. Stream errors
 * only surface as rejected writes, never as unhandled `error` events.
 */
export class WritableSink implements ByteSink {
  private bytesProcessed = 0;
  private failure: Error | undefined;

  constructor(
    private readonly stream: Writable,
    private readonly name: string = "standard output"
  ) {
    this.stream.on("error", (error) => {
      if (this.failure === undefined) {
        this.failure = error;
      }
      logDebug("output stream failed", { stream: this.name, error: error.message });
    });
  }

  write(chunk: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.failure !== undefined) {
        reject(this.writeError(this.failure));
        return;
      }
      this.stream.write(chunk, (error) => {
        if (error) {
          reject(this.writeError(error));
          return;
        }
        this.bytesProcessed += chunk.length;
        resolve();
      });
    });
  }

  private writeError(cause: Error): StreamError {
    return new StreamError(`cannot write to ${this.name}`, "write", this.bytesProcessed, {
      cause,
    });
  }
}

/**
 * Collects everything written to it. Useful when the output is small.
 */
export class MemorySink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];

  async write(chunk: Uint8Array): Promise<void> {
    this.chunks.push(chunk.slice());
  }

  /** All bytes written so far, concatenated */
  bytes(): Uint8Array {
    const total = this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  /** Output decoded as UTF-8 */
  text(): string {
    return new TextDecoder().decode(this.bytes());
  }
}

/**
 * Wrap in-memory bytes as a {@link ByteSource}, optionally split into chunks
 */
export async function* fromBytes(
  input: Uint8Array | string,
  chunkSize: number = Number.POSITIVE_INFINITY
): AsyncGenerator<Uint8Array> {
  const bytes = typeof input === "string" ? new TextEncoder().encode(input) : input;
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    yield bytes.subarray(offset, Math.min(bytes.length, offset + chunkSize));
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  return new TextEncoder().encode(String(chunk));
}
