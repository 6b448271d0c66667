/**
 * Error handling for table scrubbing
 *
 * Row-level problems (wrong field count, empty required values) are never
 * errors: they are counted and diverted. The classes here cover what aborts
 * a run, plus the quality-gate verdict, which gets its own exit code.
 */

/**
 * Base error class for all rowscrub errors
 */
export class RowscrubError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "RowscrubError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid command-line flags, character specifiers, patterns or config files
 */
export class ConfigError extends RowscrubError {
  constructor(message: string, context?: string, options?: ErrorOptions) {
    super(message, "CONFIG_ERROR", context, options);
    this.name = "ConfigError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends RowscrubError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(
      message,
      "FILE_ERROR",
      context,
      systemError === undefined ? undefined : { cause: systemError }
    );
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.suggestionFor(errorMessage);

    return new FileError(
      `cannot ${operation} ${filePath}${suggestion !== undefined ? ` (${suggestion})` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Hint for a system error message or code such as `EISDIR`
   */
  static suggestionFor(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Failure while reading standard input or writing standard output
 */
export class StreamError extends RowscrubError {
  constructor(
    message: string,
    public readonly operation: "read" | "write",
    public readonly bytesProcessed?: number,
    options?: ErrorOptions
  ) {
    super(message, "STREAM_ERROR", undefined, options);
    this.name = "StreamError";
  }
}

/**
 * Quality-gate verdict: more than 10% of the rows were rejected.
 *
 * Everything already written stays valid. Callers that can live with a noisy
 * input can tell this apart from a real failure by its exit code.
 */
export class TooManyBadRowsError extends RowscrubError {
  constructor(
    public readonly badRows: number,
    public readonly totalRows: number
  ) {
    super(`Too many rows (${badRows} of ${totalRows}) were bad`, "TOO_MANY_BAD_ROWS");
    this.name = "TooManyBadRowsError";
  }
}

/**
 * Process exit code for an error that ended a run
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof TooManyBadRowsError ? 2 : 1;
}

/**
 * Render an error and its `cause` chain, outermost first
 */
export function formatErrorChain(error: unknown): string[] {
  if (error instanceof TooManyBadRowsError) {
    return [error.message];
  }

  const lines = [`ERROR: ${describe(error)}`];
  const seen = new Set<unknown>([error]);
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined && !seen.has(cause)) {
    seen.add(cause);
    lines.push(`  caused by: ${describe(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return lines;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
