/**
 * Diagnostic logging
 *
 * Logs go through Effect's Logger and are written to standard error, so
 * they never mix with table output on standard output. The level comes from
 * `ROWSCRUB_LOG` (debug, info, warning, error, none); default is warning.
 */

import { Effect, Logger, LogLevel } from "effect";

const LEVELS: ReadonlyMap<string, LogLevel.LogLevel> = new Map<string, LogLevel.LogLevel>([
  ["debug", LogLevel.Debug],
  ["info", LogLevel.Info],
  ["warning", LogLevel.Warning],
  ["warn", LogLevel.Warning],
  ["error", LogLevel.Error],
  ["none", LogLevel.None],
]);

type Annotations = Record<string, unknown>;

let minimumLevel: LogLevel.LogLevel = parseLogLevel(process.env.ROWSCRUB_LOG);

const stderrLogger = Logger.make(({ logLevel, message, annotations }) => {
  const text = Array.isArray(message) ? message.map(String).join(" ") : String(message);
  const fields: string[] = [];
  for (const [key, value] of annotations) {
    fields.push(`${key}=${formatValue(value)}`);
  }
  const suffix = fields.length > 0 ? ` ${fields.join(" ")}` : "";
  globalThis.console.error(`[${logLevel.label}] ${text}${suffix}`);
});

const loggerLayer = Logger.replace(Logger.defaultLogger, stderrLogger);

/**
 * Map a level name to an Effect log level (unknown names mean warning)
 */
export function parseLogLevel(name: string | undefined): LogLevel.LogLevel {
  if (name === undefined) {
    return LogLevel.Warning;
  }
  return LEVELS.get(name.trim().toLowerCase()) ?? LogLevel.Warning;
}

/**
 * Change the minimum level for subsequent log calls
 */
export function setLogLevel(level: LogLevel.LogLevel): void {
  minimumLevel = level;
}

export function logDebug(message: string, annotations: Annotations = {}): void {
  emit(Effect.logDebug(message), annotations);
}

export function logInfo(message: string, annotations: Annotations = {}): void {
  emit(Effect.logInfo(message), annotations);
}

export function logWarning(message: string, annotations: Annotations = {}): void {
  emit(Effect.logWarning(message), annotations);
}

function emit(program: Effect.Effect<void>, annotations: Annotations): void {
  Effect.runSync(
    program.pipe(
      Effect.annotateLogs(annotations),
      Logger.withMinimumLogLevel(minimumLevel),
      Effect.provide(loggerLayer)
    )
  );
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /[\s"=]/.test(value) || value === "" ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}
