/**
 * Config file loading and settings precedence
 *
 * Looks for .rowscrubrc, .rowscrubrc.json or rowscrub.config.json in the
 * working directory and its parents, then ~/.rowscrubrc. Settings merge as
 * command line > environment > config file > defaults.
 */

import { dirname, join, resolve } from "node:path";
import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { ConfigError } from "../errors";
import { runWithPlatform } from "../io/runtime";
import { logDebug } from "../logging";

const CONFIG_FILENAMES = [".rowscrubrc", ".rowscrubrc.json", "rowscrub.config.json"] as const;
const HOME_CONFIG_FILENAME = ".rowscrubrc";

/**
 * Settings that may come from a config file, the environment or flags
 */
export const RowscrubConfigSchema = type({
  "delimiter?": "string",
  "quote?": "string",
  "null?": "string",
  "replaceNewlines?": "boolean",
  "trimWhitespace?": "boolean",
  "cleanColumnNames?": "boolean",
  "dropRowIfNull?": "string[]",
  "quiet?": "boolean",
  "+": "reject",
});

export type RowscrubConfig = typeof RowscrubConfigSchema.infer;

export interface LoadedConfig {
  config: RowscrubConfig;
  /** File the config came from, or null when none was found */
  path: string | null;
}

export interface ConfigSearchOptions {
  /** Directory to start the upward search from */
  startDir: string;
  /** Home directory to check last; skipped when undefined */
  homeDir?: string;
}

/**
 * Find and load the nearest config file.
 *
 * @throws {ConfigError} when the file cannot be read, is not JSON, or has
 * unknown keys or wrongly typed values
 */
export async function loadConfig(options: ConfigSearchOptions): Promise<LoadedConfig> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* findConfigFile(fs, options);
    if (path === null) {
      return { config: {}, path: null };
    }

    const text = yield* fs
      .readFileString(path)
      .pipe(
        Effect.mapError(
          (cause) => new ConfigError(`cannot read config file ${path}`, undefined, { cause })
        )
      );
    const parsed = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (cause) => new ConfigError(`config file ${path} is not valid JSON`, undefined, { cause }),
    });

    const config = RowscrubConfigSchema(parsed);
    if (config instanceof type.errors) {
      return yield* Effect.fail(new ConfigError(`invalid config file ${path}: ${config.summary}`));
    }

    logDebug("loaded config file", { path });
    return { config, path };
  });

  return runWithPlatform(program);
}

/**
 * Settings from `ROWSCRUB_*` environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): RowscrubConfig {
  const config: RowscrubConfig = {};

  if (env.ROWSCRUB_DELIMITER !== undefined && env.ROWSCRUB_DELIMITER !== "") {
    config.delimiter = env.ROWSCRUB_DELIMITER;
  }
  if (env.ROWSCRUB_QUOTE !== undefined && env.ROWSCRUB_QUOTE !== "") {
    config.quote = env.ROWSCRUB_QUOTE;
  }
  if (env.ROWSCRUB_NULL !== undefined && env.ROWSCRUB_NULL !== "") {
    config.null = env.ROWSCRUB_NULL;
  }
  if (env.ROWSCRUB_QUIET === "1" || env.ROWSCRUB_QUIET === "true") {
    config.quiet = true;
  }

  return config;
}

/**
 * Merge configuration sources with proper precedence.
 * CLI args > environment variables > config file
 */
export function mergeConfig(
  cliArgs: RowscrubConfig,
  envConfig: RowscrubConfig,
  fileConfig: RowscrubConfig
): RowscrubConfig {
  return {
    ...fileConfig,
    ...envConfig,
    ...cliArgs,
  };
}

function findConfigFile(fs: FileSystem.FileSystem, options: ConfigSearchOptions) {
  return Effect.gen(function* () {
    let currentDir = resolve(options.startDir);

    while (true) {
      for (const filename of CONFIG_FILENAMES) {
        const candidate = join(currentDir, filename);
        if (yield* isFile(fs, candidate)) {
          return candidate;
        }
      }
      const parentDir = dirname(currentDir);
      if (parentDir === currentDir) break;
      currentDir = parentDir;
    }

    if (options.homeDir !== undefined) {
      const homeConfig = join(options.homeDir, HOME_CONFIG_FILENAME);
      if (yield* isFile(fs, homeConfig)) {
        return homeConfig;
      }
    }

    return null;
  });
}

function isFile(fs: FileSystem.FileSystem, path: string) {
  return fs.exists(path).pipe(
    Effect.flatMap((found) =>
      found ? Effect.map(fs.stat(path), (info) => info.type === "File") : Effect.succeed(false)
    ),
    Effect.mapError((cause) => new ConfigError(`cannot check config file ${path}`, undefined, { cause }))
  );
}
