// src/config.ts
import path from "node:path";
import { ConfigError } from "./errors.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { normalizeIgnorePatterns } from "./ignore.js";
import { parseLogLevel, type LogLevel } from "./logger.js";
import { isWithin } from "./path-rel.js";
import { DEFAULT_INTERVAL_SECONDS, LOG_LEVEL_ENV } from "./constants.js";

export type MirrorConfig = Readonly<{
  sourceRoot: string;
  replicaRoot: string;
  intervalMs: number;
  logFile: string;
  logLevel: LogLevel;
  hash: HashAlg;
  ignore: readonly string[];
  dryRun: boolean;
  once: boolean;
}>;

export type ConfigInput = {
  source?: string;
  replica?: string;
  interval?: string | number;
  logFile?: string;
  logLevel?: string;
  hash?: string;
  ignore?: string[];
  dryRun?: boolean;
  once?: boolean;
};

export function defaultPaths(cwd: string) {
  return {
    source: path.join(cwd, "Folders", "SourceFolder"),
    replica: path.join(cwd, "Folders", "ReplicaFolder"),
    logFile: path.join(cwd, "LogFile", "log.txt"),
  };
}

export function parseIntervalSeconds(raw: string | number): number {
  const n =
    typeof raw === "number"
      ? raw
      : /^\d+$/.test(raw.trim())
        ? Number(raw.trim())
        : Number.NaN;
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(
      `invalid interval '${raw}': expected a positive whole number of seconds`,
    );
  }
  return n;
}

/**
 * Build the immutable configuration for a run. Relative paths resolve
 * against cwd; missing values fall back to the defaults under cwd.
 */
export function resolveConfig(
  input: ConfigInput,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): MirrorConfig {
  const defaults = defaultPaths(cwd);
  const sourceRoot = path.resolve(cwd, input.source ?? defaults.source);
  const replicaRoot = path.resolve(cwd, input.replica ?? defaults.replica);
  if (isWithin(replicaRoot, sourceRoot) || isWithin(sourceRoot, replicaRoot)) {
    throw new ConfigError(
      `source '${sourceRoot}' and replica '${replicaRoot}' must not overlap`,
    );
  }

  let hash: HashAlg;
  try {
    hash = normalizeHashAlg(input.hash);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }

  return Object.freeze({
    sourceRoot,
    replicaRoot,
    intervalMs:
      parseIntervalSeconds(input.interval ?? DEFAULT_INTERVAL_SECONDS) * 1000,
    logFile: path.resolve(cwd, input.logFile ?? defaults.logFile),
    logLevel: parseLogLevel(input.logLevel ?? env[LOG_LEVEL_ENV]),
    hash,
    ignore: Object.freeze(normalizeIgnorePatterns(input.ignore ?? [])),
    dryRun: input.dryRun ?? false,
    once: input.once ?? false,
  });
}
