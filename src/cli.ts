#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command, Option } from "commander";
import { cliEntrypoint } from "./cli-util.js";
import { resolveConfig, type MirrorConfig } from "./config.js";
import { CLI_NAME, DEFAULT_INTERVAL_SECONDS } from "./constants.js";
import { ConfigError, SourceRootMissingError } from "./errors.js";
import { defaultHashAlg, listSupportedHashes } from "./hash.js";
import { collectIgnoreOption } from "./ignore.js";
import { createFileLogger } from "./log-file.js";
import { LOG_LEVELS } from "./logger.js";
import { runScheduler } from "./scheduler.js";
import { fmtDuration } from "./util.js";

export type CliOptions = {
  interval?: string;
  logFile?: string;
  logLevel?: string;
  hash: string;
  ignore: string[];
  once: boolean;
  dryRun: boolean;
};

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw) {
      return String(raw.version);
    }
  } catch {
    // not fatal: --version just reports 0.0.0
  }
  return "0.0.0";
}

export function buildProgram(): Command {
  return new Command()
    .name(CLI_NAME)
    .description(
      "Periodically mirror a source folder into a replica folder (one-way)",
    )
    .version(readVersion())
    .argument("[source]", "source folder (default ./Folders/SourceFolder)")
    .argument("[replica]", "replica folder (default ./Folders/ReplicaFolder)")
    .argument(
      "[interval]",
      `seconds between cycles (default ${DEFAULT_INTERVAL_SECONDS})`,
    )
    .argument("[logFile]", "log file (default ./LogFile/log.txt)")
    .option("--interval <seconds>", "seconds between cycles")
    .option("--log-file <path>", "append log lines to this file")
    .addOption(
      new Option("--log-level <level>", "log verbosity").choices(LOG_LEVELS),
    )
    .addOption(
      new Option("--hash <algorithm>", "content digest algorithm")
        .choices(listSupportedHashes())
        .default(defaultHashAlg()),
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectIgnoreOption,
      [],
    )
    .option("--once", "run a single cycle and exit", false)
    .option("--dry-run", "report actions without modifying the replica", false);
}

export function configFromCli(
  opts: CliOptions,
  args: readonly string[],
  cwd: string = process.cwd(),
): MirrorConfig {
  const [source, replica, interval, logFile] = args;
  return resolveConfig(
    {
      source,
      replica,
      interval: opts.interval ?? interval,
      logFile: opts.logFile ?? logFile,
      logLevel: opts.logLevel,
      hash: opts.hash,
      ignore: opts.ignore,
      once: opts.once,
      dryRun: opts.dryRun,
    },
    cwd,
  );
}

export async function runMirror(
  opts: CliOptions,
  program: Command,
): Promise<number> {
  let config: MirrorConfig;
  try {
    config = configFromCli(opts, program.args);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  console.log(`Source Folder: ${config.sourceRoot}`);
  console.log(`Replica Folder: ${config.replicaRoot}`);
  console.log(`Log File: ${config.logFile}`);
  console.log(`Sync Interval: ${fmtDuration(config.intervalMs)}`);

  const handle = createFileLogger(config.logFile, {
    minLevel: config.logLevel,
    echoLevel: config.logLevel,
  });
  const { logger } = handle;

  const stat = fs.statSync(config.sourceRoot, { throwIfNoEntry: false });
  if (!stat?.isDirectory()) {
    const err = new SourceRootMissingError(config.sourceRoot);
    logger.error(`Error: ${err.message}`);
    handle.close();
    return 1;
  }

  const controller = new AbortController();
  const onSig = () => {
    logger.info("Stop requested; finishing current cycle.");
    controller.abort();
  };
  process.once("SIGINT", onSig);
  process.once("SIGTERM", onSig);

  try {
    const result = await runScheduler(config, {
      logger,
      signal: controller.signal,
    });
    return config.once && result.errors > 0 ? 1 : 0;
  } finally {
    process.off("SIGINT", onSig);
    process.off("SIGTERM", onSig);
    handle.close();
  }
}

cliEntrypoint<CliOptions>(require.main === module, buildProgram, runMirror, {
  label: CLI_NAME,
});
