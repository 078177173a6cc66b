// src/scheduler.ts
//
// Drives mirroring cycles: one cycle, then wait the interval, forever (or
// until the signal aborts). Cycles never overlap.

import type { MirrorConfig } from "./config.js";
import { describeError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { synchronize, type CycleReport } from "./mirror.js";
import { fmtDuration, wait as defaultWait } from "./util.js";

export type CycleRunner = (
  config: MirrorConfig,
  logger: Logger,
) => Promise<CycleReport>;

export interface SchedulerDeps {
  logger?: Logger;
  signal?: AbortSignal;
  maxCycles?: number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  runCycle?: CycleRunner;
}

export type SchedulerResult = {
  cycles: number;
  changedCycles: number;
  // cycles that threw rather than finishing with a report
  errors: number;
  failures: number;
};

export async function runCycle(
  config: MirrorConfig,
  logger: Logger,
): Promise<CycleReport> {
  const report = await synchronize({
    sourceRoot: config.sourceRoot,
    replicaRoot: config.replicaRoot,
    hash: config.hash,
    ignore: config.ignore,
    dryRun: config.dryRun,
    logger,
  });
  const meta = {
    actions: report.results.length - report.failures,
    failures: report.failures,
    took: fmtDuration(report.durationMs),
  };
  if (report.changed) {
    logger.info("Changes detected and synchronized.", meta);
  } else {
    logger.info("No changes detected.", meta);
  }
  return report;
}

export async function runScheduler(
  config: MirrorConfig,
  {
    logger = new NullLogger(),
    signal,
    maxCycles,
    wait = defaultWait,
    runCycle: cycle = runCycle,
  }: SchedulerDeps = {},
): Promise<SchedulerResult> {
  const log = logger.child("scheduler");
  const result: SchedulerResult = {
    cycles: 0,
    changedCycles: 0,
    errors: 0,
    failures: 0,
  };

  log.info("Starting folder synchronization.", {
    sourceRoot: config.sourceRoot,
    replicaRoot: config.replicaRoot,
    intervalMs: config.intervalMs,
    dryRun: config.dryRun,
  });

  while (!signal?.aborted) {
    try {
      const report = await cycle(config, logger);
      if (report.changed) result.changedCycles += 1;
      result.failures += report.failures;
    } catch (err) {
      // keep serving; the next cycle starts from scratch anyway
      result.errors += 1;
      const { message, code } = describeError(err);
      log.error(`An error occurred: ${message}`, code ? { code } : undefined);
    }
    result.cycles += 1;

    if (config.once) break;
    if (maxCycles != null && result.cycles >= maxCycles) break;
    if (signal?.aborted) break;
    log.debug(`next cycle in ${fmtDuration(config.intervalMs)}`);
    await wait(config.intervalMs, signal);
  }

  log.info("Stopped folder synchronization.", {
    cycles: result.cycles,
    errors: result.errors,
  });
  return result;
}
