// src/mirror.ts
//
// One mirroring cycle: make replicaRoot agree with sourceRoot.
//
//   1. ensure the replica root exists
//   2. propagate source -> replica (directories, then files)
//   3. delete replica files with no source file
//   4. delete replica directories with no source directory
//
// Nothing is cached between cycles; both trees are walked from scratch.

import fsp from "node:fs/promises";
import path from "node:path";
import { compareFiles } from "./compare.js";
import { defaultHashAlg, type HashAlg } from "./hash.js";
import { createIgnorer, type Ignorer } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { toAbs } from "./path-rel.js";
import { snapshotTree, sortParentFirst } from "./walk.js";
import {
  describeError,
  errorCode,
  ReplicaRootError,
  SourceRootMissingError,
} from "./errors.js";

export type EntryAction =
  | "create-root"
  | "create-dir"
  | "copy"
  | "update"
  | "replace"
  | "delete-file"
  | "delete-dir";

export type EntryResult =
  | { action: EntryAction; path: string; status: "done" }
  | {
      action: EntryAction;
      path: string;
      status: "skipped";
      reason: string;
      code?: string;
    };

export type CycleReport = {
  changed: boolean;
  results: EntryResult[];
  failures: number;
  dryRun: boolean;
  startedAt: number;
  durationMs: number;
};

export interface MirrorOptions {
  sourceRoot: string;
  replicaRoot: string;
  hash?: HashAlg;
  ignore?: readonly string[];
  dryRun?: boolean;
  logger?: Logger;
}

type EntryKind = "file" | "dir" | "other";

async function kindOf(
  abs: string,
  { follow = false }: { follow?: boolean } = {},
): Promise<EntryKind | null> {
  try {
    const st = follow ? await fsp.stat(abs) : await fsp.lstat(abs);
    return st.isFile() ? "file" : st.isDirectory() ? "dir" : "other";
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
}

const DONE_MESSAGES: Record<EntryAction, string> = {
  "create-root": "Created directory",
  "create-dir": "Created directory",
  copy: "Copied new file",
  update: "Updated file",
  replace: "Replaced",
  "delete-file": "Deleted file",
  "delete-dir": "Deleted directory",
};

function isAtOrUnder(rel: string, parents: readonly string[]): boolean {
  return parents.some((p) => rel === p || rel.startsWith(`${p}/`));
}

class Cycle {
  readonly results: EntryResult[] = [];
  // dry run only: replica paths reported as replaced but still on disk as-is
  readonly replaced: string[] = [];

  constructor(
    private readonly logger: Logger,
    readonly dryRun: boolean,
  ) {}

  done(action: EntryAction, rel: string, abs: string, detail?: string) {
    this.results.push({ action, path: rel, status: "done" });
    const prefix = this.dryRun ? "(dry run) " : "";
    const what = detail
      ? `${DONE_MESSAGES[action]} ${detail}`
      : DONE_MESSAGES[action];
    this.logger.info(`${prefix}${what}: ${abs}`);
  }

  /**
   * Kind of a replica entry, as it would be had the earlier actions of this
   * cycle been applied.
   */
  async replicaKind(rel: string, abs: string): Promise<EntryKind | null> {
    if (this.dryRun && isAtOrUnder(rel, this.replaced)) return null;
    return kindOf(abs);
  }

  replace(rel: string, abs: string, detail: string) {
    if (this.dryRun) this.replaced.push(rel);
    this.done("replace", rel, abs, detail);
  }

  /**
   * Run one entry operation. A thrown error is recorded as a skipped entry
   * and logged; it never propagates to the rest of the cycle.
   */
  async attempt(
    action: EntryAction,
    rel: string,
    abs: string,
    op: () => Promise<void>,
  ): Promise<void> {
    try {
      await op();
    } catch (err) {
      const { message, code } = describeError(err);
      this.results.push({
        action,
        path: rel,
        status: "skipped",
        reason: message,
        ...(code ? { code } : {}),
      });
      this.logger.warn(
        `Error processing ${abs}: ${message}`,
        code ? { code } : undefined,
      );
    }
  }
}

async function ensureReplicaRoot(cycle: Cycle, replicaRoot: string) {
  const kind = await kindOf(replicaRoot, { follow: true });
  if (kind === "dir") return true;
  if (kind !== null) {
    throw new ReplicaRootError(replicaRoot, "not a directory");
  }
  if (!cycle.dryRun) {
    await fsp.mkdir(replicaRoot, { recursive: true });
  }
  cycle.done("create-root", "", replicaRoot);
  return !cycle.dryRun;
}

export async function synchronize({
  sourceRoot,
  replicaRoot,
  hash = defaultHashAlg(),
  ignore = [],
  dryRun = false,
  logger = new NullLogger(),
}: MirrorOptions): Promise<CycleReport> {
  const startedAt = Date.now();
  const log = logger.child("mirror");
  const ignorer = createIgnorer(ignore);
  const cycle = new Cycle(log, dryRun);

  if ((await kindOf(sourceRoot, { follow: true })) !== "dir") {
    throw new SourceRootMissingError(sourceRoot);
  }
  log.debug(`Synchronizing from ${sourceRoot} to ${replicaRoot}`);

  const replicaExists = await ensureReplicaRoot(cycle, replicaRoot);
  const source = await snapshotTree(sourceRoot, { ignorer, logger: log });

  // directories first, so empty source directories exist in the replica too
  for (const rel of sortParentFirst(source.dirs)) {
    const dst = toAbs(rel, replicaRoot);
    await cycle.attempt("create-dir", rel, dst, async () => {
      const kind = await cycle.replicaKind(rel, dst);
      if (kind === "dir") return;
      if (kind === null) {
        if (!dryRun) await fsp.mkdir(dst, { recursive: true });
        cycle.done("create-dir", rel, dst);
        return;
      }
      if (!dryRun) {
        await fsp.rm(dst, { force: true });
        await fsp.mkdir(dst);
      }
      cycle.replace(rel, dst, "file with directory");
    });
  }

  for (const rel of source.files) {
    const src = toAbs(rel, sourceRoot);
    const dst = toAbs(rel, replicaRoot);
    await cycle.attempt("copy", rel, src, async () => {
      const kind = await cycle.replicaKind(rel, dst);
      if (kind === "file") {
        const { equal } = await compareFiles(src, dst, { hash, logger: log });
        if (equal) return;
        if (!dryRun) await fsp.copyFile(src, dst);
        cycle.done("update", rel, dst);
        return;
      }
      if (kind === null) {
        if (!dryRun) {
          await fsp.mkdir(path.dirname(dst), { recursive: true });
          await fsp.copyFile(src, dst);
        }
        cycle.done("copy", rel, dst);
        return;
      }
      if (!dryRun) {
        await fsp.rm(dst, { recursive: true, force: true });
        await fsp.copyFile(src, dst);
      }
      const replaced = kind === "dir" ? "directory" : "entry";
      cycle.replace(rel, dst, `${replaced} with file`);
    });
  }

  if (replicaExists) {
    await deleteExtraneous(cycle, sourceRoot, replicaRoot, ignorer, log);
  }

  const failures = cycle.results.filter((r) => r.status === "skipped").length;
  return {
    changed: cycle.results.some((r) => r.status === "done"),
    results: cycle.results,
    failures,
    dryRun,
    startedAt,
    durationMs: Date.now() - startedAt,
  };
}

// Runs strictly after propagation, so a file moved within the source is
// copied to its new location before the old copy is removed.
async function deleteExtraneous(
  cycle: Cycle,
  sourceRoot: string,
  replicaRoot: string,
  ignorer: Ignorer,
  log: Logger,
) {
  const replica = await snapshotTree(replicaRoot, { ignorer, logger: log });
  for (const rel of [...replica.files, ...replica.others]) {
    if (isAtOrUnder(rel, cycle.replaced)) continue;
    const dst = toAbs(rel, replicaRoot);
    await cycle.attempt("delete-file", rel, dst, async () => {
      if ((await kindOf(toAbs(rel, sourceRoot))) === "file") return;
      if (!cycle.dryRun) await fsp.rm(dst, { force: true });
      cycle.done("delete-file", rel, dst);
    });
  }

  // fresh walk: only the directories themselves matter, not their contents
  const { dirs } = cycle.dryRun
    ? replica
    : await snapshotTree(replicaRoot, { ignorer, logger: log });
  const removed: string[] = [];
  for (const rel of sortParentFirst(dirs)) {
    if (removed.some((d) => rel.startsWith(`${d}/`))) continue;
    if (isAtOrUnder(rel, cycle.replaced)) continue;
    const dst = toAbs(rel, replicaRoot);
    await cycle.attempt("delete-dir", rel, dst, async () => {
      if ((await kindOf(toAbs(rel, sourceRoot))) === "dir") return;
      if (!cycle.dryRun) await fsp.rm(dst, { recursive: true, force: true });
      removed.push(rel);
      cycle.done("delete-dir", rel, dst);
    });
  }
}

/**
 * Single cycle reduced to its "did anything change" answer.
 */
export async function mirrorOnce(
  sourceRoot: string,
  replicaRoot: string,
  logger?: Logger,
): Promise<boolean> {
  const report = await synchronize({ sourceRoot, replicaRoot, logger });
  return report.changed;
}
