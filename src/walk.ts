// src/walk.ts
import * as walk from "@nodelib/fs.walk";
import { depth, toRel } from "./path-rel.js";
import { createIgnorer, type Ignorer } from "./ignore.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

export type TreeSnapshot = {
  files: string[];
  dirs: string[];
  // symbolic links, sockets, fifos: never mirrored, only removed from replicas
  others: string[];
};

export interface SnapshotOptions {
  ignorer?: Ignorer;
  logger?: Logger;
}

function walkEntries(
  root: string,
  settings: walk.Options,
): Promise<walk.Entry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(root, settings, (err, entries) => {
      if (err) reject(err);
      else resolve(entries);
    });
  });
}

/**
 * Enumerate everything under root as "/"-separated relative paths. Symbolic
 * links are never followed. Ignored directories are not descended into.
 */
export async function snapshotTree(
  root: string,
  { ignorer = createIgnorer(), logger }: SnapshotOptions = {},
): Promise<TreeSnapshot> {
  const entries = await walkEntries(root, {
    followSymbolicLinks: false,
    deepFilter: (e) => !ignorer.ignoresDir(toRel(e.path, root)),
    entryFilter: (e) => {
      const r = toRel(e.path, root);
      if (e.dirent.isDirectory()) return !ignorer.ignoresDir(r);
      return !ignorer.ignoresFile(r);
    },
    // entries can vanish while we walk; the next cycle picks up the rest
    errorFilter: (err) => {
      const { message, code } = describeError(err);
      logger?.warn(`Error reading directory: ${message}`, { root, code });
      return true;
    },
  });

  const files: string[] = [];
  const dirs: string[] = [];
  const others: string[] = [];
  for (const e of entries) {
    const r = toRel(e.path, root);
    if (e.dirent.isFile()) {
      files.push(r);
    } else if (e.dirent.isDirectory()) {
      dirs.push(r);
    } else {
      others.push(r);
    }
  }
  // walk order depends on I/O timing
  files.sort();
  dirs.sort();
  others.sort();
  return { files, dirs, others };
}

// parents before children
export function sortParentFirst(paths: string[]): string[] {
  return paths.sort((a, b) => {
    return depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0);
  });
}
