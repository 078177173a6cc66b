// src/compare.ts
import { defaultHashAlg, fileDigest, type HashAlg } from "./hash.js";
import { describeError, type ErrorInfo } from "./errors.js";
import type { Logger } from "./logger.js";

export type CompareResult =
  | { equal: boolean; error?: undefined }
  | { equal: false; error: ErrorInfo };

export interface CompareOptions {
  hash?: HashAlg;
  logger?: Logger;
}

/**
 * Compare two existing files by whole-file digest. Any read failure makes the
 * files count as different, so the caller overwrites rather than keeps a
 * possibly stale copy.
 */
export async function compareFiles(
  a: string,
  b: string,
  { hash = defaultHashAlg(), logger }: CompareOptions = {},
): Promise<CompareResult> {
  try {
    const digestA = await fileDigest(hash, a);
    const digestB = await fileDigest(hash, b);
    return { equal: digestA === digestB };
  } catch (err) {
    const error = describeError(err);
    logger?.warn(
      `Error comparing files ${a} and ${b}: ${error.message}`,
      error.code ? { code: error.code } : undefined,
    );
    return { equal: false, error };
  }
}

export async function filesAreEqual(
  a: string,
  b: string,
  opts?: CompareOptions,
): Promise<boolean> {
  return (await compareFiles(a, b, opts)).equal;
}
