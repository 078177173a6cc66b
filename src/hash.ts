// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createHash, getHashes } from "node:crypto";

export const STREAM_HWM = 1024 * 1024; // 1MB read chunks

const ENCODING = "hex";

// Digests are only used to detect equal contents, so md5 is acceptable here.
export const CURATED_HASH_ALGOS = [
  "md5",
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "sha256";
}

// Curated names the linked OpenSSL actually provides, in curated order.
export function listSupportedHashes(): HashAlg[] {
  const avail = new Set(getHashes().map((name) => name.toLowerCase()));
  return CURATED_HASH_ALGOS.filter((alg) => avail.has(alg));
}

export function normalizeHashAlg(requested?: string): HashAlg {
  if (!requested) return defaultHashAlg();
  const wanted = requested.trim().toLowerCase();
  const supported = listSupportedHashes();
  const match = supported.find((alg) => alg === wanted);
  if (!match) {
    throw new Error(
      `unsupported hash algorithm '${requested}' (supported: ${supported.join(", ")})`,
    );
  }
  return match;
}

/**
 * Digest of a file's full contents. The file is streamed through the hash
 * once; read errors reject.
 */
export async function fileDigest(alg: HashAlg, path: string): Promise<string> {
  const h = createHash(alg);
  const rs = createReadStream(path, { highWaterMark: STREAM_HWM });

  await pipeline(rs, async function* (src: AsyncIterable<Buffer>) {
    for await (const chunk of src) {
      h.update(chunk);
      // yield once to satisfy transform signature (no downstream consumer)
      yield;
    }
  });

  return h.digest(ENCODING);
}
