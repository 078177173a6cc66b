// src/path-rel.ts
import path from "node:path";

// Relative paths are always "/"-separated so they can be compared across the
// two trees and matched against ignore rules.
export function toRel(abs: string, root: string): string {
  const rel = path.relative(root, abs);
  return path.sep === "/" ? rel : rel.split(path.sep).join("/");
}

export function toAbs(rel: string, root: string): string {
  return rel ? path.join(root, ...rel.split("/")) : root;
}

export function depth(rel: string): number {
  return rel ? rel.split("/").length : 0;
}

export function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  if (rel === "") return true;
  if (rel === ".." || rel.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(rel);
}
