import fsp from "node:fs/promises";
import { dirname, join } from "node:path";
import { StructuredLogger, type LogEntry } from "../logger.js";
import { synchronize, type MirrorOptions } from "../mirror.js";

export async function fileExists(p: string) {
  return !!(await fsp
    .stat(p)
    .then((st) => st.isFile())
    .catch(() => false));
}

export async function dirExists(p: string) {
  return !!(await fsp
    .stat(p)
    .then((st) => st.isDirectory())
    .catch(() => false));
}

export type Roots = {
  source: string;
  replica: string;
};

// replica is left for the cycle to create
export async function mkCase(tmpBase: string, name: string): Promise<Roots> {
  const base = join(tmpBase, name);
  const source = join(base, "source");
  const replica = join(base, "replica");
  await fsp.mkdir(source, { recursive: true });
  return { source, replica };
}

export function mirror(
  r: Roots,
  opts: Omit<MirrorOptions, "sourceRoot" | "replicaRoot"> = {},
) {
  return synchronize({ sourceRoot: r.source, replicaRoot: r.replica, ...opts });
}

export async function writeTree(root: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, rel);
    await fsp.mkdir(dirname(abs), { recursive: true });
    await fsp.writeFile(abs, content);
  }
}

/**
 * Every file under root as rel -> contents, and every directory as
 * rel + "/" -> "".
 */
export async function readTree(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  async function visit(dir: string, prefix: string) {
    for (const ent of await fsp.readdir(dir, { withFileTypes: true })) {
      const rel = prefix ? `${prefix}/${ent.name}` : ent.name;
      const abs = join(dir, ent.name);
      if (ent.isDirectory()) {
        out[`${rel}/`] = "";
        await visit(abs, rel);
      } else if (ent.isFile()) {
        out[rel] = await fsp.readFile(abs, "utf8");
      }
    }
  }
  await visit(root, "");
  return out;
}

export function memoryLogger() {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    sink: (entry) => entries.push(entry),
    clock: () => 0,
  });
  return { logger, entries, messages: () => entries.map((e) => e.message) };
}
