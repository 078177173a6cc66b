import ignore from "ignore";

export type Ignorer = {
  ignoresFile: (r: string) => boolean;
  ignoresDir: (r: string) => boolean;
};

export function normalizeR(r: string): string {
  return r.replace(/\\/g, "/").replace(/^\/+/, "");
}

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function collectIgnoreOption(
  value: string,
  previous: string[] = [],
): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return {
      ignoresFile: () => false,
      ignoresDir: () => false,
    };
  }
  const matcher = ignore().add(cleaned);
  return {
    ignoresFile: (r) => {
      const n = normalizeR(r);
      return n !== "" && matcher.ignores(n);
    },
    // trailing slash so "build/" style rules match the directory itself
    ignoresDir: (r) => {
      const n = normalizeR(r);
      return n !== "" && matcher.ignores(`${n}/`);
    },
  };
}
