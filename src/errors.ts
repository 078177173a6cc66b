export class MirrorError extends Error {
  readonly path?: string;

  constructor(message: string, opts: { path?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "MirrorError";
    this.path = opts.path;
  }
}

export class SourceRootMissingError extends MirrorError {
  constructor(root: string) {
    super(`Source folder '${root}' does not exist.`, { path: root });
    this.name = "SourceRootMissingError";
  }
}

export class ReplicaRootError extends MirrorError {
  constructor(root: string, reason: string) {
    super(`Replica folder '${root}' is unusable: ${reason}`, { path: root });
    this.name = "ReplicaRootError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ErrorInfo = {
  message: string;
  code?: string;
};

// node errors carry `code` (ENOENT, EACCES, ...); anything else is just a message
export function describeError(err: unknown): ErrorInfo {
  if (err instanceof Error) {
    const code = "code" in err ? err.code : undefined;
    return typeof code === "string"
      ? { message: err.message, code }
      : { message: err.message };
  }
  return { message: String(err) };
}

export function errorCode(err: unknown): string | undefined {
  return describeError(err).code;
}
