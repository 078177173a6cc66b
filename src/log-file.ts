import fs from "node:fs";
import path from "node:path";
import {
  formatLogLine,
  StructuredLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
} from "./logger.js";

/**
 * Append-only text log; one formatted line per entry.
 */
export class LogFileStore {
  private fd: number | null;
  private failed = false;

  private constructor(
    readonly file: string,
    fd: number,
  ) {
    this.fd = fd;
  }

  static open(file: string): LogFileStore {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    return new LogFileStore(file, fs.openSync(file, "a"));
  }

  append(entry: LogEntry): void {
    if (this.fd == null) return;
    try {
      fs.writeSync(this.fd, formatLogLine(entry) + "\n");
    } catch (err) {
      // report once; console output keeps going
      if (!this.failed) {
        this.failed = true;
        console.error(
          `Error writing to log file ${this.file}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }

  close(): void {
    if (this.fd == null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }
}

export interface FileLoggerHandle {
  logger: Logger;
  store: LogFileStore;
  close: () => void;
}

export interface FileLoggerOptions {
  scope?: string;
  minLevel?: LogLevel;
  echoLevel?: LogLevel;
}

export function createFileLogger(
  file: string,
  options: FileLoggerOptions = {},
): FileLoggerHandle {
  const store = LogFileStore.open(file);
  const logger = new StructuredLogger({
    scope: options.scope,
    minLevel: options.minLevel,
    sink: (entry) => store.append(entry),
    echo: options.echoLevel ? { minLevel: options.echoLevel } : undefined,
  });
  return {
    logger,
    store,
    close: () => store.close(),
  };
}
