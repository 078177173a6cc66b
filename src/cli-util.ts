// src/cli-util.ts
import { Command, type OptionValues } from "commander";

/**
 * Minimal CLI bootstrap:
 * - If this module is the process entry point, parse argv and call `run(opts)`
 * - If imported, do nothing (so caller can call run() directly)
 *
 * Usage:
 *   export function buildProgram(): Command { ... }
 *   export async function runX(opts: XOpts, program: Command) { ... }
 *   cliEntrypoint(require.main === module, buildProgram, runX, {label: "x"});
 */
export function cliEntrypoint<T extends OptionValues>(
  isMain: boolean,
  buildProgram: () => Command,
  run: (opts: T, program: Command) => Promise<void | number>,
  opts?: { label?: string },
): void {
  if (!isMain) return;

  void (async () => {
    const program = buildProgram();
    const parsed = program.parse(process.argv);
    const options = parsed.opts<T>();

    try {
      const code = await run(options, program);
      if (typeof code === "number") process.exitCode = code;
    } catch (err) {
      const label = opts?.label || program.name() || "command";
      const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
      // prints usage context and exits 1
      program.error(`${label} fatal:\n${msg}`);
    }
  })();
}

/** Handy for tests: run a command with custom argv without process.exit */
export async function parseAndRun<T extends OptionValues>(
  buildProgram: () => Command,
  run: (opts: T, program: Command) => Promise<void | number>,
  argv: string[],
): Promise<number | void> {
  const program = buildProgram();
  program.exitOverride();
  const parsed = program.parse(argv, { from: "user" });
  const options = parsed.opts<T>();
  return run(options, program);
}
