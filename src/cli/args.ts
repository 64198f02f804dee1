/**
 * Argument helpers shared by the CLI entry points.
 */

import { availableParallelism } from "node:os";
import { ValidationError } from "../errors/index.js";

/**
 * Rewrite space-separated list options into repeated `--name=value`
 * options so that `--project-sources a b c` parses like it reads.
 * A list ends at the next token starting with "-".
 */
export function expandListOptions(argv: readonly string[], listOptions: readonly string[]): string[] {
  const out: string[] = [];
  let current: string | undefined;
  for (const arg of argv) {
    if (arg.startsWith("-")) {
      const name = arg.replace(/^--/, "");
      current = listOptions.includes(name) ? name : undefined;
      if (current === undefined) {
        out.push(arg);
      }
      continue;
    }
    out.push(current !== undefined ? `--${current}=${arg}` : arg);
  }
  return out;
}

/**
 * Parse a job count; 0 means one job per CPU.
 *
 * @throws ValidationError for anything but a non-negative integer
 */
export function resolveJobs(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`--jobs must be a non-negative integer, got: ${raw}`, [], "cli");
  }
  const jobs = parseInt(raw, 10);
  return jobs === 0 ? availableParallelism() : jobs;
}

/**
 * Run node:util parseArgs, reporting its errors as ValidationError.
 */
export function parseOrReport<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof TypeError) {
      throw new ValidationError(err.message, [], "cli");
    }
    throw err;
  }
}
