/**
 * Error kinds raised by the installer and the generation pipeline.
 *
 * None of these are recovered locally. Each one aborts the run, and the
 * CLI entry points turn it into a non-zero exit with `format()` output.
 */

/**
 * Base class for every failure the core raises.
 */
export class BindforgeError extends Error {
  /** Pipeline step that failed (e.g. "llvm:configure", "generate:binder") */
  public readonly step?: string;

  constructor(message: string, step?: string) {
    super(message);
    this.name = "BindforgeError";
    this.step = step;
  }

  /**
   * Format the error for display.
   */
  format(): string {
    return this.step ? `[${this.step}] ${this.message}` : this.message;
  }
}

/**
 * Individual configuration issue.
 */
export interface ValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "custom" for hand-written checks */
  code: string;
}

/**
 * Malformed or contradictory configuration.
 */
export class ValidationError extends BindforgeError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], step?: string) {
    super(message, step);
    this.name = "ValidationError";
    this.issues = issues;
  }

  override format(): string {
    const lines = [super.format()];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Everything needed to reproduce a failing external command.
 */
export interface FailedCommand {
  command: string;
  args: readonly string[];
  cwd?: string;
  exitCode: number;
  output?: string;
}

/**
 * An external process (git, cmake, ninja, ldconfig, binder, python...)
 * exited non-zero or could not be started.
 */
export class ExternalToolFailure extends BindforgeError {
  public readonly command: string;
  public readonly args: readonly string[];
  public readonly cwd?: string;
  public readonly exitCode: number;
  public readonly output?: string;

  constructor(step: string, failed: FailedCommand, message?: string) {
    super(
      message ?? `Command exited with code ${failed.exitCode}: ${formatCommandLine(failed.command, failed.args)}`,
      step
    );
    this.name = "ExternalToolFailure";
    this.command = failed.command;
    this.args = failed.args;
    this.cwd = failed.cwd;
    this.exitCode = failed.exitCode;
    this.output = failed.output;
  }

  /** The full command line as a single string */
  get commandLine(): string {
    return formatCommandLine(this.command, this.args);
  }

  override format(): string {
    const lines = [super.format()];
    if (this.cwd) {
      lines.push(`  cwd: ${this.cwd}`);
    }
    if (this.output && this.output.trim().length > 0) {
      lines.push("  output:");
      for (const line of this.output.trimEnd().split("\n").slice(-20)) {
        lines.push(`    ${line}`);
      }
    }
    return lines.join("\n");
  }
}

/**
 * A file or directory a step should have produced is absent.
 */
export class MissingArtifactError extends BindforgeError {
  public readonly path: string;

  constructor(path: string, message: string, step?: string) {
    super(message, step);
    this.name = "MissingArtifactError";
    this.path = path;
  }
}

/**
 * The generated-source manifest lists the same file twice. Binder writes
 * one file per namespace, so a module named like one of its own namespaces
 * or classes makes it overwrite its own output.
 */
export class NameCollisionError extends BindforgeError {
  public readonly duplicate: string;
  public readonly moduleName: string;

  constructor(moduleName: string, duplicate: string, step?: string) {
    super(
      `Duplicated generated source "${duplicate}": do not name module "${moduleName}" the same as one of its namespaces or classes`,
      step
    );
    this.name = "NameCollisionError";
    this.duplicate = duplicate;
    this.moduleName = moduleName;
  }
}

/**
 * Render a command and its arguments as one shell-like line.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s"';]/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
