/**
 * External process execution.
 *
 * Every tool the installer and the pipeline drive (git, cmake, ninja,
 * ldconfig, binder, python, docker) goes through a ProcessRunner. Calls
 * are blocking: no step starts before the previous exit status is known.
 */

import { spawnSync } from "node:child_process";
import { ExternalToolFailure, formatCommandLine } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

export interface CommandSpec {
  command: string;
  args: readonly string[];
  /** Working directory; defaults to the process cwd */
  cwd?: string;
  /** Variables merged over the current environment */
  env?: Record<string, string>;
  /** Capture stdout/stderr instead of streaming them to the terminal */
  capture?: boolean;
}

export interface CommandResult {
  exitCode: number;
  /** Combined stdout and stderr when captured, otherwise "" */
  capturedOutput: string;
}

export interface ProcessRunner {
  run(spec: CommandSpec): CommandResult;
}

/** Exit code reported when the executable could not be started */
export const EXIT_NOT_STARTED = 127;

/**
 * Runs commands with spawnSync. Output streams straight to the terminal
 * unless the command asks for capture; toolchain builds print a lot.
 */
export class SpawnProcessRunner implements ProcessRunner {
  private readonly logger: Logger;

  constructor(logger: Logger = createSilentLogger()) {
    this.logger = logger;
  }

  run(spec: CommandSpec): CommandResult {
    this.logger.debug("spawn", {
      command: formatCommandLine(spec.command, spec.args),
      cwd: spec.cwd,
    });

    const result = spawnSync(spec.command, [...spec.args], {
      cwd: spec.cwd,
      env: spec.env ? { ...process.env, ...spec.env } : process.env,
      stdio: spec.capture ? "pipe" : "inherit",
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
    });

    if (result.error) {
      return {
        exitCode: EXIT_NOT_STARTED,
        capturedOutput: result.error.message,
      };
    }

    const capturedOutput = spec.capture ? `${result.stdout ?? ""}${result.stderr ?? ""}` : "";
    return { exitCode: result.status ?? 1, capturedOutput };
  }
}

/**
 * Run a command and raise ExternalToolFailure on a non-zero exit.
 *
 * @param step - Pipeline step recorded on the failure, e.g. "llvm:configure"
 */
export function runChecked(
  runner: ProcessRunner,
  step: string,
  spec: CommandSpec,
  logger?: Logger
): CommandResult {
  logger?.info("Running command", {
    command: formatCommandLine(spec.command, spec.args),
    ...(spec.cwd ? { cwd: spec.cwd } : {}),
  });

  const result = runner.run(spec);
  if (result.exitCode !== 0) {
    throw new ExternalToolFailure(step, {
      command: spec.command,
      args: spec.args,
      cwd: spec.cwd,
      exitCode: result.exitCode,
      output: result.capturedOutput,
    });
  }
  return result;
}
