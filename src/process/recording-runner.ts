/**
 * In-process stand-in for external tools.
 *
 * Records every command it is asked to run and answers from a list of
 * handlers, so installers and the pipeline can be driven end to end
 * without git, cmake or a compiler. Handlers may touch the filesystem to
 * simulate a tool's side effects (a clone creating its directory, Binder
 * writing its manifest).
 */

import { formatCommandLine } from "../errors/index.js";
import type { CommandResult, CommandSpec, ProcessRunner } from "./runner.js";

export type CommandMatcher = string | ((spec: CommandSpec) => boolean);

export type CommandResponder = (spec: CommandSpec) => Partial<CommandResult> | undefined;

interface Handler {
  matches: (spec: CommandSpec) => boolean;
  respond: CommandResponder;
}

/**
 * Matches a command whose formatted line starts with `prefix`.
 */
function toPredicate(matcher: CommandMatcher): (spec: CommandSpec) => boolean {
  if (typeof matcher === "function") {
    return matcher;
  }
  return (spec) => formatCommandLine(spec.command, spec.args).startsWith(matcher);
}

export class RecordingProcessRunner implements ProcessRunner {
  readonly calls: CommandSpec[] = [];
  private readonly handlers: Handler[] = [];

  /**
   * Register a handler. The first matching handler wins; commands nobody
   * handles succeed with no output.
   */
  on(matcher: CommandMatcher, respond: CommandResponder = () => undefined): this {
    this.handlers.push({ matches: toPredicate(matcher), respond });
    return this;
  }

  /**
   * Make every command matching `matcher` exit with `exitCode`.
   */
  fail(matcher: CommandMatcher, exitCode = 1, output = ""): this {
    return this.on(matcher, () => ({ exitCode, capturedOutput: output }));
  }

  run(spec: CommandSpec): CommandResult {
    this.calls.push(spec);
    const handler = this.handlers.find((h) => h.matches(spec));
    const response = handler?.respond(spec);
    return {
      exitCode: response?.exitCode ?? 0,
      capturedOutput: response?.capturedOutput ?? "",
    };
  }

  /** Recorded commands as single lines, in call order */
  commandLines(): string[] {
    return this.calls.map((spec) => formatCommandLine(spec.command, spec.args));
  }

  /** Index of the first recorded command starting with `prefix`, or -1 */
  indexOf(prefix: string): number {
    return this.commandLines().findIndex((line) => line.startsWith(prefix));
  }
}
