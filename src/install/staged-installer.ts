/**
 * Staged installer lifecycle.
 *
 * Every installer is prepared (inputs staged, nothing built) before it is
 * installed (built/integrated). `install()` always prepares first, so a
 * caller can run prepare-only as a pre-fetch step and install later.
 *
 *   unprepared ──prepare()──▶ prepared ──install()──▶ installed
 *
 * There is no way back from `installed`.
 */

import type { Logger } from "../logging/index.js";
import {
  runChecked,
  type CommandResult,
  type CommandSpec,
  type ProcessRunner,
} from "../process/runner.js";

export type InstallerState = "unprepared" | "prepared" | "installed";

export type InstallerKind = "generic-library" | "toolchain-bootstrap" | "generator";

/**
 * One KEY=VALUE contribution to the environment descriptor.
 */
export interface EnvironmentEntry {
  readonly key: string;
  readonly value: string;
}

/**
 * What the orchestrator sees of an installer.
 */
export interface StagedInstaller {
  readonly name: string;
  readonly kind: InstallerKind;
  readonly state: InstallerState;
  /** Stage inputs. Safe to call repeatedly. */
  prepare(): void;
  /** Prepare, then build/integrate. Returns descriptor contributions. */
  install(): readonly EnvironmentEntry[];
}

export interface InstallerContext {
  readonly runner: ProcessRunner;
  readonly logger: Logger;
}

export abstract class BaseInstaller implements StagedInstaller {
  abstract readonly name: string;
  abstract readonly kind: InstallerKind;

  protected readonly runner: ProcessRunner;
  private readonly baseLogger: Logger;
  private currentState: InstallerState = "unprepared";
  private contributions: readonly EnvironmentEntry[] = [];

  protected constructor(context: InstallerContext) {
    this.runner = context.runner;
    this.baseLogger = context.logger;
  }

  get state(): InstallerState {
    return this.currentState;
  }

  /**
   * Stage inputs without building. Implementations must skip network and
   * copy work when their target directory already exists.
   */
  protected abstract stage(): void;

  /**
   * Build or integrate the staged inputs.
   */
  protected abstract integrate(): EnvironmentEntry[];

  prepare(): void {
    this.stage();
    if (this.currentState === "unprepared") {
      this.currentState = "prepared";
    }
  }

  install(): readonly EnvironmentEntry[] {
    if (this.currentState === "installed") {
      return this.contributions;
    }
    this.prepare();
    this.contributions = Object.freeze(this.integrate());
    this.currentState = "installed";
    return this.contributions;
  }

  protected get logger(): Logger {
    return this.baseLogger.child(this.name);
  }

  /**
   * Run an external command, failing the installer on non-zero exit.
   */
  protected run(step: string, spec: CommandSpec): CommandResult {
    return runChecked(this.runner, `${this.name}:${step}`, spec, this.logger);
  }
}
