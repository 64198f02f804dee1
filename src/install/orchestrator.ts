/**
 * Installation orchestrator.
 *
 * Runs the installers in dependency order and writes the environment
 * descriptor:
 *
 *   stage Binder ─▶ stage pybind11 ─▶ bootstrap LLVM (+Binder) ─▶ ENVFILE
 *
 * Binder must be staged before LLVM is prepared because the toolchain's
 * clang-tools-extra build is patched to include it. pybind11 has no
 * ordering constraint of its own.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import type { InstallConfig } from "../config/build/schema.js";
import type { Logger } from "../logging/index.js";
import { BinderInstaller } from "./binder.js";
import { resolveBuildConfiguration } from "./compile-options.js";
import { EnvironmentDescriptor, ENVFILE_NAME } from "./environment.js";
import { LLVMBootstrapInstaller } from "./llvm.js";
import { Pybind11Installer } from "./pybind11.js";
import { SourceSpec } from "./source-spec.js";
import type { InstallerContext, StagedInstaller } from "./staged-installer.js";

export interface InstallationResult {
  envfilePath: string;
  descriptor: EnvironmentDescriptor;
}

/**
 * Installer set for a validated configuration, in execution order.
 */
export function createInstallers(
  config: InstallConfig,
  context: InstallerContext
): StagedInstaller[] {
  const build = resolveBuildConfiguration(config.compiler, config.buildMode);

  const binder = new BinderInstaller(context, SourceSpec.fromSelection(config.binder), {
    downloadDirectory: join(config.buildPath, "binder"),
    remote: config.remotes.binder,
  });
  const pybind11 = new Pybind11Installer(context, SourceSpec.fromSelection(config.pybind11), {
    baseSourceDirectory: join(config.buildPath, "pybind11"),
    remote: config.remotes.pybind11,
  });
  const llvm = new LLVMBootstrapInstaller(context, SourceSpec.fromSelection(config.llvm), build, {
    baseSourceDirectory: join(config.buildPath, "llvm-project"),
    binderSourceDirectory: binder.sourceDirectory,
    binderIdentity: binder.identity,
    remote: config.remotes.llvm,
    jobs: config.jobs,
    linker: config.linker,
  });

  return [binder, pybind11, llvm];
}

export class InstallationOrchestrator {
  readonly buildPath: string;
  readonly envfilePath: string;
  private readonly installers: readonly StagedInstaller[];
  private readonly logger: Logger;

  constructor(buildPath: string, installers: readonly StagedInstaller[], logger: Logger) {
    this.buildPath = buildPath;
    this.envfilePath = join(buildPath, ENVFILE_NAME);
    this.installers = installers;
    this.logger = logger;
  }

  static fromConfig(config: InstallConfig, context: InstallerContext): InstallationOrchestrator {
    return new InstallationOrchestrator(
      config.buildPath,
      createInstallers(config, context),
      context.logger
    );
  }

  /**
   * Stage every installer's inputs without building anything.
   */
  prepare(): void {
    mkdirSync(this.buildPath, { recursive: true });
    for (const installer of this.installers) {
      this.logger.info("Preparing", { installer: installer.name });
      installer.prepare();
    }
  }

  /**
   * Stage everything, install each installer in order, then write ENVFILE.
   */
  install(): InstallationResult {
    this.prepare();

    const descriptor = new EnvironmentDescriptor();
    for (const installer of this.installers) {
      this.logger.info("Installing", { installer: installer.name });
      descriptor.addAll(installer.install(), installer.name);
    }

    descriptor.writeTo(this.envfilePath);
    this.logger.info("Wrote environment descriptor", {
      path: this.envfilePath,
      keys: descriptor.keys(),
    });
    return { envfilePath: this.envfilePath, descriptor };
  }
}
