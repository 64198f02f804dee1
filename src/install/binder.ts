/**
 * Binder, the binding generator. Its sources are only staged here; it is
 * compiled as a clang-tools-extra subproject by the toolchain bootstrap,
 * which is why it must be staged before the toolchain is configured.
 */

import { existsSync, statSync } from "node:fs";
import { join } from "node:path";
import { MissingArtifactError } from "../errors/index.js";
import { BaseInstaller, type EnvironmentEntry, type InstallerContext } from "./staged-installer.js";
import { discardIfStale, writeFingerprint, type Fingerprint } from "./fingerprint.js";
import { cloneBranch } from "./git.js";
import type { SourceSpec } from "./source-spec.js";

export const BINDER_SOURCE_DIR_KEY = "BINDER_SOURCE_DIR";
export const BINDER_VERSION_KEY = "BINDER_VERSION";

export interface BinderInstallerOptions {
  /** Clone target for pinned branches, e.g. <build>/binder */
  downloadDirectory: string;
  remote: string;
}

export class BinderInstaller extends BaseInstaller {
  readonly name = "binder";
  readonly kind = "generator" as const;

  readonly downloadDirectory: string;
  /** The tool's own source tree (<checkout>/source) */
  readonly sourceDirectory: string;
  private readonly spec: SourceSpec;
  private readonly remote: string;

  constructor(context: InstallerContext, spec: SourceSpec, options: BinderInstallerOptions) {
    super(context);
    this.spec = spec;
    this.remote = options.remote;
    this.downloadDirectory = options.downloadDirectory;
    const checkout = spec.localPath ?? options.downloadDirectory;
    this.sourceDirectory = join(checkout, "source");
  }

  get identity(): string {
    return this.spec.resolveIdentity();
  }

  private fingerprint(): Fingerprint {
    return { source: this.spec.resolveIdentity(), remote: this.remote };
  }

  protected stage(): void {
    if (this.spec.pinnedVersion !== undefined) {
      discardIfStale(this.downloadDirectory, this.fingerprint(), this.logger);
      if (!existsSync(this.downloadDirectory)) {
        cloneBranch(
          this.run.bind(this),
          this.remote,
          this.spec.pinnedVersion,
          this.downloadDirectory
        );
        writeFingerprint(this.downloadDirectory, this.fingerprint());
      } else {
        this.logger.debug("Already staged", { dir: this.downloadDirectory });
      }
    }

    if (!existsSync(this.sourceDirectory) || !statSync(this.sourceDirectory).isDirectory()) {
      throw new MissingArtifactError(
        this.sourceDirectory,
        `Binder source directory not found at ${this.sourceDirectory}`,
        "binder:prepare"
      );
    }
  }

  protected integrate(): EnvironmentEntry[] {
    return [
      { key: BINDER_SOURCE_DIR_KEY, value: this.sourceDirectory },
      { key: BINDER_VERSION_KEY, value: this.spec.resolveIdentity() },
    ];
  }
}
