/**
 * pybind11, the header-only library the generated bindings are built
 * against. Staging is all there is to it: no build step.
 */

import { existsSync, rmSync, statSync } from "node:fs";
import { join } from "node:path";
import { MissingArtifactError } from "../errors/index.js";
import { BaseInstaller, type EnvironmentEntry, type InstallerContext } from "./staged-installer.js";
import { discardIfStale, writeFingerprint, type Fingerprint } from "./fingerprint.js";
import { cloneBranch, copyTree, fetchCommit } from "./git.js";
import type { SourceSpec } from "./source-spec.js";

export const PYBIND11_INCLUDE_DIR_KEY = "PYBIND11_INCLUDE_DIR";
export const PYBIND11_SHA_KEY = "PYBIND11_SHA";

export interface Pybind11InstallerOptions {
  /** Where pybind11 is materialized, e.g. <build>/pybind11 */
  baseSourceDirectory: string;
  remote: string;
}

const SHA_PATTERN = /^[0-9a-f]{7,40}$/;

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export class Pybind11Installer extends BaseInstaller {
  readonly name = "pybind11";
  readonly kind = "generic-library" as const;

  readonly baseSourceDirectory: string;
  readonly includeDirectory: string;
  private readonly spec: SourceSpec;
  private readonly remote: string;

  constructor(context: InstallerContext, spec: SourceSpec, options: Pybind11InstallerOptions) {
    super(context);
    this.spec = spec;
    this.remote = options.remote;
    this.baseSourceDirectory = options.baseSourceDirectory;
    this.includeDirectory = join(options.baseSourceDirectory, "include");
  }

  private fingerprint(): Fingerprint {
    return this.spec.isLocal
      ? { source: this.spec.resolveIdentity() }
      : { source: this.spec.resolveIdentity(), remote: this.remote };
  }

  protected stage(): void {
    discardIfStale(this.baseSourceDirectory, this.fingerprint(), this.logger);

    if (isDirectory(this.includeDirectory)) {
      this.logger.debug("Already staged", { dir: this.baseSourceDirectory });
      return;
    }

    // A directory without include/ is what an interrupted fetch leaves behind
    if (existsSync(this.baseSourceDirectory)) {
      this.logger.warn("Removing partially staged checkout", { dir: this.baseSourceDirectory });
      rmSync(this.baseSourceDirectory, { recursive: true, force: true });
    }

    const run = this.run.bind(this);
    if (this.spec.localPath !== undefined) {
      this.logger.info("Copying local source", { from: this.spec.localPath });
      copyTree(this.spec.localPath, this.baseSourceDirectory);
    } else {
      const version = this.spec.resolveIdentity();
      // Commits are fetched directly; anything else is a branch or tag
      if (SHA_PATTERN.test(version)) {
        fetchCommit(run, this.remote, version, this.baseSourceDirectory);
      } else {
        cloneBranch(run, this.remote, version, this.baseSourceDirectory);
      }
    }

    if (!isDirectory(this.includeDirectory)) {
      throw new MissingArtifactError(
        this.includeDirectory,
        `Error staging pybind11, unable to find path ${this.includeDirectory}`,
        "pybind11:prepare"
      );
    }
    writeFingerprint(this.baseSourceDirectory, this.fingerprint());
  }

  protected integrate(): EnvironmentEntry[] {
    return [
      { key: PYBIND11_INCLUDE_DIR_KEY, value: this.includeDirectory },
      { key: PYBIND11_SHA_KEY, value: this.spec.resolveIdentity() },
    ];
  }
}
