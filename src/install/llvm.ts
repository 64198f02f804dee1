/**
 * Two-pass LLVM/Clang bootstrap with Binder built in-tree.
 *
 * The toolchain has to be built with itself to get a libc++/libc++abi
 * consistent compiler, but no such compiler exists at the start:
 *
 *   pass 1  configure with the system compiler, build, install
 *           (resource headers, libc++, libc++abi, clang, binder, headers)
 *   link    register the installed runtime with the dynamic linker
 *   pass 2  configure a fresh build directory with the clang from pass 1,
 *           build and install again
 *
 * Layout under the build path:
 *
 *   <build>/llvm-project/
 *     clang-tools-extra/binder/   (Binder sources, added to CMakeLists.txt)
 *     build/                      (pass 1)
 *     build2/bin/                 (pass 2, the toolchain handed on)
 *
 * Any failing step aborts the whole bootstrap.
 */

import { appendFileSync, existsSync, mkdirSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { MissingArtifactError } from "../errors/index.js";
import type { LinkerConfig } from "../config/build/schema.js";
import { BaseInstaller, type EnvironmentEntry, type InstallerContext } from "./staged-installer.js";
import { cmakeArgsFor, cmakeCompilerArgs, type BuildConfiguration } from "./compile-options.js";
import { discardIfStale, writeFingerprint, type Fingerprint } from "./fingerprint.js";
import { cloneBranch, copyTree } from "./git.js";
import type { SourceSpec } from "./source-spec.js";

export const LLVM_BIN_DIR_KEY = "LLVM_BIN_DIR";
export const LLVM_VERSION_KEY = "LLVM_VERSION";

/** Subdirectory of clang-tools-extra that Binder is staged into */
export const BINDER_TOOLS_EXTRA_SUBDIR = "binder";

export const LLVM_CMAKE_FLAGS: readonly string[] = [
  "-DLLVM_ENABLE_LIBCXX=ON",
  "-DLLVM_INCLUDE_TESTS=OFF",
  "-DLLVM_ENABLE_RUNTIMES=libc;libcxx;libcxxabi",
  "-DLLVM_ENABLE_PROJECTS=clang-tools-extra;clang",
  "-DLLVM_ENABLE_EH=1",
  "-DLLVM_ENABLE_RTTI=ON",
];

export const LLVM_INSTALL_TARGETS: readonly string[] = [
  "install-clang-resource-headers",
  "install-cxx",
  "install-cxxabi",
  "install-clang",
  `tools/clang/tools/extra/${BINDER_TOOLS_EXTRA_SUBDIR}/install`,
  "install-clang-headers",
];

/** Compilers used for pass 2: the ones pass 1 installed */
const BOOTSTRAPPED_CC = "clang";
const BOOTSTRAPPED_CXX = "clang++";

export interface LLVMBootstrapOptions {
  /** Where llvm-project is materialized, e.g. <build>/llvm-project */
  baseSourceDirectory: string;
  /** Staged Binder sources; must exist before prepare() */
  binderSourceDirectory: string;
  /** Identity of the staged Binder sources, copied into clang-tools-extra */
  binderIdentity: string;
  remote: string;
  jobs: number;
  linker: LinkerConfig;
  /** Pass 1 build directory name; pass 2 appends "2" */
  buildSubdir?: string;
}

interface BootstrapPass {
  label: string;
  buildDirectory: string;
  compilerArgs: string[];
}

export class LLVMBootstrapInstaller extends BaseInstaller {
  readonly name = "llvm";
  readonly kind = "toolchain-bootstrap" as const;

  readonly baseSourceDirectory: string;
  readonly firstPassBuildDirectory: string;
  readonly secondPassBuildDirectory: string;
  readonly binderToolsExtraDirectory: string;
  private readonly spec: SourceSpec;
  private readonly build: BuildConfiguration;
  private readonly options: LLVMBootstrapOptions;

  constructor(
    context: InstallerContext,
    spec: SourceSpec,
    build: BuildConfiguration,
    options: LLVMBootstrapOptions
  ) {
    super(context);
    this.spec = spec;
    this.build = build;
    this.options = options;
    this.baseSourceDirectory = options.baseSourceDirectory;
    const buildSubdir = options.buildSubdir ?? "build";
    this.firstPassBuildDirectory = join(options.baseSourceDirectory, buildSubdir);
    this.secondPassBuildDirectory = join(options.baseSourceDirectory, `${buildSubdir}2`);
    this.binderToolsExtraDirectory = join(
      options.baseSourceDirectory,
      "clang-tools-extra",
      BINDER_TOOLS_EXTRA_SUBDIR
    );
  }

  /** The self-hosted toolchain's binaries */
  get binDirectory(): string {
    return join(this.secondPassBuildDirectory, "bin");
  }

  private sourceFingerprint(): Fingerprint {
    const fingerprint: Fingerprint = {
      source: this.spec.resolveIdentity(),
      binder: this.options.binderIdentity,
    };
    return this.spec.isLocal ? fingerprint : { ...fingerprint, remote: this.options.remote };
  }

  protected stage(): void {
    const binderSource = this.options.binderSourceDirectory;
    if (!existsSync(binderSource) || !statSync(binderSource).isDirectory()) {
      throw new MissingArtifactError(
        binderSource,
        `Cannot install llvm without binder, unable to find binder source at ${binderSource}`,
        "llvm:prepare"
      );
    }

    discardIfStale(this.baseSourceDirectory, this.sourceFingerprint(), this.logger);
    if (existsSync(this.baseSourceDirectory)) {
      this.logger.debug("Already staged", { dir: this.baseSourceDirectory });
      return;
    }

    if (this.spec.localPath !== undefined) {
      this.logger.info("Copying local source", { from: this.spec.localPath });
      copyTree(this.spec.localPath, this.baseSourceDirectory);
    } else {
      cloneBranch(
        this.run.bind(this),
        this.options.remote,
        this.spec.resolveIdentity(),
        this.baseSourceDirectory
      );
    }

    copyTree(binderSource, this.binderToolsExtraDirectory);
    appendFileSync(
      join(this.baseSourceDirectory, "clang-tools-extra", "CMakeLists.txt"),
      `\nadd_subdirectory(${BINDER_TOOLS_EXTRA_SUBDIR})\n`
    );
    writeFingerprint(this.baseSourceDirectory, this.sourceFingerprint());
  }

  protected integrate(): EnvironmentEntry[] {
    this.runPass({
      label: "pass1",
      buildDirectory: this.firstPassBuildDirectory,
      compilerArgs: cmakeArgsFor(this.build),
    });
    this.registerRuntimeLibrary();
    // Both compilers must switch; a mixed pair fails LLVM_LIBSTDCXX_MIN
    this.runPass({
      label: "pass2",
      buildDirectory: this.secondPassBuildDirectory,
      compilerArgs: cmakeCompilerArgs(BOOTSTRAPPED_CC, BOOTSTRAPPED_CXX, this.build.buildMode),
    });

    return [
      { key: LLVM_BIN_DIR_KEY, value: this.binDirectory },
      { key: LLVM_VERSION_KEY, value: this.spec.resolveIdentity() },
    ];
  }

  private runPass(pass: BootstrapPass): void {
    const fingerprint: Fingerprint = {
      source: this.spec.resolveIdentity(),
      binder: this.options.binderIdentity,
      compilers: pass.compilerArgs.join(" "),
    };
    discardIfStale(pass.buildDirectory, fingerprint, this.logger);

    this.logger.info("Configuring toolchain", { pass: pass.label, buildDir: pass.buildDirectory });
    this.run(`${pass.label}:configure`, {
      command: "cmake",
      args: ["llvm", "-B", pass.buildDirectory, "-G", "Ninja", ...pass.compilerArgs, ...LLVM_CMAKE_FLAGS],
      cwd: this.baseSourceDirectory,
    });
    // A rerun with the same configuration resumes this build directory
    if (existsSync(pass.buildDirectory)) {
      writeFingerprint(pass.buildDirectory, fingerprint);
    }

    const jobs = String(this.options.jobs);
    this.run(`${pass.label}:build`, {
      command: "ninja",
      args: ["-j", jobs],
      cwd: pass.buildDirectory,
    });
    this.run(`${pass.label}:install`, {
      command: "ninja",
      args: [...LLVM_INSTALL_TARGETS, "-j", jobs],
      cwd: pass.buildDirectory,
    });
  }

  private registerRuntimeLibrary(): void {
    const { configDir, configFile, runtimeLibDir } = this.options.linker;
    mkdirSync(configDir, { recursive: true });
    writeFileSync(join(configDir, configFile), runtimeLibDir);
    this.logger.info("Registered runtime library path", { runtimeLibDir });
    this.run("ldconfig", {
      command: "ldconfig",
      args: [],
      cwd: this.firstPassBuildDirectory,
    });
  }
}
