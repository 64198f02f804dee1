#!/usr/bin/env node
/**
 * CLI command to bootstrap the toolchain, Binder and pybind11.
 *
 * Usage:
 *   npx tsx src/cli/install.ts --build-path /build --binder-branch master [options]
 *   npm run install-toolchain -- --build-path /build --binder-source ~/src/binder
 *
 * Options:
 *   --build-path <dir>         Output directory for everything (required)
 *   --binder-branch <branch>   Binder branch to clone         } exactly one
 *   --binder-source <dir>      Local Binder checkout          } required
 *   --pybind11-sha <sha>       pybind11 commit (default: supported sha)
 *   --pybind11-source <dir>    Local pybind11 tree instead
 *   --llvm-version <tag>       LLVM tag (default: llvmorg-13.0.1)
 *   --llvm-source <dir>        Local llvm-project tree instead
 *   --compiler <clang|gcc>     Compiler for the first pass (default: clang)
 *   --build-mode <mode>        Release|Debug|MinSizeRel|RelWithDebInfo
 *   -j, --jobs <n>             Build jobs, 0 = number of CPUs (default: 1)
 *   --prepare-only             Stage sources, build nothing
 *   --pybind11-git-url <url>   Remote overrides (also BINDFORGE_*_GIT_URL)
 *   --binder-git-url <url>
 *   --llvm-git-url <url>
 *   -h, --help                 Show help
 *
 * Exit codes:
 *   0 - Installation (or preparation) completed
 *   1 - Validation failed or an external tool failed
 */

import { parseArgs } from "node:util";

import {
  ConfigError,
  loadAppConfig,
  loadInstallConfig,
  withDefaultVersion,
  SUGGESTED_BINDER_BRANCH,
  SUGGESTED_LLVM_RELEASE,
  SUPPORTED_PYBIND11_SHA,
  type AppConfig,
  type InstallConfigInput,
} from "../config/index.js";
import { BindforgeError } from "../errors/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { InstallationOrchestrator } from "../install/orchestrator.js";
import { SpawnProcessRunner } from "../process/runner.js";
import { parseOrReport, resolveJobs } from "./args.js";
import { printDetail, printFailure, printHeader, printSuccess } from "./output.js";

const HELP = `
Usage: bindforge-install --build-path <dir> (--binder-branch <b> | --binder-source <dir>) [options]

  Binder has no default; --binder-branch ${SUGGESTED_BINDER_BRANCH} tracks upstream.

Options:
  --pybind11-sha <sha> | --pybind11-source <dir>
  --llvm-version <tag> | --llvm-source <dir>
  --compiler <clang|gcc>      Compiler for the first bootstrap pass (default: clang)
  --build-mode <mode>         Release|Debug|MinSizeRel|RelWithDebInfo (default: Release)
  -j, --jobs <n>              Build jobs, 0 = number of CPUs (default: 1)
  --prepare-only              Stage sources without building
  --pybind11-git-url <url>    Override the pybind11 remote
  --binder-git-url <url>      Override the Binder remote
  --llvm-git-url <url>        Override the LLVM remote
  -h, --help                  Show this help message
`;

export function parseInstallArgs(argv: string[]) {
  return parseOrReport(
    () =>
      parseArgs({
        args: argv,
        options: {
          "build-path": { type: "string" },
          "binder-branch": { type: "string" },
          "binder-source": { type: "string" },
          "pybind11-sha": { type: "string" },
          "pybind11-source": { type: "string" },
          "llvm-version": { type: "string" },
          "llvm-source": { type: "string" },
          compiler: { type: "string" },
          "build-mode": { type: "string" },
          jobs: { type: "string", short: "j" },
          "prepare-only": { type: "boolean", default: false },
          "pybind11-git-url": { type: "string" },
          "binder-git-url": { type: "string" },
          "llvm-git-url": { type: "string" },
          help: { type: "boolean", short: "h", default: false },
        },
      }).values
  );
}

type InstallArgs = ReturnType<typeof parseInstallArgs>;

/** Enum-valued fields stay plain strings until the schema checks them */
export type RawInstallInput = Omit<InstallConfigInput, "compiler" | "buildMode"> & {
  compiler?: string;
  buildMode?: string;
};

/**
 * Turn parsed flags into raw install configuration. Flags win over the
 * environment for remotes; pinned defaults apply only when neither a
 * version nor a source was given.
 */
export function buildInstallInput(
  values: InstallArgs,
  remotes: AppConfig["remotes"]
): RawInstallInput {
  return {
    buildPath: values["build-path"] ?? "",
    binder: { version: values["binder-branch"], source: values["binder-source"] },
    pybind11: withDefaultVersion(
      { version: values["pybind11-sha"], source: values["pybind11-source"] },
      SUPPORTED_PYBIND11_SHA
    ),
    llvm: withDefaultVersion(
      { version: values["llvm-version"], source: values["llvm-source"] },
      SUGGESTED_LLVM_RELEASE
    ),
    compiler: values.compiler,
    buildMode: values["build-mode"],
    jobs: resolveJobs(values.jobs, 1),
    prepareOnly: values["prepare-only"],
    remotes: {
      pybind11: values["pybind11-git-url"] ?? remotes.pybind11,
      binder: values["binder-git-url"] ?? remotes.binder,
      llvm: values["llvm-git-url"] ?? remotes.llvm,
    },
  };
}

function main(): number {
  const runId = initRunId("install");

  let app: AppConfig;
  try {
    app = loadAppConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.format());
      return 1;
    }
    throw err;
  }

  const logger = createLogger({ level: app.logLevel, logDir: app.logDir, file: app.logToFile });

  try {
    const values = parseInstallArgs(process.argv.slice(2));
    if (values.help) {
      console.log(HELP);
      return 0;
    }

    const config = loadInstallConfig(buildInstallInput(values, app.remotes));
    logger.info("Install starting", {
      runId,
      buildPath: config.buildPath,
      compiler: config.compiler,
      buildMode: config.buildMode,
      jobs: config.jobs,
    });

    const orchestrator = InstallationOrchestrator.fromConfig(config, {
      runner: new SpawnProcessRunner(logger),
      logger,
    });

    printHeader("bindforge install");
    if (config.prepareOnly) {
      orchestrator.prepare();
      printSuccess("prepare", `sources staged under ${config.buildPath}`);
      return 0;
    }

    const result = orchestrator.install();
    printSuccess("install", `wrote ${result.envfilePath}`);
    for (const { key, value } of result.descriptor.toEntries()) {
      printDetail(`${key}=${value}`);
    }
    return 0;
  } catch (err) {
    if (err instanceof BindforgeError) {
      logger.error(err.format());
      printFailure(err.step ?? "install", err.message);
      return 1;
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("install.ts") ||
   process.argv[1].endsWith("install.js") ||
   process.argv[1].endsWith("bindforge-install"));

if (isDirectExecution) {
  process.exitCode = main();
}
