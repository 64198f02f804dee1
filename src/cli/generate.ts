#!/usr/bin/env node
/**
 * CLI command to generate, build and import-test Python bindings.
 *
 * Usage:
 *   npx tsx src/cli/generate.ts lbuild --output-directory out --module-name mylib \
 *     --project-sources src include --config-file mylib.config --pybind11-source /build/pybind11
 *   npx tsx src/cli/generate.ts lbuild ... --envfile /build/ENVFILE
 *   npx tsx src/cli/generate.ts dbuild ... --docker-image binder
 *
 * Modes:
 *   lbuild   Run locally with the given (or ENVFILE-provided) toolchain
 *   dbuild   Re-run this command as lbuild inside a container image
 *
 * Options:
 *   --output-directory <dir>                  Build/output directory (wiped first)
 *   --module-name <name>                      Python module name
 *   --project-sources <dir...>                Project source directories
 *   --source-directories-to-include <dir...>  Extra include directories
 *   --config-file <file>                      Binder config file
 *   --extra-binder-flags <flags>              e.g. "--trace --annotate-includes"
 *   --include-line-ignore-words <word...>     Drop include lines containing these
 *   --preinstall-script <file>                Shell script run before Binder
 *   --custom-all-includes-file <file>         Use this instead of collecting includes
 *   --pybind11-source <dir>                   pybind11 tree (lbuild)
 *   --binder-executable <path>                Binder (default: "binder" on PATH)
 *   --python <exe>                            Interpreter (default: python3)
 *   --envfile <file>                          Read pybind11/LLVM paths from an ENVFILE
 *   -j, --jobs <n>                            Build jobs, 0 = number of CPUs
 *   --docker-image <image>                    Image for dbuild (default: binder)
 *
 * Exit codes:
 *   0 - Module built and imported
 *   1 - Validation, generation, build or import failed
 */

import { dirname, join } from "node:path";
import { parseArgs } from "node:util";

import {
  ConfigError,
  loadAppConfig,
  loadContainerConfig,
  loadGenerateConfig,
  type AppConfig,
  type GenerateConfigInput,
} from "../config/index.js";
import { BindforgeError, MissingArtifactError, ValidationError } from "../errors/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { EnvironmentDescriptor } from "../install/environment.js";
import { LLVM_BIN_DIR_KEY } from "../install/llvm.js";
import { PYBIND11_INCLUDE_DIR_KEY } from "../install/pybind11.js";
import { runGenerationPipeline } from "../generate/pipeline.js";
import { runInContainer } from "../generate/container.js";
import { SpawnProcessRunner } from "../process/runner.js";
import { findExecutable } from "../process/which.js";
import { expandListOptions, parseOrReport, resolveJobs } from "./args.js";
import { printDetail, printFailure, printHeader, printSuccess } from "./output.js";

const LIST_OPTIONS = [
  "project-sources",
  "source-directories-to-include",
  "include-line-ignore-words",
] as const;

export type GenerateMode = "lbuild" | "dbuild";

const HELP = `
Usage: bindforge-generate <lbuild|dbuild> --output-directory <dir> --module-name <name>
         --project-sources <dir...> --config-file <file> [options]

Options:
  --source-directories-to-include <dir...>
  --extra-binder-flags <flags>
  --include-line-ignore-words <word...>
  --preinstall-script <file>
  --custom-all-includes-file <file>
  --pybind11-source <dir>          (lbuild; or --envfile)
  --binder-executable <path>       (lbuild; default: binder on PATH)
  --python <exe>                   (default: python3)
  --envfile <file>                 Take pybind11 and Binder paths from an ENVFILE
  -j, --jobs <n>                   Build jobs, 0 = number of CPUs
  --docker-image <image>           (dbuild; default: binder)
  -h, --help
`;

function isMode(value: string | undefined): value is GenerateMode {
  return value === "lbuild" || value === "dbuild";
}

export function parseGenerateArgs(argv: readonly string[]) {
  const { values, positionals } = parseOrReport(() =>
    parseArgs({
      args: expandListOptions(argv, LIST_OPTIONS),
      allowPositionals: true,
      options: {
        "output-directory": { type: "string" },
        "module-name": { type: "string" },
        "project-sources": { type: "string", multiple: true },
        "source-directories-to-include": { type: "string", multiple: true },
        "config-file": { type: "string" },
        "extra-binder-flags": { type: "string" },
        "include-line-ignore-words": { type: "string", multiple: true },
        "preinstall-script": { type: "string" },
        "custom-all-includes-file": { type: "string" },
        "pybind11-source": { type: "string" },
        "binder-executable": { type: "string" },
        python: { type: "string" },
        envfile: { type: "string" },
        jobs: { type: "string", short: "j" },
        "docker-image": { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    })
  );

  const mode = positionals[0];
  if (!values.help && !isMode(mode)) {
    throw new ValidationError(
      `Expected a mode (lbuild or dbuild) as first argument, got: ${mode ?? "(none)"}`,
      [],
      "cli"
    );
  }
  if (positionals.length > 1) {
    throw new ValidationError(`Unexpected arguments: ${positionals.slice(1).join(" ")}`, [], "cli");
  }
  return { mode: isMode(mode) ? mode : "lbuild", values };
}

type GenerateArgs = ReturnType<typeof parseGenerateArgs>["values"];

/**
 * Turn parsed flags into raw generate configuration. Explicit flags win
 * over ENVFILE values: pybind11 is the parent of PYBIND11_INCLUDE_DIR and
 * Binder lives in LLVM_BIN_DIR.
 */
export function buildGenerateInput(
  values: GenerateArgs,
  env?: EnvironmentDescriptor
): GenerateConfigInput {
  const pybind11Include = env?.get(PYBIND11_INCLUDE_DIR_KEY);
  const llvmBin = env?.get(LLVM_BIN_DIR_KEY);

  return {
    outputDirectory: values["output-directory"] ?? "",
    moduleName: values["module-name"] ?? "",
    projectSources: values["project-sources"] ?? [],
    sourceDirectoriesToInclude: values["source-directories-to-include"],
    configFile: values["config-file"] ?? "",
    extraBinderFlags: values["extra-binder-flags"],
    includeLineIgnoreWords: values["include-line-ignore-words"],
    preinstallScript: values["preinstall-script"],
    customAllIncludesFile: values["custom-all-includes-file"],
    pybind11Source:
      values["pybind11-source"] ?? (pybind11Include !== undefined ? dirname(pybind11Include) : ""),
    binderExecutable:
      values["binder-executable"] ?? (llvmBin !== undefined ? join(llvmBin, "binder") : undefined),
    pythonExecutable: values.python,
    jobs: values.jobs !== undefined ? resolveJobs(values.jobs, 1) : undefined,
  };
}

function main(): number {
  const runId = initRunId("generate");

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
  const argv = process.argv.slice(2);

  try {
    const { mode, values } = parseGenerateArgs(argv);
    if (values.help) {
      console.log(HELP);
      return 0;
    }

    const runner = new SpawnProcessRunner(logger);
    printHeader(`bindforge generate (${mode})`);

    if (mode === "dbuild") {
      const container = loadContainerConfig({
        dockerImage: values["docker-image"],
        workdir: process.cwd(),
      });
      runInContainer(runner, argv, container, logger);
      printSuccess("dbuild", `container run in ${container.dockerImage} finished`);
      return 0;
    }

    const env = values.envfile ? EnvironmentDescriptor.readFrom(values.envfile) : undefined;
    const config = loadGenerateConfig(buildGenerateInput(values, env));

    if (findExecutable(config.binderExecutable) === undefined) {
      throw new MissingArtifactError(
        config.binderExecutable,
        `Unable to find binder executable "${config.binderExecutable}" (checked PATH)`,
        "generate:validate"
      );
    }

    logger.info("Generate starting", {
      runId,
      module: config.moduleName,
      output: config.outputDirectory,
    });
    const result = runGenerationPipeline(config, { runner, logger });

    printSuccess("generate", `module ${config.moduleName} built and imported`);
    printDetail(`includes: ${result.allIncludesFile}`);
    printDetail(`generated sources: ${result.generatedSources.length}`);
    printDetail(`build description: ${result.buildDescriptionPath}`);
    console.log(result.verification.output);
    return 0;
  } catch (err) {
    if (err instanceof BindforgeError) {
      logger.error(err.format());
      printFailure(err.step ?? "generate", err.message);
      return 1;
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("generate.ts") ||
   process.argv[1].endsWith("generate.js") ||
   process.argv[1].endsWith("bindforge-generate"));

if (isDirectExecution) {
  process.exitCode = main();
}
