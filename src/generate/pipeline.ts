/**
 * Binding generation pipeline.
 *
 *   include closure ─▶ Binder ─▶ manifest check ─▶ CMakeLists.txt ─▶ cmake/ninja ─▶ import
 *
 * Each stage consumes the previous one's output; the first failure ends
 * the run. A name collision in the manifest is caught before anything is
 * compiled.
 */

import { mkdirSync, rmSync } from "node:fs";
import { join, relative, resolve, isAbsolute } from "node:path";
import { ValidationError } from "../errors/index.js";
import type { GenerateConfig } from "../config/build/schema.js";
import type { Logger } from "../logging/index.js";
import { runChecked, type ProcessRunner } from "../process/runner.js";
import { runBindingGenerator, splitFlags } from "./binder-invocation.js";
import { synthesizeBuildDescription, writeBuildDescription } from "./build-description.js";
import { compileAndVerify, resolvePythonIncludeDir, type VerifyResult } from "./compile.js";
import {
  ALL_INCLUDES_FILE,
  collectIncludeClosure,
  listProjectSourceFiles,
  writeIncludeClosure,
} from "./include-closure.js";

export interface GenerationContext {
  runner: ProcessRunner;
  logger: Logger;
  /** Directory CMakeLists.txt is written to; defaults to the cwd */
  projectRoot?: string;
}

export interface GenerationResult {
  allIncludesFile: string;
  /** Number of collected includes; undefined when a custom file was used */
  includeCount?: number;
  generatedSources: string[];
  buildDescriptionPath: string;
  verification: VerifyResult;
}

function isSameOrInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

/**
 * The output directory is wiped at the start of every run, so it must
 * not hold the project or the CMake source directory.
 */
function assertDisposableOutput(outputDirectory: string, protectedDirs: readonly string[]): void {
  for (const dir of protectedDirs) {
    if (isSameOrInside(outputDirectory, dir)) {
      throw new ValidationError(
        `Output directory ${outputDirectory} contains ${dir} and would be deleted`,
        [],
        "generate:validate"
      );
    }
  }
}

export function runGenerationPipeline(
  config: GenerateConfig,
  context: GenerationContext
): GenerationResult {
  const { runner } = context;
  const logger = context.logger.child("generate");
  const projectRoot = resolve(context.projectRoot ?? process.cwd());
  const outputDirectory = resolve(config.outputDirectory);

  assertDisposableOutput(outputDirectory, [
    projectRoot,
    ...config.projectSources.map((dir) => resolve(dir)),
  ]);

  if (config.preinstallScript) {
    runChecked(
      runner,
      "generate:preinstall",
      { command: "sh", args: [config.preinstallScript] },
      logger
    );
  }

  const pythonInclude = resolvePythonIncludeDir(runner, config.pythonExecutable, logger);
  const includeDirectories = [
    ...config.projectSources,
    pythonInclude,
    join(config.pybind11Source, "include"),
    ...config.sourceDirectoriesToInclude,
  ].map((dir) => resolve(dir));

  rmSync(outputDirectory, { recursive: true, force: true });
  mkdirSync(outputDirectory, { recursive: true });

  const projectSourceFiles = listProjectSourceFiles(config.projectSources);
  logger.info("Scanned project sources", { files: projectSourceFiles.length });

  let allIncludesFile: string;
  let includeCount: number | undefined;
  if (config.customAllIncludesFile) {
    allIncludesFile = resolve(config.customAllIncludesFile);
    logger.info("Using custom includes file", { path: allIncludesFile });
  } else {
    allIncludesFile = join(outputDirectory, ALL_INCLUDES_FILE);
    const includes = collectIncludeClosure(projectSourceFiles, config.includeLineIgnoreWords);
    writeIncludeClosure(allIncludesFile, includes);
    includeCount = includes.length;
    logger.info("Wrote include closure", { path: allIncludesFile, includes: includeCount });
  }

  const generatedSources = runBindingGenerator(
    runner,
    {
      binderExecutable: config.binderExecutable,
      moduleName: config.moduleName,
      outputDirectory,
      configFile: config.configFile,
      allIncludesFile,
      extraFlags: splitFlags(config.extraBinderFlags),
      includeDirectories,
    },
    logger
  );

  const description = synthesizeBuildDescription({
    moduleName: config.moduleName,
    generatedSources,
    projectSourceFiles,
    includeDirectories,
    pybind11Source: resolve(config.pybind11Source),
    projectRoot,
  });
  const buildDescriptionPath = writeBuildDescription(description, projectRoot);
  logger.info("Wrote build description", {
    path: buildDescriptionPath,
    libraries: description.libraries.length,
  });

  const verification = compileAndVerify(
    runner,
    {
      outputDirectory,
      projectRoot,
      moduleName: config.moduleName,
      pythonExecutable: config.pythonExecutable,
      jobs: config.jobs,
    },
    logger
  );
  logger.info("Module imported", { module: config.moduleName });

  return {
    allIncludesFile,
    includeCount,
    generatedSources,
    buildDescriptionPath,
    verification,
  };
}
