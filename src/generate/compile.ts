/**
 * Configure, build and smoke-test the extension module.
 */

import { delimiter } from "node:path";
import type { Logger } from "../logging/index.js";
import { runChecked, type ProcessRunner } from "../process/runner.js";

export interface CompileOptions {
  /** CMake build directory; Binder's output lives here too */
  outputDirectory: string;
  /** CMake source directory holding CMakeLists.txt */
  projectRoot: string;
  moduleName: string;
  pythonExecutable: string;
  jobs?: number;
}

export interface VerifyResult {
  moduleName: string;
  /** What the interpreter printed for dir(module) */
  output: string;
}

/**
 * Ask the interpreter for its C header directory.
 */
export function resolvePythonIncludeDir(
  runner: ProcessRunner,
  pythonExecutable: string,
  logger?: Logger
): string {
  const result = runChecked(
    runner,
    "generate:python-include",
    {
      command: pythonExecutable,
      args: ["-c", "import sysconfig; print(sysconfig.get_paths()['include'])"],
      capture: true,
    },
    logger
  );
  return result.capturedOutput.trim();
}

export function importCheckScript(moduleName: string): string {
  return `import ${moduleName}; print(dir(${moduleName})); print(${moduleName})`;
}

/**
 * Build the module, then import it from a fresh interpreter.
 *
 * @throws ExternalToolFailure if configure, build or import fails
 */
export function compileAndVerify(
  runner: ProcessRunner,
  options: CompileOptions,
  logger?: Logger
): VerifyResult {
  runChecked(
    runner,
    "generate:configure",
    {
      command: "cmake",
      args: ["-G", "Ninja", "-DCMAKE_CXX_COMPILER=clang++", "-DCMAKE_C_COMPILER=clang", options.projectRoot],
      cwd: options.outputDirectory,
    },
    logger
  );

  const ninjaArgs = options.jobs !== undefined ? ["-v", "-j", String(options.jobs)] : ["-v"];
  runChecked(
    runner,
    "generate:build",
    { command: "ninja", args: ninjaArgs, cwd: options.outputDirectory },
    logger
  );

  logger?.info("Testing Python module", { module: options.moduleName });
  const pythonPath = [options.outputDirectory, process.env.PYTHONPATH]
    .filter((part): part is string => Boolean(part))
    .join(delimiter);
  const result = runChecked(
    runner,
    "generate:verify-import",
    {
      command: options.pythonExecutable,
      args: ["-c", importCheckScript(options.moduleName)],
      env: { PYTHONPATH: pythonPath },
      capture: true,
    },
    logger
  );

  return { moduleName: options.moduleName, output: result.capturedOutput.trim() };
}
