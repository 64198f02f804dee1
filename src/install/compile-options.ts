/**
 * Compiler selection and the CMake arguments derived from it.
 */

import { ValidationError } from "../errors/index.js";
import { BuildMode, CompilerFamily, KNOWN_COMPILERS } from "../config/build/enums.js";

export interface BuildConfiguration {
  readonly compilerFamily: CompilerFamily;
  readonly ccPath: string;
  readonly cxxPath: string;
  readonly buildMode: BuildMode;
}

/**
 * CMake arguments selecting compilers and build type. Empty values are
 * left out so CMake falls back to its own detection.
 */
export function cmakeCompilerArgs(cc: string, cxx: string, buildMode: string): string[] {
  const args: string[] = [];
  if (cc) {
    args.push(`-DCMAKE_C_COMPILER=${cc}`);
  }
  if (cxx) {
    args.push(`-DCMAKE_CXX_COMPILER=${cxx}`);
  }
  if (buildMode) {
    args.push(`-DCMAKE_BUILD_TYPE=${buildMode}`);
  }
  return args;
}

/**
 * Resolve a compiler family and build mode into a BuildConfiguration.
 *
 * @throws ValidationError for an unknown family or build mode
 */
export function resolveBuildConfiguration(compiler: string, buildMode: string): BuildConfiguration {
  const mode = BuildMode.safeParse(buildMode);
  if (!mode.success) {
    throw new ValidationError(
      `Build mode ${buildMode} not supported, we support ${BuildMode.options.join(", ")}`
    );
  }
  const family = CompilerFamily.safeParse(compiler);
  if (!family.success) {
    throw new ValidationError(
      `Compiler ${compiler} not supported, we support ${CompilerFamily.options.join(", ")}`
    );
  }
  const { cc, cxx } = KNOWN_COMPILERS[family.data];
  return Object.freeze({
    compilerFamily: family.data,
    ccPath: cc,
    cxxPath: cxx,
    buildMode: mode.data,
  });
}

/**
 * CMake arguments for a configuration's own compiler pair.
 */
export function cmakeArgsFor(config: BuildConfiguration): string[] {
  return cmakeCompilerArgs(config.ccPath, config.cxxPath, config.buildMode);
}
