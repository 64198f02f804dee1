/**
 * Enumerations for toolchain and build configuration.
 */

import { z } from "zod";

/**
 * Compiler families usable for the first bootstrap pass.
 * The second pass always uses the clang that the first pass installed.
 */
export const CompilerFamily = z.enum(["clang", "gcc"]);
export type CompilerFamily = z.infer<typeof CompilerFamily>;

/**
 * CMake build types accepted for the toolchain build.
 */
export const BuildMode = z.enum(["Release", "Debug", "MinSizeRel", "RelWithDebInfo"]);
export type BuildMode = z.infer<typeof BuildMode>;

/**
 * C and C++ driver names for each compiler family.
 */
export const KNOWN_COMPILERS: Record<CompilerFamily, { cc: string; cxx: string }> = {
  clang: { cc: "clang", cxx: "clang++" },
  gcc: { cc: "gcc", cxx: "g++" },
};
