/**
 * Run configuration module.
 *
 * Usage:
 *   import { loadInstallConfig } from "./config/build/index.js";
 *
 *   const config = loadInstallConfig({
 *     buildPath: "/build",
 *     binder: { version: "master" },
 *     pybind11: { version: SUPPORTED_PYBIND11_SHA },
 *     llvm: { source: "/src/llvm-project" },
 *   });
 */

export { CompilerFamily, BuildMode, KNOWN_COMPILERS } from "./enums.js";

export type {
  SourceSelection,
  Remotes,
  LinkerConfig,
  InstallConfig,
  InstallConfigInput,
  GenerateConfig,
  GenerateConfigInput,
  ContainerConfig,
} from "./schema.js";

export {
  SourceSelectionSchema,
  InstallConfigSchema,
  GenerateConfigSchema,
  ContainerConfigSchema,
} from "./schema.js";

export {
  loadInstallConfig,
  loadGenerateConfig,
  loadContainerConfig,
  withDefaultVersion,
  formatZodIssues,
} from "./loader.js";

export {
  SUPPORTED_PYBIND11_SHA,
  SUGGESTED_LLVM_RELEASE,
  SUGGESTED_BINDER_BRANCH,
  DEFAULT_REMOTES,
  DEFAULT_LINKER_CONFIG,
  DEFAULT_DOCKER_IMAGE,
  CONTAINER_PYBIND11_SOURCE,
} from "./defaults.js";
