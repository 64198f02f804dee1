/**
 * Toolchain installation: source selection, staged installers, the
 * two-pass LLVM bootstrap and the environment descriptor.
 */

export { SourceSpec } from "./source-spec.js";
export {
  resolveBuildConfiguration,
  cmakeCompilerArgs,
  cmakeArgsFor,
  type BuildConfiguration,
} from "./compile-options.js";
export {
  BaseInstaller,
  type StagedInstaller,
  type InstallerState,
  type InstallerKind,
  type InstallerContext,
  type EnvironmentEntry,
} from "./staged-installer.js";
export {
  FINGERPRINT_FILE,
  checkFingerprint,
  writeFingerprint,
  discardIfStale,
  type Fingerprint,
  type FingerprintStatus,
} from "./fingerprint.js";
export { Pybind11Installer, PYBIND11_INCLUDE_DIR_KEY, PYBIND11_SHA_KEY } from "./pybind11.js";
export { BinderInstaller, BINDER_SOURCE_DIR_KEY, BINDER_VERSION_KEY } from "./binder.js";
export {
  LLVMBootstrapInstaller,
  LLVM_BIN_DIR_KEY,
  LLVM_VERSION_KEY,
  LLVM_CMAKE_FLAGS,
  LLVM_INSTALL_TARGETS,
} from "./llvm.js";
export { EnvironmentDescriptor, ENVFILE_NAME } from "./environment.js";
export {
  InstallationOrchestrator,
  createInstallers,
  type InstallationResult,
} from "./orchestrator.js";
