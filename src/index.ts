/**
 * bindforge: bootstrap a Clang/Binder toolchain and build pybind11
 * extension modules with it.
 */

export * from "./errors/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./install/index.js";
export * from "./generate/index.js";
export {
  SpawnProcessRunner,
  runChecked,
  EXIT_NOT_STARTED,
  type ProcessRunner,
  type CommandSpec,
  type CommandResult,
} from "./process/runner.js";
export { findExecutable } from "./process/which.js";
