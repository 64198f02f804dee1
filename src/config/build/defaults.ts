/**
 * Default pinned versions, remotes and system paths.
 *
 * Callers override any of these through the run configuration; nothing
 * here is mutated at run time.
 */

/** pybind11 commit known to work with Binder's generated code */
export const SUPPORTED_PYBIND11_SHA = "32c4d7e17f267e10e71138a78d559b1eef17c909";

/** LLVM release tag the bootstrap is tested against */
export const SUGGESTED_LLVM_RELEASE = "llvmorg-13.0.1";

/** Binder branch to suggest when none is given */
export const SUGGESTED_BINDER_BRANCH = "master";

export const DEFAULT_REMOTES = {
  pybind11: "https://github.com/RosettaCommons/pybind11.git",
  binder: "https://github.com/RosettaCommons/binder.git",
  llvm: "https://github.com/llvm/llvm-project.git",
} as const;

/**
 * Where the freshly installed libc++ runtime is registered with the
 * dynamic linker between the two bootstrap passes.
 */
export const DEFAULT_LINKER_CONFIG = {
  configDir: "/etc/ld.so.conf.d",
  configFile: "libc2.conf",
  runtimeLibDir: "/usr/local/lib/x86_64-unknown-linux-gnu",
} as const;

/** Image used by the containerized generation mode */
export const DEFAULT_DOCKER_IMAGE = "binder";

/** Where the container image keeps its pybind11 checkout */
export const CONTAINER_PYBIND11_SOURCE = "/build/pybind11";
