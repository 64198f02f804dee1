/**
 * Containerized generation: re-run the same generate command as
 * `lbuild` inside an image that already has the toolchain, Binder and
 * pybind11 installed. The working directory is mounted at the same path
 * so every relative argument still resolves.
 */

import { CONTAINER_PYBIND11_SOURCE } from "../config/build/defaults.js";
import type { ContainerConfig } from "../config/build/schema.js";
import type { Logger } from "../logging/index.js";
import { runChecked, type CommandSpec, type ProcessRunner } from "../process/runner.js";

/** Entry point name inside the image */
export const CONTAINER_ENTRYPOINT = "bindforge-generate";

const DOCKER_IMAGE_FLAG = "--docker-image";

/**
 * Rewrite `dbuild` arguments for the in-container `lbuild` run: the mode
 * is switched and the image selection is dropped.
 */
export function toLocalBuildArgs(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === "dbuild") {
      out.push("lbuild");
    } else if (arg === DOCKER_IMAGE_FLAG) {
      i++; // skip its value
    } else if (!arg.startsWith(`${DOCKER_IMAGE_FLAG}=`)) {
      out.push(arg);
    }
  }
  return out;
}

export function buildContainerCommand(argv: readonly string[], config: ContainerConfig): CommandSpec {
  return {
    command: "docker",
    args: [
      "run",
      "--workdir",
      config.workdir,
      "-v",
      `${config.workdir}:${config.workdir}`,
      "-t",
      config.dockerImage,
      CONTAINER_ENTRYPOINT,
      ...toLocalBuildArgs(argv),
      "--pybind11-source",
      CONTAINER_PYBIND11_SOURCE,
      "--binder-executable",
      "binder",
    ],
  };
}

export function runInContainer(
  runner: ProcessRunner,
  argv: readonly string[],
  config: ContainerConfig,
  logger?: Logger
): void {
  runChecked(runner, "generate:container", buildContainerCommand(argv, config), logger);
}
