/**
 * Tests for the installation orchestrator and the environment descriptor.
 *
 * Run: node --import tsx src/install/orchestrator.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { tmpdir } from "node:os";

import { ExternalToolFailure, MissingArtifactError, ValidationError } from "../errors/index.js";
import { loadInstallConfig } from "../config/index.js";
import { createSilentLogger } from "../logging/index.js";
import { RecordingProcessRunner } from "../process/recording-runner.js";
import { EnvironmentDescriptor, ENVFILE_NAME } from "./environment.js";
import { InstallationOrchestrator, createInstallers } from "./orchestrator.js";
import type { EnvironmentEntry, StagedInstaller } from "./staged-installer.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const TMP = mkdtempSync(join(tmpdir(), "bindforge-orchestrator-"));
const SHA = "32c4d7e17f267e10e71138a78d559b1eef17c909";
let counter = 0;

function touch(path: string, content = ""): void {
  mkdirSync(join(path, ".."), { recursive: true });
  writeFileSync(path, content);
}

/**
 * Runner whose git commands lay out what each real checkout contains.
 */
function toolchainRunner(): RecordingProcessRunner {
  return new RecordingProcessRunner()
    .on("git clone", (spec) => {
      const dest = spec.args[spec.args.length - 1] ?? "";
      if (basename(dest) === "binder") {
        const branch = spec.args[spec.args.indexOf("--branch") + 1] ?? "";
        touch(join(dest, "source", "binder.cpp"), `// ${branch}\n`);
      } else if (basename(dest) === "llvm-project") {
        touch(join(dest, "clang-tools-extra", "CMakeLists.txt"), "# tools\n");
      }
      return undefined;
    })
    .on("git checkout FETCH_HEAD", (spec) => {
      touch(join(spec.cwd ?? ".", "include", "pybind11", "pybind11.h"));
      return undefined;
    });
}

function setup(runner: RecordingProcessRunner, binderVersion = "v1", existingBuildPath?: string) {
  counter++;
  const buildPath = existingBuildPath ?? join(TMP, `${counter}-build`);
  const config = loadInstallConfig({
    buildPath,
    binder: { version: binderVersion },
    pybind11: { version: SHA },
    llvm: { version: "v2" },
    compiler: "gcc",
    jobs: 2,
    remotes: {
      binder: "/remotes/binder.git",
      pybind11: "/remotes/pybind11.git",
      llvm: "/remotes/llvm.git",
    },
    linker: { configDir: join(TMP, `${counter}-ld.so.conf.d`) },
  });
  const orchestrator = InstallationOrchestrator.fromConfig(config, {
    runner,
    logger: createSilentLogger(),
  });
  return { buildPath, orchestrator };
}

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════

section("Orchestrator — Full Install");

test("writes ENVFILE with every installer's contributions", () => {
  const runner = toolchainRunner();
  const { buildPath, orchestrator } = setup(runner);
  const result = orchestrator.install();

  assert.equal(result.envfilePath, join(buildPath, ENVFILE_NAME));
  assert.equal(
    readFileSync(result.envfilePath, "utf8"),
    [
      `BINDER_SOURCE_DIR=${join(buildPath, "binder", "source")}`,
      "BINDER_VERSION=v1",
      `PYBIND11_INCLUDE_DIR=${join(buildPath, "pybind11", "include")}`,
      `PYBIND11_SHA=${SHA}`,
      `LLVM_BIN_DIR=${join(buildPath, "llvm-project", "build2", "bin")}`,
      "LLVM_VERSION=v2",
    ]
      .map((line) => `${line}\n`)
      .join("")
  );
});

test("Binder and pybind11 are staged before LLVM is configured", () => {
  const runner = toolchainRunner();
  const { buildPath, orchestrator } = setup(runner);
  orchestrator.install();

  const binderClone = runner.indexOf(`git clone --depth 1 --branch v1 /remotes/binder.git ${join(buildPath, "binder")}`);
  const pybind11Fetch = runner.indexOf(`git fetch --depth 1 origin ${SHA}`);
  const llvmClone = runner.indexOf("git clone --depth 1 --branch v2 /remotes/llvm.git");
  const firstConfigure = runner.indexOf("cmake");
  assert.equal(binderClone, 0);
  assert.ok(binderClone < pybind11Fetch);
  assert.ok(pybind11Fetch < llvmClone);
  assert.ok(llvmClone < firstConfigure);
});

test("the jobs setting reaches ninja", () => {
  const runner = toolchainRunner();
  const { orchestrator } = setup(runner);
  orchestrator.install();
  const builds = runner.commandLines().filter((line) => line === "ninja -j 2");
  assert.equal(builds.length, 2);
});

test("ENVFILE reads back into the same descriptor", () => {
  const runner = toolchainRunner();
  const { orchestrator } = setup(runner);
  const result = orchestrator.install();
  const reread = EnvironmentDescriptor.readFrom(result.envfilePath);
  assert.deepEqual(reread.toEntries(), result.descriptor.toEntries());
  assert.equal(reread.require("LLVM_BIN_DIR"), result.descriptor.get("LLVM_BIN_DIR"));
});

section("Orchestrator — Prepare Only and Failures");

test("prepare stages sources and builds nothing", () => {
  const runner = toolchainRunner();
  const { buildPath, orchestrator } = setup(runner);
  orchestrator.prepare();
  assert.equal(runner.indexOf("cmake"), -1);
  assert.equal(runner.indexOf("ninja"), -1);
  assert.equal(existsSync(join(buildPath, "llvm-project", "clang-tools-extra", "binder", "binder.cpp")), true);
  assert.equal(existsSync(join(buildPath, ENVFILE_NAME)), false);
});

test("install after prepare does not stage again", () => {
  const runner = toolchainRunner();
  const { orchestrator } = setup(runner);
  orchestrator.prepare();
  const staged = runner.calls.length;
  orchestrator.install();
  assert.equal(runner.commandLines().slice(staged).filter((line) => line.startsWith("git")).length, 0);
});

test("a new Binder branch is copied into the toolchain tree", () => {
  const first = setup(toolchainRunner());
  first.orchestrator.prepare();
  const runner = toolchainRunner();
  const { buildPath, orchestrator } = setup(runner, "v3", first.buildPath);
  orchestrator.prepare();
  assert.equal(
    readFileSync(join(buildPath, "llvm-project", "clang-tools-extra", "binder", "binder.cpp"), "utf8"),
    "// v3\n"
  );
  assert.ok(runner.indexOf("git clone --depth 1 --branch v2 /remotes/llvm.git") > 0);
});

test("a failing second pass leaves no ENVFILE", () => {
  const runner = toolchainRunner();
  const { buildPath, orchestrator } = setup(runner);
  const build2 = join(buildPath, "llvm-project", "build2");
  runner.fail((spec) => spec.command === "ninja" && spec.cwd === build2 && spec.args.length > 2);
  assert.throws(
    () => orchestrator.install(),
    (err: unknown) => err instanceof ExternalToolFailure && err.step === "llvm:pass2:install"
  );
  assert.equal(existsSync(join(buildPath, ENVFILE_NAME)), false);
});

test("createInstallers orders binder, pybind11, llvm", () => {
  const config = loadInstallConfig({
    buildPath: join(TMP, "order"),
    binder: { version: "v1" },
    pybind11: { version: SHA },
    llvm: { version: "v2" },
  });
  const installers = createInstallers(config, { runner: new RecordingProcessRunner(), logger: createSilentLogger() });
  assert.deepEqual(
    installers.map((i) => [i.name, i.kind]),
    [
      ["binder", "generator"],
      ["pybind11", "generic-library"],
      ["llvm", "toolchain-bootstrap"],
    ]
  );
});

test("colliding keys from two installers abort before ENVFILE is written", () => {
  const fake = (name: string, entries: EnvironmentEntry[]): StagedInstaller => ({
    name,
    kind: "generic-library",
    state: "unprepared",
    prepare: () => undefined,
    install: () => entries,
  });
  const buildPath = join(TMP, "collide");
  const orchestrator = new InstallationOrchestrator(
    buildPath,
    [fake("a", [{ key: "SHARED", value: "1" }]), fake("b", [{ key: "SHARED", value: "2" }])],
    createSilentLogger()
  );
  assert.throws(
    () => orchestrator.install(),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.message === "Environment key SHARED from b collides with the one from a"
  );
  assert.equal(existsSync(join(buildPath, ENVFILE_NAME)), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT DESCRIPTOR
// ═══════════════════════════════════════════════════════════════════════════

section("Environment Descriptor");

test("entries keep insertion order", () => {
  const descriptor = new EnvironmentDescriptor();
  descriptor.add("B", "2", "x");
  descriptor.add("A", "1", "x");
  assert.deepEqual(descriptor.keys(), ["B", "A"]);
  assert.equal(descriptor.serialize(), "B=2\nA=1\n");
  assert.equal(descriptor.size, 2);
});

test("malformed keys are rejected", () => {
  const descriptor = new EnvironmentDescriptor();
  assert.throws(() => descriptor.add("1BAD", "x", "t"), ValidationError);
  assert.throws(() => descriptor.add("HAS SPACE", "x", "t"), ValidationError);
});

test("values with line breaks are rejected", () => {
  assert.throws(() => new EnvironmentDescriptor().add("KEY", "a\nb", "t"), ValidationError);
});

test("parse skips blank lines and comments and keeps '=' in values", () => {
  const descriptor = EnvironmentDescriptor.parse("# written by install\n\nFLAGS=-DA=1\nLLVM_BIN_DIR=/b/bin\n");
  assert.deepEqual(descriptor.toEntries(), [
    { key: "FLAGS", value: "-DA=1" },
    { key: "LLVM_BIN_DIR", value: "/b/bin" },
  ]);
});

test("parse reports the offending line", () => {
  assert.throws(
    () => EnvironmentDescriptor.parse("A=1\noops\n"),
    (err: unknown) => err instanceof ValidationError && err.message === 'ENVFILE:2: expected KEY=VALUE, got "oops"'
  );
});

test("parse rejects duplicate keys", () => {
  assert.throws(() => EnvironmentDescriptor.parse("A=1\nA=2\n"), ValidationError);
});

test("require names the missing key", () => {
  assert.throws(
    () => EnvironmentDescriptor.parse("A=1\n").require("LLVM_BIN_DIR"),
    (err: unknown) => err instanceof MissingArtifactError && err.message === "ENVFILE does not define LLVM_BIN_DIR"
  );
});

test("reading a missing file is a missing artifact", () => {
  assert.throws(() => EnvironmentDescriptor.readFrom(join(TMP, "nope", ENVFILE_NAME)), MissingArtifactError);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TMP, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
