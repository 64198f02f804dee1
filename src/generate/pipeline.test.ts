/**
 * End-to-end tests for the generation pipeline.
 *
 * Run: node --import tsx src/generate/pipeline.test.ts
 *
 * Python, Binder, cmake and ninja are replaced by a RecordingProcessRunner;
 * the Binder handler writes the manifest a real run would leave behind.
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  ExternalToolFailure,
  MissingArtifactError,
  NameCollisionError,
  ValidationError,
} from "../errors/index.js";
import { loadGenerateConfig, type GenerateConfigInput } from "../config/index.js";
import { createSilentLogger } from "../logging/index.js";
import { RecordingProcessRunner } from "../process/recording-runner.js";
import { runGenerationPipeline } from "./pipeline.js";

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

function touch(path: string, content = ""): void {
  mkdirSync(join(path, ".."), { recursive: true });
  writeFileSync(path, content);
}

const TMP = realpathSync(mkdtempSync(join(tmpdir(), "bindforge-pipeline-")));
const PYBIND11 = join(TMP, "pybind11");
const PYTHON_INCLUDE = "/usr/include/python3.11";
const IMPORT_OUTPUT = "['Point', '__doc__', '__name__']\n<module 'geometry'>\n";
let counter = 0;

interface Project {
  root: string;
  src: string;
  out: string;
}

function createProject(): Project {
  counter++;
  const root = join(TMP, `${counter}-project`);
  const src = join(root, "src");
  touch(join(src, "geometry", "point.hpp"), "#pragma once\n#include <vector>\n#include <string>\n");
  touch(join(src, "geometry", "point.cpp"), '#include "geometry/point.hpp"\n');
  touch(join(src, "trace.h"), '#include "debug_only/log.h"\n#include <vector>\n');
  touch(join(root, "geometry.config"), "+namespace geometry\n");
  return { root, src, out: join(root, "build") };
}

/**
 * Runner answering the interpreter queries and writing Binder's manifest.
 */
function toolRunner(manifest = "geometry.cpp\nstd/stl_vector.cpp\n"): RecordingProcessRunner {
  return new RecordingProcessRunner()
    .on('python3 -c "import sysconfig', () => ({ capturedOutput: `${PYTHON_INCLUDE}\n` }))
    .on('python3 -c "import geometry', () => ({ capturedOutput: IMPORT_OUTPUT }))
    .on("binder --root-module", (spec) => {
      const prefix = spec.args[3];
      if (prefix !== undefined) {
        writeFileSync(join(prefix, "geometry.sources"), manifest);
      }
      return undefined;
    });
}

function configFor(project: Project, overrides: Partial<GenerateConfigInput> = {}) {
  return loadGenerateConfig({
    outputDirectory: project.out,
    moduleName: "geometry",
    projectSources: [project.src],
    configFile: join(project.root, "geometry.config"),
    pybind11Source: PYBIND11,
    extraBinderFlags: "--trace",
    includeLineIgnoreWords: ["debug_only"],
    jobs: 3,
    ...overrides,
  });
}

function run(project: Project, runner: RecordingProcessRunner, overrides: Partial<GenerateConfigInput> = {}) {
  return runGenerationPipeline(configFor(project, overrides), {
    runner,
    logger: createSilentLogger(),
    projectRoot: project.root,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SUCCESS PATH
// ═══════════════════════════════════════════════════════════════════════════

section("Pipeline — Success");

test("runs interpreter, Binder, cmake, ninja and the import check in order", () => {
  const project = createProject();
  const runner = toolRunner();
  run(project, runner);
  assert.deepEqual(
    runner.calls.map((spec) => spec.command),
    ["python3", "binder", "cmake", "ninja", "python3"]
  );
});

test("writes the include closure into the output directory", () => {
  const project = createProject();
  const result = run(project, toolRunner());
  assert.equal(result.allIncludesFile, join(project.out, "all_includes.hpp"));
  assert.equal(result.includeCount, 3);
  assert.equal(
    readFileSync(result.allIncludesFile, "utf8"),
    '#include "geometry/point.hpp"\n#include <string>\n#include <vector>\n'
  );
});

test("Binder gets the module, prefix, flags and include directories", () => {
  const project = createProject();
  const runner = toolRunner();
  run(project, runner);
  const binder = runner.calls[1];
  assert.deepEqual(binder?.args, [
    "--root-module", "geometry",
    "--prefix", project.out,
    "--trace",
    "--config", join(project.root, "geometry.config"),
    join(project.out, "all_includes.hpp"),
    "--",
    "-std=c++11",
    `-I${project.src}`,
    `-I${PYTHON_INCLUDE}`,
    `-I${join(PYBIND11, "include")}`,
    "-DNDEBUG",
    "-v",
  ]);
});

test("CMakeLists.txt lands in the project root with one library per unit", () => {
  const project = createProject();
  const result = run(project, toolRunner());
  assert.equal(result.buildDescriptionPath, join(project.root, "CMakeLists.txt"));
  const lines = readFileSync(result.buildDescriptionPath, "utf8").split("\n");
  assert.equal(lines[2], `add_subdirectory("${PYBIND11}" "\${CMAKE_CURRENT_BINARY_DIR}/pybind11_build")`);
  assert.equal(lines[4], "add_library(src_geometry_point_cpp STATIC ${CMAKE_SOURCE_DIR}/src/geometry/point.cpp)");
  assert.equal(
    lines[7],
    "pybind11_add_module(geometry MODULE ${CMAKE_CURRENT_BINARY_DIR}/geometry.cpp ${CMAKE_CURRENT_BINARY_DIR}/std/stl_vector.cpp)"
  );
  assert.equal(lines[10], "target_link_libraries(geometry PRIVATE src_geometry_point_cpp)");
});

test("cmake and ninja run in the output directory", () => {
  const project = createProject();
  const runner = toolRunner();
  run(project, runner);
  const cmake = runner.calls[2];
  const ninja = runner.calls[3];
  assert.equal(cmake?.cwd, project.out);
  assert.deepEqual(cmake?.args, ["-G", "Ninja", "-DCMAKE_CXX_COMPILER=clang++", "-DCMAKE_C_COMPILER=clang", project.root]);
  assert.equal(ninja?.cwd, project.out);
  assert.deepEqual(ninja?.args, ["-v", "-j", "3"]);
});

test("the import check sees the output directory first on PYTHONPATH", () => {
  const project = createProject();
  const runner = toolRunner();
  const result = run(project, runner);
  const check = runner.calls[4];
  assert.deepEqual(check?.args, ["-c", "import geometry; print(dir(geometry)); print(geometry)"]);
  assert.ok(check?.env?.PYTHONPATH?.startsWith(project.out));
  assert.deepEqual(result.generatedSources, ["geometry.cpp", "std/stl_vector.cpp"]);
  assert.equal(result.verification.output, IMPORT_OUTPUT.trim());
});

test("the output directory is wiped first", () => {
  const project = createProject();
  touch(join(project.out, "stale.o"), "old");
  run(project, toolRunner());
  assert.equal(existsSync(join(project.out, "stale.o")), false);
});

test("a custom includes file replaces collection", () => {
  const project = createProject();
  const custom = join(project.root, "my_includes.hpp");
  touch(custom, "#include <vector>\n");
  const runner = toolRunner();
  const result = run(project, runner, { customAllIncludesFile: custom });
  assert.equal(result.allIncludesFile, custom);
  assert.equal(result.includeCount, undefined);
  assert.equal(existsSync(join(project.out, "all_includes.hpp")), false);
  assert.ok(runner.calls[1]?.args.includes(custom));
});

test("the preinstall script runs before anything else", () => {
  const project = createProject();
  const script = join(project.root, "setup.sh");
  touch(script, "exit 0\n");
  const runner = toolRunner();
  run(project, runner, { preinstallScript: script });
  assert.equal(runner.commandLines()[0], `sh ${script}`);
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Pipeline — Failures");

test("a duplicated manifest entry stops before cmake", () => {
  const project = createProject();
  const runner = toolRunner("geometry.cpp\ngeometry/point.cpp\ngeometry.cpp\n");
  assert.throws(
    () => run(project, runner),
    (err: unknown) => err instanceof NameCollisionError && err.duplicate === "geometry.cpp"
  );
  assert.equal(runner.indexOf("cmake"), -1);
  assert.equal(runner.indexOf("ninja"), -1);
  assert.equal(existsSync(join(project.root, "CMakeLists.txt")), false);
});

test("Binder failing is reported with its step", () => {
  const project = createProject();
  const runner = new RecordingProcessRunner()
    .on('python3 -c "import sysconfig', () => ({ capturedOutput: `${PYTHON_INCLUDE}\n` }))
    .fail("binder", 1, "error: unknown type name");
  assert.throws(
    () => run(project, runner),
    (err: unknown) => err instanceof ExternalToolFailure && err.step === "generate:binder"
  );
  assert.equal(runner.indexOf("cmake"), -1);
});

test("a failing preinstall script stops the run before the interpreter query", () => {
  const project = createProject();
  const script = join(project.root, "setup.sh");
  touch(script, "exit 3\n");
  const runner = toolRunner().fail("sh ", 3);
  assert.throws(
    () => run(project, runner, { preinstallScript: script }),
    (err: unknown) => err instanceof ExternalToolFailure && err.step === "generate:preinstall" && err.exitCode === 3
  );
  assert.deepEqual(runner.commandLines(), [`sh ${script}`]);
});

test("a failing cmake configure stops before ninja and the import check", () => {
  const project = createProject();
  const runner = toolRunner().fail("cmake", 1, "CMake Error: pybind11 not found");
  assert.throws(
    () => run(project, runner),
    (err: unknown) => err instanceof ExternalToolFailure && err.step === "generate:configure"
  );
  assert.deepEqual(
    runner.calls.map((spec) => spec.command),
    ["python3", "binder", "cmake"]
  );
});

test("a failing ninja build skips the import check", () => {
  const project = createProject();
  const runner = toolRunner().fail("ninja", 1, "error: undefined reference");
  assert.throws(
    () => run(project, runner),
    (err: unknown) => err instanceof ExternalToolFailure && err.step === "generate:build"
  );
  assert.deepEqual(
    runner.calls.map((spec) => spec.command),
    ["python3", "binder", "cmake", "ninja"]
  );
});

test("Binder exiting cleanly without a manifest is a missing artifact", () => {
  const project = createProject();
  const runner = new RecordingProcessRunner().on('python3 -c "import sysconfig', () => ({
    capturedOutput: `${PYTHON_INCLUDE}\n`,
  }));
  assert.throws(() => run(project, runner), MissingArtifactError);
});

test("a failing import check fails the run", () => {
  const project = createProject();
  const failing = new RecordingProcessRunner()
    .on('python3 -c "import sysconfig', () => ({ capturedOutput: `${PYTHON_INCLUDE}\n` }))
    .fail('python3 -c "import geometry', 1, "ImportError: undefined symbol")
    .on("binder --root-module", (spec) => {
      writeFileSync(join(spec.args[3] ?? ".", "geometry.sources"), "geometry.cpp\n");
      return undefined;
    });
  assert.throws(
    () => run(project, failing),
    (err: unknown) =>
      err instanceof ExternalToolFailure &&
      err.step === "generate:verify-import" &&
      err.output === "ImportError: undefined symbol"
  );
});

test("an output directory holding the project is refused", () => {
  const project = createProject();
  const runner = toolRunner();
  assert.throws(
    () => run(project, runner, { outputDirectory: TMP }),
    (err: unknown) => err instanceof ValidationError && err.step === "generate:validate"
  );
  assert.equal(runner.calls.length, 0);
  assert.equal(existsSync(project.src), true);
});

test("the project sources as output directory are refused", () => {
  const project = createProject();
  assert.throws(() => run(project, toolRunner(), { outputDirectory: project.src }), ValidationError);
  assert.equal(existsSync(join(project.src, "trace.h")), true);
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
