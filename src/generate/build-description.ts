/**
 * CMake project synthesis for the generated bindings.
 *
 * One static library per project compilation unit, plus one pybind11
 * module built from Binder's output and linked against all of them.
 */

import { writeFileSync } from "node:fs";
import { extname, join, relative, resolve } from "node:path";

export const BUILD_DESCRIPTION_FILE = "CMakeLists.txt";

export interface LibraryTarget {
  name: string;
  /** Source path relative to the CMake source directory */
  source: string;
  includeDirectories: readonly string[];
}

export interface ModuleTarget {
  name: string;
  /** Generated sources, relative to the build (output) directory */
  sources: readonly string[];
  includeDirectories: readonly string[];
  linkLibraries: readonly string[];
}

export interface BuildDescription {
  projectName: string;
  /** pybind11 source tree, added as a subproject */
  pybind11Source: string;
  libraries: readonly LibraryTarget[];
  module: ModuleTarget;
}

export interface BuildDescriptionInput {
  moduleName: string;
  /** Binder manifest entries */
  generatedSources: readonly string[];
  /** Every project source/header file found, relative to the cwd or absolute */
  projectSourceFiles: readonly string[];
  includeDirectories: readonly string[];
  pybind11Source: string;
  /** CMake source directory; project paths are made relative to it */
  projectRoot: string;
}

/**
 * Sources whose extension contains a "c" (.c, .cc, .cpp) are compiled;
 * headers are not.
 */
export function isCompilationUnit(path: string): boolean {
  return extname(path).includes("c");
}

/**
 * CMake target name for a source path: separators and dots become "_".
 */
export function libraryTargetName(path: string): string {
  return path.replace(/[/.]/g, "_");
}

export function synthesizeBuildDescription(input: BuildDescriptionInput): BuildDescription {
  const root = resolve(input.projectRoot);
  const libraries: LibraryTarget[] = input.projectSourceFiles
    .filter(isCompilationUnit)
    .map((file) => {
      const source = relative(root, resolve(file));
      return {
        name: libraryTargetName(source),
        source,
        includeDirectories: input.includeDirectories,
      };
    });

  return {
    projectName: input.moduleName,
    pybind11Source: input.pybind11Source,
    libraries,
    module: {
      name: input.moduleName,
      sources: input.generatedSources,
      includeDirectories: input.includeDirectories,
      linkLibraries: libraries.map((lib) => lib.name),
    },
  };
}

export function renderBuildDescription(description: BuildDescription): string {
  const lines: string[] = [
    "cmake_minimum_required(VERSION 3.4...3.18)",
    `project(${description.projectName})`,
    `add_subdirectory("${description.pybind11Source}" "\${CMAKE_CURRENT_BINARY_DIR}/pybind11_build")`,
    "",
  ];

  for (const lib of description.libraries) {
    lines.push(`add_library(${lib.name} STATIC \${CMAKE_SOURCE_DIR}/${lib.source})`);
    lines.push(`set_target_properties(${lib.name} PROPERTIES POSITION_INDEPENDENT_CODE ON)`);
    lines.push(`target_include_directories(${lib.name} PRIVATE ${lib.includeDirectories.join(" ")})`);
  }

  const { module } = description;
  const moduleSources = module.sources.map((src) => `\${CMAKE_CURRENT_BINARY_DIR}/${src}`);
  lines.push(`pybind11_add_module(${module.name} MODULE ${moduleSources.join(" ")})`);
  lines.push(`target_include_directories(${module.name} PRIVATE ${module.includeDirectories.join(" ")})`);
  lines.push(`set_target_properties(${module.name} PROPERTIES POSITION_INDEPENDENT_CODE ON)`);
  lines.push(`target_link_libraries(${module.name} PRIVATE ${module.linkLibraries.join(" ")})`);

  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Write CMakeLists.txt into `dir` and return its path.
 */
export function writeBuildDescription(description: BuildDescription, dir: string): string {
  const path = join(dir, BUILD_DESCRIPTION_FILE);
  writeFileSync(path, renderBuildDescription(description));
  return path;
}
