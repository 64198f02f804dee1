/**
 * Include closure collection.
 *
 * Binder is given a single header that includes everything the project
 * includes. The list is deduplicated and sorted so that it is identical
 * across runs and machines whatever order the filesystem lists files in.
 */

import { readFileSync, readdirSync, writeFileSync } from "node:fs";
import { extname, join } from "node:path";

/** Extensions scanned for include lines and compilation units */
export const SOURCE_EXTENSIONS: readonly string[] = [".hpp", ".cpp", ".h", ".hh", ".cc", ".c"];

export const INCLUDE_DIRECTIVE = "#include";

export const ALL_INCLUDES_FILE = "all_includes.hpp";

function walk(dir: string, out: string[]): void {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(path, out);
    } else if (entry.isFile() && SOURCE_EXTENSIONS.includes(extname(entry.name))) {
      out.push(path);
    }
  }
}

/**
 * List every C/C++ source and header under the given directories,
 * recursively. Paths keep the form the directories were given in.
 */
export function listProjectSourceFiles(projectSources: readonly string[]): string[] {
  const files: string[] = [];
  for (const dir of projectSources) {
    walk(dir, files);
  }
  return files;
}

/**
 * Extract include directives from one file's text.
 * Only lines that start with the directive count; indented ones do not.
 */
export function extractIncludes(text: string, ignoreWords: readonly string[]): string[] {
  return text
    .split("\n")
    .filter(
      (line) =>
        line.startsWith(INCLUDE_DIRECTIVE) && !ignoreWords.some((word) => line.includes(word))
    )
    .map((line) => line.trim());
}

/**
 * Collect the sorted, deduplicated include closure of a set of files.
 */
export function collectIncludeClosure(
  files: readonly string[],
  ignoreWords: readonly string[] = []
): string[] {
  const includes = new Set<string>();
  for (const file of files) {
    for (const include of extractIncludes(readFileSync(file, "utf8"), ignoreWords)) {
      includes.add(include);
    }
  }
  return [...includes].sort();
}

export function renderIncludeClosure(includes: readonly string[]): string {
  return includes.map((include) => `${include}\n`).join("");
}

export function writeIncludeClosure(path: string, includes: readonly string[]): void {
  writeFileSync(path, renderIncludeClosure(includes));
}
