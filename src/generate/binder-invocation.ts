/**
 * Running Binder and reading back the list of files it generated.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { MissingArtifactError, NameCollisionError } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import { runChecked, type ProcessRunner } from "../process/runner.js";

export interface BinderInvocation {
  binderExecutable: string;
  /** Python module name, passed as --root-module */
  moduleName: string;
  /** Where Binder writes its sources (--prefix) */
  outputDirectory: string;
  configFile: string;
  /** The include closure header */
  allIncludesFile: string;
  extraFlags: readonly string[];
  /** Absolute include directories for the compiler invocation */
  includeDirectories: readonly string[];
}

/**
 * Split a whitespace-separated flag string ("--trace --annotate-includes").
 */
export function splitFlags(flags: string): string[] {
  return flags.split(/\s+/).filter((flag) => flag.length > 0);
}

export function buildBinderArgs(invocation: BinderInvocation): string[] {
  return [
    "--root-module",
    invocation.moduleName,
    "--prefix",
    invocation.outputDirectory,
    ...invocation.extraFlags,
    "--config",
    invocation.configFile,
    invocation.allIncludesFile,
    "--",
    "-std=c++11",
    ...invocation.includeDirectories.map((dir) => `-I${dir}`),
    "-DNDEBUG",
    "-v",
  ];
}

export function manifestPath(outputDirectory: string, moduleName: string): string {
  return join(outputDirectory, `${moduleName}.sources`);
}

/**
 * Parse a generated-source manifest. Entries are trimmed and blank lines
 * skipped.
 *
 * @throws NameCollisionError on the first duplicated entry
 */
export function parseSourceManifest(text: string, moduleName: string): string[] {
  const seen = new Set<string>();
  const sources: string[] = [];
  for (const line of text.split("\n")) {
    const entry = line.trim();
    if (entry === "") {
      continue;
    }
    if (seen.has(entry)) {
      throw new NameCollisionError(moduleName, entry, "generate:manifest");
    }
    seen.add(entry);
    sources.push(entry);
  }
  return sources;
}

/**
 * Read `<outputDirectory>/<module>.sources`.
 *
 * @throws MissingArtifactError if Binder did not write it
 * @throws NameCollisionError on a duplicated entry
 */
export function readSourceManifest(outputDirectory: string, moduleName: string): string[] {
  const path = manifestPath(outputDirectory, moduleName);
  if (!existsSync(path)) {
    throw new MissingArtifactError(
      path,
      `Binder finished but did not write its manifest ${path}`,
      "generate:manifest"
    );
  }
  return parseSourceManifest(readFileSync(path, "utf8"), moduleName);
}

/**
 * Run Binder once over the include closure and return the validated
 * manifest of generated sources.
 */
export function runBindingGenerator(
  runner: ProcessRunner,
  invocation: BinderInvocation,
  logger?: Logger
): string[] {
  runChecked(
    runner,
    "generate:binder",
    { command: invocation.binderExecutable, args: buildBinderArgs(invocation) },
    logger
  );
  const sources = readSourceManifest(invocation.outputDirectory, invocation.moduleName);
  logger?.info("Binder generated sources", { count: sources.length });
  return sources;
}
