/**
 * Executable lookup on PATH.
 */

import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join, resolve, sep } from "node:path";

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve `name` the way a shell would: names containing a path
 * separator are checked as paths, bare names are searched on PATH.
 *
 * @returns the executable's path, or undefined if none is found
 */
export function findExecutable(
  name: string,
  pathEnv: string = process.env.PATH ?? ""
): string | undefined {
  if (isAbsolute(name) || name.includes(sep) || name.includes("/")) {
    const path = resolve(name);
    return isExecutableFile(path) ? path : undefined;
  }
  for (const dir of pathEnv.split(delimiter)) {
    if (dir === "") {
      continue;
    }
    const candidate = join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
