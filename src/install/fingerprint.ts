/**
 * Configuration fingerprints for materialized directories.
 *
 * A staged or built directory is only reused when it was produced from
 * the same inputs. Each one carries a small JSON file describing those
 * inputs; a directory whose fingerprint disagrees is discarded and
 * rebuilt. Directories without a fingerprint are trusted as-is.
 */

import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "../logging/index.js";

export const FINGERPRINT_FILE = ".bindforge-fingerprint";

export type Fingerprint = Record<string, string>;

export type FingerprintStatus = "absent" | "match" | "mismatch";

/**
 * Serialize with sorted keys so that equal inputs give equal text.
 */
export function serializeFingerprint(fingerprint: Fingerprint): string {
  const sorted = Object.keys(fingerprint)
    .sort()
    .map((key) => [key, fingerprint[key]]);
  return JSON.stringify(Object.fromEntries(sorted)) + "\n";
}

export function writeFingerprint(dir: string, fingerprint: Fingerprint): void {
  writeFileSync(join(dir, FINGERPRINT_FILE), serializeFingerprint(fingerprint));
}

export function checkFingerprint(dir: string, fingerprint: Fingerprint): FingerprintStatus {
  const path = join(dir, FINGERPRINT_FILE);
  if (!existsSync(path)) {
    return "absent";
  }
  return readFileSync(path, "utf8") === serializeFingerprint(fingerprint) ? "match" : "mismatch";
}

/**
 * Remove `dir` if it exists with a different fingerprint.
 *
 * @returns true when the directory was removed
 */
export function discardIfStale(dir: string, fingerprint: Fingerprint, logger: Logger): boolean {
  if (!existsSync(dir) || checkFingerprint(dir, fingerprint) !== "mismatch") {
    return false;
  }
  logger.warn("Discarding directory built from a different configuration", { dir });
  rmSync(dir, { recursive: true, force: true });
  return true;
}
