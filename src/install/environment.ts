/**
 * Environment descriptor (ENVFILE).
 *
 * The only hand-off between installation and generation: an ordered,
 * append-only set of KEY=VALUE lines. Keys are unique across installers;
 * a second contribution for the same key is a wiring defect.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { MissingArtifactError, ValidationError } from "../errors/index.js";
import type { EnvironmentEntry } from "./staged-installer.js";

export const ENVFILE_NAME = "ENVFILE";

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface StoredEntry {
  value: string;
  /** Installer that contributed the key */
  origin: string;
}

export class EnvironmentDescriptor {
  private readonly entries = new Map<string, StoredEntry>();

  /**
   * Append one entry.
   *
   * @throws ValidationError on a malformed or already-present key
   */
  add(key: string, value: string, origin = "unknown"): void {
    if (!KEY_PATTERN.test(key)) {
      throw new ValidationError(`Invalid environment key "${key}" from ${origin}`);
    }
    if (/[\r\n]/.test(value)) {
      throw new ValidationError(`Environment value for ${key} from ${origin} contains a line break`);
    }
    const existing = this.entries.get(key);
    if (existing) {
      throw new ValidationError(
        `Environment key ${key} from ${origin} collides with the one from ${existing.origin}`
      );
    }
    this.entries.set(key, { value, origin });
  }

  addAll(entries: readonly EnvironmentEntry[], origin: string): void {
    for (const entry of entries) {
      this.add(entry.key, entry.value, origin);
    }
  }

  get(key: string): string | undefined {
    return this.entries.get(key)?.value;
  }

  /**
   * Get a value that the generation side cannot do without.
   *
   * @throws MissingArtifactError if the key is absent
   */
  require(key: string, source = ENVFILE_NAME): string {
    const value = this.get(key);
    if (value === undefined) {
      throw new MissingArtifactError(source, `${source} does not define ${key}`);
    }
    return value;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  toEntries(): EnvironmentEntry[] {
    return [...this.entries].map(([key, { value }]) => ({ key, value }));
  }

  serialize(): string {
    return this.toEntries()
      .map(({ key, value }) => `${key}=${value}\n`)
      .join("");
  }

  writeTo(path: string): void {
    writeFileSync(path, this.serialize());
  }

  /**
   * Parse ENVFILE text. Blank lines and `#` comments are skipped; the
   * first `=` separates key from value. Unknown keys are kept.
   */
  static parse(text: string, origin = ENVFILE_NAME): EnvironmentDescriptor {
    const descriptor = new EnvironmentDescriptor();
    const lines = text.split(/\r?\n/);
    lines.forEach((line, index) => {
      if (line.trim() === "" || line.startsWith("#")) {
        return;
      }
      const eq = line.indexOf("=");
      if (eq <= 0) {
        throw new ValidationError(`${origin}:${index + 1}: expected KEY=VALUE, got "${line}"`);
      }
      descriptor.add(line.slice(0, eq), line.slice(eq + 1), origin);
    });
    return descriptor;
  }

  static readFrom(path: string): EnvironmentDescriptor {
    if (!existsSync(path)) {
      throw new MissingArtifactError(path, `Environment descriptor not found: ${path}`);
    }
    return EnvironmentDescriptor.parse(readFileSync(path, "utf8"), path);
  }
}
