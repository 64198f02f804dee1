/**
 * A resolved choice between a pinned version and a local source tree.
 */

import { ValidationError } from "../errors/index.js";
import type { SourceSelection } from "../config/build/schema.js";

export class SourceSpec {
  readonly pinnedVersion?: string;
  readonly localPath?: string;

  /**
   * @throws ValidationError unless exactly one of the two is non-empty
   */
  constructor(pinnedVersion?: string, localPath?: string) {
    if (pinnedVersion && localPath) {
      throw new ValidationError(
        `Must have only version OR source location, not both -- have version='${pinnedVersion}', source location='${localPath}'`
      );
    }
    if (!pinnedVersion && !localPath) {
      throw new ValidationError(
        "Must have only version OR source location, not neither -- both are empty"
      );
    }
    if (pinnedVersion) {
      this.pinnedVersion = pinnedVersion;
    } else {
      this.localPath = localPath;
    }
    Object.freeze(this);
  }

  static fromSelection(selection: SourceSelection): SourceSpec {
    return new SourceSpec(selection.version, selection.source);
  }

  get isLocal(): boolean {
    return this.localPath !== undefined;
  }

  /**
   * Provenance key: the pinned version verbatim, or FROM_SOURCE_<path>.
   * Never used as a filesystem location.
   */
  resolveIdentity(): string {
    return this.pinnedVersion ?? `FROM_SOURCE_${this.localPath ?? ""}`;
  }
}
