// SPDX-License-Identifier: Apache-2.0

import {coerce, gte, type SemVer} from 'semver';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import * as constants from '../constants.js';

/** An appliance release, e.g. `2.6.3`, or `11.10.344` on the legacy line. */
export class ApplianceVersion {
  private constructor(
    public readonly text: string,
    private readonly semver: SemVer,
  ) {}

  public static parse(text: string): ApplianceVersion {
    const trimmed: string = text.trim();
    const semver: SemVer | null = coerce(trimmed);
    if (!trimmed || !semver) {
      throw new IllegalArgumentError(`Unrecognised appliance version '${trimmed}'`, trimmed);
    }
    return new ApplianceVersion(trimmed, semver);
  }

  public get major(): number {
    return this.semver.major;
  }

  public get isLegacy(): boolean {
    return this.semver.major === constants.LEGACY_MAJOR_VERSION;
  }

  public isAtLeast(minimum: string): boolean {
    return gte(this.semver, minimum);
  }

  /** Whether backups and restores of this release are supported at all. */
  public isSupported(): boolean {
    return this.isLegacy
      ? this.isAtLeast(constants.MINIMUM_SUPPORTED_LEGACY_VERSION)
      : this.isAtLeast(constants.MINIMUM_SUPPORTED_VERSION);
  }

  /** Whether a snapshot taken from this release can be restored onto a cluster. */
  public supportsClusterRestore(): boolean {
    return !this.isLegacy && this.isAtLeast(constants.MINIMUM_CLUSTER_SNAPSHOT_VERSION);
  }

  public toString(): string {
    return this.text;
  }
}
