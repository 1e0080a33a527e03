// SPDX-License-Identifier: Apache-2.0

export interface RestoreOptions {
  readonly host: string;
  /** Skip the confirmation prompt. */
  readonly force: boolean;
  /** Restore settings and license even onto a configured target. */
  readonly restoreSettings: boolean;
  /** Defaults to the current snapshot. */
  readonly snapshotId?: string;
}
