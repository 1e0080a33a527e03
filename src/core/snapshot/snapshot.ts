// SPDX-License-Identifier: Apache-2.0

import {type BackupStrategy} from './backup-strategy.js';

export interface Snapshot {
  readonly id: string;
  readonly path: string;
  readonly strategy?: BackupStrategy;
  readonly version?: string;
  /** The committed snapshot this one was linked against, when there was one. */
  readonly parentId?: string;
  readonly committed: boolean;
}

/** A committed snapshot whose metadata has been read back. */
export interface CommittedSnapshot extends Snapshot {
  readonly strategy: BackupStrategy;
  readonly version: string;
  readonly committed: true;
}
