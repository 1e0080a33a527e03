// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/** How the datastores of a snapshot were captured. Recorded once at backup time and read back on restore. */
export type BackupStrategy = 'rsync' | 'tarball' | 'cluster';

export const BACKUP_STRATEGIES: readonly BackupStrategy[] = ['rsync', 'tarball', 'cluster'];

export function parseBackupStrategy(text: string): BackupStrategy {
  const value: string = text.trim();
  const strategy: BackupStrategy | undefined = BACKUP_STRATEGIES.find((candidate): boolean => candidate === value);
  if (!strategy) {
    throw new IllegalArgumentError(`Unknown backup strategy '${value}'`, value);
  }
  return strategy;
}
