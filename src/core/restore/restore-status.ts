// SPDX-License-Identifier: Apache-2.0

/** Values written to the remote status file. */
export type RestoreStatus = 'restoring' | 'failed' | 'complete';

/** What a reader of the status file may see; anything unrecognised, or no file, is `unknown`. */
export type ObservedRestoreStatus = RestoreStatus | 'unknown';

const STATUSES: readonly RestoreStatus[] = ['restoring', 'failed', 'complete'];

export function parseStatus(text: string | undefined): ObservedRestoreStatus {
  const value: string = (text ?? '').trim();
  return STATUSES.find((status): boolean => status === value) ?? 'unknown';
}
