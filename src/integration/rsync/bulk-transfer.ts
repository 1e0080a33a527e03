// SPDX-License-Identifier: Apache-2.0

import {type RemoteTarget} from '../../core/topology/remote-target.js';

/** `pull` copies from the remote host into `localPath`, `push` the other way. */
export type TransferDirection = 'pull' | 'push';

export interface TransferRequest {
  readonly target: RemoteTarget;
  readonly direction: TransferDirection;
  readonly localPath: string;
  readonly remotePath: string;
  /** A local directory holding the previous copy. Unchanged files are hard-linked from it instead of sent. */
  readonly dedupBase?: string;
  /** Remove destination files missing from the source. */
  readonly deleteExtraneous?: boolean;
  readonly configFile?: string;
}

/** Copies a directory tree between this host and a remote one, comparing content to skip unchanged files. */
export interface BulkTransfer {
  transfer(request: TransferRequest): Promise<void>;
}
