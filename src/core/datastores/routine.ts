// SPDX-License-Identifier: Apache-2.0

import {type RemoteTarget} from '../topology/remote-target.js';
import {type Snapshot} from '../snapshot/snapshot.js';
import {type BackupStrategy} from '../snapshot/backup-strategy.js';
import {type StepName} from './datastore-step.js';

/** What a datastore routine is given to work with. */
export interface RoutineContext {
  /** The externally reachable host; the entry host of any tunnel. */
  readonly target: RemoteTarget;
  readonly snapshot: Snapshot;
  readonly isCluster: boolean;
  readonly strategy: BackupStrategy;
  /** Backups only: the committed snapshot unchanged content is linked against. */
  readonly dedupBase?: string;
}

export type Routine = (context: RoutineContext) => Promise<void>;

/** `any` routines apply whatever strategy the snapshot was taken with. */
export type RoutineKey = BackupStrategy | 'any';

export type RoutineTable = Partial<Record<StepName, Partial<Record<RoutineKey, Routine>>>>;

export interface RoutineSource {
  table(): RoutineTable;
}
