// SPDX-License-Identifier: Apache-2.0

import {type RemoteTarget} from '../topology/remote-target.js';
import {type CommittedSnapshot} from '../snapshot/snapshot.js';
import {type BackupStrategy} from '../snapshot/backup-strategy.js';
import {type ApplianceVersion} from '../appliance/appliance-version.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {canTransition, RestoreState} from './restore-state.js';

/**
 * Everything known about one restore of one snapshot onto one target. The target facts are filled in while
 * validating and are not re-read afterwards.
 */
export class RestoreSession {
  public remoteVersion?: ApplianceVersion;
  public isCluster: boolean = false;
  public isConfigured: boolean = false;
  public isReplica: boolean = false;
  public restoreSettings: boolean = false;

  private _state: RestoreState = RestoreState.INIT;
  private readonly _history: RestoreState[] = [RestoreState.INIT];

  public constructor(
    public readonly target: RemoteTarget,
    public readonly snapshot: CommittedSnapshot,
    public readonly hasUuid: boolean,
  ) {}

  public get host(): string {
    return this.target.host;
  }

  /** Recorded in the snapshot at backup time; never re-derived from the target. */
  public get strategy(): BackupStrategy {
    return this.snapshot.strategy;
  }

  public get state(): RestoreState {
    return this._state;
  }

  public get history(): readonly RestoreState[] {
    return this._history;
  }

  public transitionTo(next: RestoreState): void {
    if (!canTransition(this._state, next)) {
      throw new IllegalArgumentError(`Invalid restore state transition ${this._state} -> ${next}`, next);
    }
    this._state = next;
    this._history.push(next);
  }
}
