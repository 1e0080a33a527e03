// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type BackupStrategy} from '../snapshot/backup-strategy.js';
import {StrongboxError} from '../errors/strongbox-error.js';
import {type StepName} from './datastore-step.js';
import {type Routine, type RoutineKey, type RoutineSource, type RoutineTable} from './routine.js';

/** The session facts a routine is selected by. */
export interface DispatchKey {
  readonly isCluster: boolean;
  readonly strategy: BackupStrategy;
}

/**
 * Table-driven selection of the routine for a step. The `cluster` routine wins whenever the target is a cluster,
 * then the routine of the snapshot's strategy, then the strategy-independent one.
 */
@injectable()
export class DatastoreDispatcher {
  private readonly logger: StrongboxLogger;
  private readonly restoreTable: RoutineTable;
  private readonly backupTable: RoutineTable;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RestoreRoutines) restoreRoutines?: RoutineSource,
    @inject(InjectTokens.BackupRoutines) backupRoutines?: RoutineSource,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.restoreTable = patchInject(restoreRoutines, InjectTokens.RestoreRoutines, this.constructor.name).table();
    this.backupTable = patchInject(backupRoutines, InjectTokens.BackupRoutines, this.constructor.name).table();
  }

  /** The strategy recorded in the snapshot at backup time. */
  public resolveStrategy(session: {readonly snapshot: {readonly strategy: BackupStrategy}}): BackupStrategy {
    return session.snapshot.strategy;
  }

  /** @throws StrongboxError when no routine covers the step for this key */
  public routineFor(step: StepName, key: DispatchKey): Routine {
    return this.lookup(this.restoreTable, 'restore', step, key);
  }

  /** @throws StrongboxError when no routine covers the step for this key */
  public backupRoutineFor(step: StepName, key: DispatchKey): Routine {
    return this.lookup(this.backupTable, 'backup', step, key);
  }

  private lookup(table: RoutineTable, direction: string, step: StepName, key: DispatchKey): Routine {
    const candidates: RoutineKey[] = key.isCluster ? ['cluster', key.strategy, 'any'] : [key.strategy, 'any'];
    const routines: Partial<Record<RoutineKey, Routine>> = table[step] ?? {};
    for (const candidate of candidates) {
      const routine: Routine | undefined = routines[candidate];
      if (routine) {
        this.logger.debug(`${direction} routine for ${step}: ${candidate}`);
        return routine;
      }
    }
    throw new StrongboxError(
      `No ${direction} routine for step '${step}' (${key.isCluster ? 'cluster' : 'standalone'}, ${key.strategy})`,
      undefined,
      {step, strategy: key.strategy, isCluster: key.isCluster},
    );
  }
}
