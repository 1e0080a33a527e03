// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type SnapshotStore} from '../snapshot/snapshot-store.js';
import {type Snapshot} from '../snapshot/snapshot.js';
import {type BackupStrategy} from '../snapshot/backup-strategy.js';
import {type ApplianceFacts, type ApplianceProbe} from '../appliance/appliance-probe.js';
import {type CleanupScope, type ScopedCleanup} from '../lifecycle/scoped-cleanup.js';
import {type BackupConfigRuntimeState} from '../config/backup-config-runtime-state.js';
import {type BackupConfigSchema} from '../../data/schema/model/config/backup-config-schema.js';
import {RemoteTarget} from '../topology/remote-target.js';
import {type DatastoreDispatcher} from '../datastores/datastore-dispatcher.js';
import {type StepName} from '../datastores/datastore-step.js';
import {type ResolvedStep, runStepTasks} from '../datastores/step-tasks.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {PreconditionError} from '../errors/precondition-error.js';
import {type BackupSession, buildBackupPlan} from './backup-plan.js';

export interface BackupResult {
  readonly snapshot: Snapshot;
  readonly strategy: BackupStrategy;
  readonly executedSteps: readonly StepName[];
  /** Locally written files replaced by a link into the previous snapshot. */
  readonly linkedFiles: number;
  readonly uniqueBytes: number;
  readonly pruned: readonly string[];
}

/**
 * Takes a snapshot of the configured appliance. The snapshot only becomes `current` once every datastore has been
 * written; a failure or an interrupt removes it again.
 */
@injectable()
export class BackupOrchestrator {
  private readonly logger: StrongboxLogger;
  private readonly store: SnapshotStore;
  private readonly probe: ApplianceProbe;
  private readonly dispatcher: DatastoreDispatcher;
  private readonly cleanup: ScopedCleanup;
  private readonly configState: BackupConfigRuntimeState;
  private readonly silent: boolean;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.SnapshotStore) store?: SnapshotStore,
    @inject(InjectTokens.ApplianceProbe) probe?: ApplianceProbe,
    @inject(InjectTokens.DatastoreDispatcher) dispatcher?: DatastoreDispatcher,
    @inject(InjectTokens.ScopedCleanup) cleanup?: ScopedCleanup,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
    @inject(InjectTokens.SilentTasks) silent?: boolean,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.store = patchInject(store, InjectTokens.SnapshotStore, this.constructor.name);
    this.probe = patchInject(probe, InjectTokens.ApplianceProbe, this.constructor.name);
    this.dispatcher = patchInject(dispatcher, InjectTokens.DatastoreDispatcher, this.constructor.name);
    this.cleanup = patchInject(cleanup, InjectTokens.ScopedCleanup, this.constructor.name);
    this.configState = patchInject(configState, InjectTokens.BackupConfigRuntimeState, this.constructor.name);
    this.silent = patchInject(silent, InjectTokens.SilentTasks, this.constructor.name);
  }

  public static chooseStrategy(facts: ApplianceFacts): BackupStrategy {
    if (facts.isCluster) {
      return 'cluster';
    }
    return facts.version.isLegacy ? 'tarball' : 'rsync';
  }

  public async run(): Promise<BackupResult> {
    const config: BackupConfigSchema = this.configState.config;
    if (!config.hostname) {
      throw new IllegalArgumentError('No hostname to back up; set hostname in strongbox.yaml or STRONGBOX_HOSTNAME');
    }
    const target: RemoteTarget = RemoteTarget.parse(config.hostname, config.sshPort);
    const facts: ApplianceFacts = await this.probe.probe(target);
    if (!facts.version.isSupported()) {
      throw new PreconditionError(
        `${target.host} runs ${facts.version}, which this version of strongbox cannot back up`,
      );
    }
    const strategy: BackupStrategy = BackupOrchestrator.chooseStrategy(facts);

    return this.cleanup.run(async (scope: CleanupScope): Promise<BackupResult> => {
      const started: Snapshot = this.store.begin();
      scope.register('partial-snapshot', (): void => this.store.abort(started));
      this.store.lock(started.id);
      scope.register('snapshot-lock', (): void => this.store.unlock());

      const snapshot: Snapshot = this.store.writeMetadata(started, strategy, facts.version.toString());
      const session: BackupSession = {target, snapshot, strategy, isCluster: facts.isCluster, hasUuid: facts.hasUuid};
      const steps: ResolvedStep[] = buildBackupPlan(session).map(
        (step): ResolvedStep => ({
          name: step.name,
          title: `Back up ${step.name}`,
          routine: this.dispatcher.backupRoutineFor(step.name, session),
        }),
      );

      const executedSteps: StepName[] = await runStepTasks(
        steps,
        {target, snapshot, isCluster: facts.isCluster, strategy, dedupBase: this.store.dedupBase()},
        this.logger,
        this.silent,
      );

      const linkedFiles: number = this.store.linkUnchanged(snapshot);
      const committed: Snapshot = this.store.commit(snapshot);
      scope.release('partial-snapshot');

      const uniqueBytes: number = this.store.uniqueBytes(committed);
      this.logger.showUser(`Snapshot ${committed.id} of ${target.host} committed (${uniqueBytes} new bytes)`);
      return {snapshot: committed, strategy, executedSteps, linkedFiles, uniqueBytes, pruned: this.prune(config)};
    });
  }

  /** Best-effort: a snapshot that cannot be pruned now is pruned by a later run. */
  private prune(config: BackupConfigSchema): string[] {
    try {
      return this.store.prune(config.numSnapshots);
    } catch (error) {
      this.logger.warn('unable to prune old snapshots', error);
      return [];
    }
  }
}
