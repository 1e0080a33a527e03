// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {MessageLevel} from '../logging/message-level.js';
import {type SnapshotStore} from '../snapshot/snapshot-store.js';
import {type CommittedSnapshot} from '../snapshot/snapshot.js';
import {type ApplianceFacts, type ApplianceProbe} from '../appliance/appliance-probe.js';
import {ApplianceVersion} from '../appliance/appliance-version.js';
import {type ConfirmationPrompt} from '../prompt/confirmation-prompt.js';
import {type CleanupScope, type ScopedCleanup} from '../lifecycle/scoped-cleanup.js';
import {type BackupConfigRuntimeState} from '../config/backup-config-runtime-state.js';
import {RemoteTarget} from '../topology/remote-target.js';
import {type DatastoreDispatcher} from '../datastores/datastore-dispatcher.js';
import {type DatastoreStep, type StepName} from '../datastores/datastore-step.js';
import {type RoutineContext} from '../datastores/routine.js';
import {type ResolvedStep, runStepTasks} from '../datastores/step-tasks.js';
import {PreconditionError} from '../errors/precondition-error.js';
import {VersionMismatchError} from '../errors/version-mismatch-error.js';
import {StepFailedError} from '../errors/step-failed-error.js';
import {type RemoteStatusReporter} from './remote-status-reporter.js';
import {RestoreSession} from './restore-session.js';
import {RestoreState} from './restore-state.js';
import {type RestoreOptions} from './restore-options.js';
import {buildRestorePlan} from './restore-plan.js';
import * as constants from '../constants.js';

export interface RestoreResult {
  readonly session: RestoreSession;
  readonly executedSteps: readonly StepName[];
  readonly warnings: readonly string[];
}

interface PlannedRestoreStep extends ResolvedStep {
  readonly step: DatastoreStep<RestoreSession>;
}

const DEFAULT_FAILURE: string = 'default-failure';

/**
 * Restores one snapshot onto one target.
 *
 * {@link prepare} walks the session from `init` to `validating` and through every gate; nothing on the target is
 * changed until all of them pass. {@link execute} then publishes `restoring`, arms a default `failed` outcome for
 * every exit path, and runs the restore steps in order, stopping at the first failure. Once `complete` is
 * published, the remaining steps (configuration apply, host keys) can no longer change the published status.
 */
@injectable()
export class RestoreOrchestrator {
  private readonly logger: StrongboxLogger;
  private readonly store: SnapshotStore;
  private readonly probe: ApplianceProbe;
  private readonly reporter: RemoteStatusReporter;
  private readonly dispatcher: DatastoreDispatcher;
  private readonly prompt: ConfirmationPrompt;
  private readonly cleanup: ScopedCleanup;
  private readonly configState: BackupConfigRuntimeState;
  private readonly silent: boolean;
  private _session?: RestoreSession;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.SnapshotStore) store?: SnapshotStore,
    @inject(InjectTokens.ApplianceProbe) probe?: ApplianceProbe,
    @inject(InjectTokens.RemoteStatusReporter) reporter?: RemoteStatusReporter,
    @inject(InjectTokens.DatastoreDispatcher) dispatcher?: DatastoreDispatcher,
    @inject(InjectTokens.ConfirmationPrompt) prompt?: ConfirmationPrompt,
    @inject(InjectTokens.ScopedCleanup) cleanup?: ScopedCleanup,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
    @inject(InjectTokens.SilentTasks) silent?: boolean,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.store = patchInject(store, InjectTokens.SnapshotStore, this.constructor.name);
    this.probe = patchInject(probe, InjectTokens.ApplianceProbe, this.constructor.name);
    this.reporter = patchInject(reporter, InjectTokens.RemoteStatusReporter, this.constructor.name);
    this.dispatcher = patchInject(dispatcher, InjectTokens.DatastoreDispatcher, this.constructor.name);
    this.prompt = patchInject(prompt, InjectTokens.ConfirmationPrompt, this.constructor.name);
    this.cleanup = patchInject(cleanup, InjectTokens.ScopedCleanup, this.constructor.name);
    this.configState = patchInject(configState, InjectTokens.BackupConfigRuntimeState, this.constructor.name);
    this.silent = patchInject(silent, InjectTokens.SilentTasks, this.constructor.name);
  }

  /** The session of the latest {@link prepare}, whatever state it ended in. */
  public get session(): RestoreSession | undefined {
    return this._session;
  }

  public async run(options: RestoreOptions): Promise<RestoreResult> {
    const warnings: string[] = [];
    const session: RestoreSession = await this.prepare(options, warnings);
    return this.execute(session, warnings);
  }

  /**
   * Resolves the snapshot, probes the target and applies every gate, then asks for confirmation.
   * @throws PreconditionError when a gate fails
   * @throws OperatorAbortError when the operator declines
   */
  public async prepare(options: RestoreOptions, warnings: string[] = []): Promise<RestoreSession> {
    const target: RemoteTarget = RemoteTarget.parse(options.host, this.configState.config.sshPort);
    const snapshot: CommittedSnapshot = this.store.resolve(options.snapshotId);
    const hasUuid: boolean = fs.existsSync(path.join(snapshot.path, constants.SNAPSHOT_UUID_FILE));

    const session: RestoreSession = new RestoreSession(target, snapshot, hasUuid);
    this._session = session;
    session.transitionTo(RestoreState.VALIDATING);
    this.logger.info(`restoring snapshot ${snapshot.id} (${snapshot.strategy}, ${snapshot.version}) onto ${target}`);

    try {
      await this.validate(session, options, warnings);
      if (!options.force && session.isConfigured) {
        await this.prompt.confirm(
          `Snapshot ${snapshot.id} will overwrite the data on ${target.host}. Continue?`,
        );
      }
    } catch (error) {
      session.transitionTo(RestoreState.FAILED);
      throw error;
    }
    return session;
  }

  /**
   * Runs the restore plan against a validated session.
   * @throws StepFailedError naming the first step that failed
   */
  public async execute(session: RestoreSession, warnings: string[] = []): Promise<RestoreResult> {
    let plan: PlannedRestoreStep[];
    try {
      plan = this.resolvePlan(session);
    } catch (error) {
      session.transitionTo(RestoreState.FAILED);
      throw error;
    }
    const executed: StepName[] = [];
    const context: RoutineContext = {
      target: session.target,
      snapshot: session.snapshot,
      isCluster: session.isCluster,
      strategy: this.dispatcher.resolveStrategy(session),
    };

    await this.cleanup.run(async (scope: CleanupScope): Promise<void> => {
      session.transitionTo(RestoreState.RESTORING);
      await this.reporter.publish(session.target, 'restoring');
      scope.register(DEFAULT_FAILURE, async (): Promise<void> => {
        if (session.state === RestoreState.RESTORING) {
          session.transitionTo(RestoreState.FAILED);
        }
        await this.reporter.publish(session.target, 'failed');
      });

      await runStepTasks(
        plan.filter((planned): boolean => planned.step.phase === 'main'),
        context,
        this.logger,
        this.silent,
        executed,
      );

      session.transitionTo(RestoreState.COMPLETE);
      await this.reporter.publish(session.target, 'complete');
      scope.release(DEFAULT_FAILURE);
    });

    for (const planned of plan.filter((candidate): boolean => candidate.step.phase === 'after-complete')) {
      try {
        await runStepTasks([planned], context, this.logger, this.silent, executed);
      } catch (error) {
        if (!planned.step.bestEffort) {
          throw error;
        }
        const warning: string = `${planned.name} did not complete: ${
          error instanceof StepFailedError && error.cause instanceof Error ? error.cause.message : String(error)
        }`;
        this.logger.warn(warning, error);
        warnings.push(warning);
      }
    }

    this.logger.showUser(`Restore of snapshot ${session.snapshot.id} onto ${session.host} complete`);
    return {session, executedSteps: executed, warnings};
  }

  private async validate(session: RestoreSession, options: RestoreOptions, warnings: string[]): Promise<void> {
    const facts: ApplianceFacts = await this.probe.probe(session.target);
    if (!facts.version.isSupported()) {
      throw new PreconditionError(
        `${session.host} runs ${facts.version}, which this version of strongbox cannot restore onto`,
      );
    }
    session.remoteVersion = facts.version;
    session.isCluster = facts.isCluster;
    session.isConfigured = facts.isConfigured;
    session.isReplica = facts.isReplica;

    if (session.isCluster) {
      let snapshotVersion: ApplianceVersion;
      try {
        snapshotVersion = ApplianceVersion.parse(session.snapshot.version);
      } catch (error) {
        throw new PreconditionError(`Snapshot ${session.snapshot.id} has no usable version`, error);
      }
      if (!snapshotVersion.supportsClusterRestore()) {
        throw new VersionMismatchError(
          `Snapshot ${session.snapshot.id} was taken from ${snapshotVersion} and cannot be restored onto a cluster`,
          snapshotVersion.toString(),
          constants.MINIMUM_CLUSTER_SNAPSHOT_VERSION,
        );
      }
    } else if (session.strategy === 'cluster') {
      throw new PreconditionError(
        `Snapshot ${session.snapshot.id} was taken from a cluster and cannot be restored onto standalone ${session.host}`,
      );
    }

    if (session.isConfigured) {
      session.restoreSettings = options.restoreSettings;
    } else {
      if (facts.version.isLegacy && !options.restoreSettings) {
        throw new PreconditionError(
          `${session.host} is not configured; restoring onto it needs settings, pass -c to restore them`,
        );
      }
      session.restoreSettings = true;
    }

    if (session.isConfigured && !session.isCluster && !facts.inMaintenance) {
      throw new PreconditionError(`${session.host} must be in maintenance mode before it can be restored`);
    }

    if (session.isReplica) {
      const warning: string = `${session.host} is part of a replication pair; replication will be interrupted`;
      this.logger.showNotice(MessageLevel.WARN, warning);
      warnings.push(warning);
    }
  }

  /** Routines are chosen before anything is changed, so a missing one fails the session early. */
  private resolvePlan(session: RestoreSession): PlannedRestoreStep[] {
    return buildRestorePlan(session).map(
      (step): PlannedRestoreStep => ({
        step,
        name: step.name,
        title: `Restore ${step.name}`,
        routine: this.dispatcher.routineFor(step.name, session),
      }),
    );
  }
}
