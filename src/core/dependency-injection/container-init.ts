// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {container} from 'tsyringe-neo';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {StrongboxPinoLogger} from '../logging/strongbox-pino-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {ErrorHandler} from '../error-handler.js';
import {BackupConfigRuntimeState} from '../config/backup-config-runtime-state.js';
import {SshRemoteShell} from '../../integration/ssh/ssh-remote-shell.js';
import {RsyncTransfer} from '../../integration/rsync/rsync-transfer.js';
import {ScopedCleanup} from '../lifecycle/scoped-cleanup.js';
import {ConfirmationPrompt, askOnTerminal} from '../prompt/confirmation-prompt.js';
import {SnapshotStore} from '../snapshot/snapshot-store.js';
import {TopologyResolver} from '../topology/topology-resolver.js';
import {TunnelTransport} from '../tunnel/tunnel-transport.js';
import {ApplianceProbe} from '../appliance/appliance-probe.js';
import {RemoteStatusReporter} from '../restore/remote-status-reporter.js';
import {RestoreRoutines} from '../datastores/restore-routines.js';
import {BackupRoutines} from '../datastores/backup-routines.js';
import {DatastoreDispatcher} from '../datastores/datastore-dispatcher.js';
import {RestoreOrchestrator} from '../restore/restore-orchestrator.js';
import {BackupOrchestrator} from '../backup/backup-orchestrator.js';
import {BackupCommand} from '../../commands/backup.js';
import {RestoreCommand} from '../../commands/restore.js';
import {SnapshotCommand} from '../../commands/snapshot.js';
import {BackupCommandDefinition} from '../../commands/command-definitions/backup-command-definition.js';
import {RestoreCommandDefinition} from '../../commands/command-definitions/restore-command-definition.js';
import {SnapshotCommandDefinition} from '../../commands/command-definitions/snapshot-command-definition.js';
import {Commands} from '../../commands/commands.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - the home directory to use, defaults to constants.STRONGBOX_HOME_DIR
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    homeDirectory: string = constants.STRONGBOX_HOME_DIR,
    logLevel: string = constants.STRONGBOX_LOG_LEVEL,
    developmentMode: boolean = false,
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<StrongboxLogger>(InjectTokens.StrongboxLogger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.StrongboxLogger, StrongboxPinoLogger),
      new SingletonContainer(InjectTokens.ErrorHandler, ErrorHandler),
      new SingletonContainer(InjectTokens.BackupConfigRuntimeState, BackupConfigRuntimeState),
      new SingletonContainer(InjectTokens.RemoteShell, SshRemoteShell),
      new SingletonContainer(InjectTokens.BulkTransfer, RsyncTransfer),
      new SingletonContainer(InjectTokens.ScopedCleanup, ScopedCleanup),
      new SingletonContainer(InjectTokens.ConfirmationPrompt, ConfirmationPrompt),
      new SingletonContainer(InjectTokens.SnapshotStore, SnapshotStore),
      new SingletonContainer(InjectTokens.TopologyResolver, TopologyResolver),
      new SingletonContainer(InjectTokens.TunnelTransport, TunnelTransport),
      new SingletonContainer(InjectTokens.ApplianceProbe, ApplianceProbe),
      new SingletonContainer(InjectTokens.RemoteStatusReporter, RemoteStatusReporter),
      new SingletonContainer(InjectTokens.RestoreRoutines, RestoreRoutines),
      new SingletonContainer(InjectTokens.BackupRoutines, BackupRoutines),
      new SingletonContainer(InjectTokens.DatastoreDispatcher, DatastoreDispatcher),
      new SingletonContainer(InjectTokens.RestoreOrchestrator, RestoreOrchestrator),
      new SingletonContainer(InjectTokens.BackupOrchestrator, BackupOrchestrator),
      new SingletonContainer(InjectTokens.BackupCommand, BackupCommand),
      new SingletonContainer(InjectTokens.RestoreCommand, RestoreCommand),
      new SingletonContainer(InjectTokens.SnapshotCommand, SnapshotCommand),
      new SingletonContainer(InjectTokens.BackupCommandDefinition, BackupCommandDefinition),
      new SingletonContainer(InjectTokens.RestoreCommandDefinition, RestoreCommandDefinition),
      new SingletonContainer(InjectTokens.SnapshotCommandDefinition, SnapshotCommandDefinition),
      new SingletonContainer(InjectTokens.Commands, Commands),
    ];

    const valueContainers: ValueContainer[] = [
      new ValueContainer(InjectTokens.LogLevel, logLevel),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.HomeDirectory, homeDirectory),
      new ValueContainer(InjectTokens.LogsDirectory, path.join(homeDirectory, 'logs')),
      new ValueContainer(InjectTokens.SilentTasks, constants.LISTR_SILENT),
      new ValueContainer(InjectTokens.PromptAsk, askOnTerminal),
      new ValueContainer(InjectTokens.ProcessExit, (code: number): void => process.exit(code)),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else {
        container.register(override.token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.get(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.get(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<StrongboxLogger>(InjectTokens.StrongboxLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param homeDirectory - the home directory to use, defaults to constants.STRONGBOX_HOME_DIR
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public reset(
    homeDirectory?: string,
    logLevel?: string,
    developmentMode?: boolean,
    overrides?: InstanceOverrides,
  ): void {
    if (Container.instance && Container.isInitialized) {
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, overrides);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
