// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../core/logging/strongbox-logger.js';
import {type BackupConfigRuntimeState} from '../core/config/backup-config-runtime-state.js';
import {type RestoreOrchestrator, type RestoreResult} from '../core/restore/restore-orchestrator.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {type CommandFlags, type PositionalArgument} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {Flags as flags} from './flags.js';
import {BaseCommand} from './base.js';

@injectable()
export class RestoreCommand extends BaseCommand {
  private readonly orchestrator: RestoreOrchestrator;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
    @inject(InjectTokens.RestoreOrchestrator) orchestrator?: RestoreOrchestrator,
  ) {
    super(
      patchInject(logger, InjectTokens.StrongboxLogger, RestoreCommand.name),
      patchInject(configState, InjectTokens.BackupConfigRuntimeState, RestoreCommand.name),
    );
    this.orchestrator = patchInject(orchestrator, InjectTokens.RestoreOrchestrator, this.constructor.name);
  }

  public static readonly HOST_ARGUMENT: PositionalArgument = {
    name: 'host',
    describe: 'Appliance to restore onto, as host or host:port',
  };

  public static readonly RESTORE_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [flags.force, flags.restoreSettings, flags.snapshot],
  };

  public async restore(argv: ArgvStruct): Promise<boolean> {
    const host: unknown = argv[RestoreCommand.HOST_ARGUMENT.name];
    if (typeof host !== 'string' || host === '') {
      throw new IllegalArgumentError('restore needs the host to restore onto', host);
    }
    this.loadConfiguration(argv);

    const result: RestoreResult = await this.orchestrator.run({
      host,
      force: flags.getBoolean(argv, flags.force),
      restoreSettings: flags.getBoolean(argv, flags.restoreSettings),
      snapshotId: flags.getString(argv, flags.snapshot),
    });
    this.logger.showList(`Restored snapshot ${result.session.snapshot.id} onto ${result.session.host}`, [
      ...result.executedSteps.map((step): string => `restored ${step}`),
      ...result.warnings.map((warning): string => `warning: ${warning}`),
    ]);
    return true;
  }
}
