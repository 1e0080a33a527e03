// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../core/logging/strongbox-logger.js';
import {type BackupConfigRuntimeState} from '../core/config/backup-config-runtime-state.js';
import {type BackupOrchestrator, type BackupResult} from '../core/backup/backup-orchestrator.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {BaseCommand} from './base.js';

@injectable()
export class BackupCommand extends BaseCommand {
  private readonly orchestrator: BackupOrchestrator;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
    @inject(InjectTokens.BackupOrchestrator) orchestrator?: BackupOrchestrator,
  ) {
    super(
      patchInject(logger, InjectTokens.StrongboxLogger, BackupCommand.name),
      patchInject(configState, InjectTokens.BackupConfigRuntimeState, BackupCommand.name),
    );
    this.orchestrator = patchInject(orchestrator, InjectTokens.BackupOrchestrator, this.constructor.name);
  }

  public static readonly BACKUP_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [],
  };

  public async backup(argv: ArgvStruct): Promise<boolean> {
    this.loadConfiguration(argv);
    const result: BackupResult = await this.orchestrator.run();
    this.logger.showList(`Snapshot ${result.snapshot.id} (${result.strategy})`, [
      `steps: ${result.executedSteps.join(', ')}`,
      `files linked against the previous snapshot: ${result.linkedFiles}`,
      `new bytes: ${result.uniqueBytes}`,
      `pruned: ${result.pruned.length > 0 ? result.pruned.join(', ') : 'none'}`,
    ]);
    return true;
  }
}
