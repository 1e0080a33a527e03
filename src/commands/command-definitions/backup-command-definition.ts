// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {BaseCommandDefinition} from './base-command-definition.js';
import {CommandBuilder, Subcommand} from '../../core/command-path-builders/command-builder.js';
import {BackupCommand} from '../backup.js';
import {type CommandDefinition} from '../../types/index.js';
import {type StrongboxLogger} from '../../core/logging/strongbox-logger.js';

@injectable()
export class BackupCommandDefinition extends BaseCommandDefinition {
  private readonly backupCommand: BackupCommand;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.BackupCommand) backupCommand?: BackupCommand,
  ) {
    super(patchInject(logger, InjectTokens.StrongboxLogger, BackupCommandDefinition.name));
    this.backupCommand = patchInject(backupCommand, InjectTokens.BackupCommand, this.constructor.name);
  }

  public static override readonly COMMAND_NAME: string = 'backup';
  protected static override readonly DESCRIPTION: string =
    'Take a snapshot of the configured appliance. Unchanged files are hard linked against the current snapshot.';

  public getCommandDefinition(): CommandDefinition {
    return new CommandBuilder(BackupCommandDefinition.COMMAND_NAME, BackupCommandDefinition.DESCRIPTION, this.logger)
      .setHandler(
        new Subcommand(
          BackupCommandDefinition.COMMAND_NAME,
          BackupCommandDefinition.DESCRIPTION,
          this.backupCommand,
          this.backupCommand.backup,
          BackupCommand.BACKUP_FLAGS_LIST,
        ),
      )
      .build();
  }
}
