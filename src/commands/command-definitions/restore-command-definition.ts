// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {BaseCommandDefinition} from './base-command-definition.js';
import {CommandBuilder, Subcommand} from '../../core/command-path-builders/command-builder.js';
import {RestoreCommand} from '../restore.js';
import {type CommandDefinition} from '../../types/index.js';
import {type StrongboxLogger} from '../../core/logging/strongbox-logger.js';

@injectable()
export class RestoreCommandDefinition extends BaseCommandDefinition {
  private readonly restoreCommand: RestoreCommand;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RestoreCommand) restoreCommand?: RestoreCommand,
  ) {
    super(patchInject(logger, InjectTokens.StrongboxLogger, RestoreCommandDefinition.name));
    this.restoreCommand = patchInject(restoreCommand, InjectTokens.RestoreCommand, this.constructor.name);
  }

  public static override readonly COMMAND_NAME: string = 'restore';
  protected static override readonly DESCRIPTION: string =
    'Restore a snapshot onto an appliance. A configured standalone appliance must be in maintenance mode, ' +
    'and is only overwritten after confirmation unless --force is given.';

  public getCommandDefinition(): CommandDefinition {
    return new CommandBuilder(
      RestoreCommandDefinition.COMMAND_NAME,
      RestoreCommandDefinition.DESCRIPTION,
      this.logger,
    )
      .setHandler(
        new Subcommand(
          RestoreCommandDefinition.COMMAND_NAME,
          RestoreCommandDefinition.DESCRIPTION,
          this.restoreCommand,
          this.restoreCommand.restore,
          RestoreCommand.RESTORE_FLAGS_LIST,
          [RestoreCommand.HOST_ARGUMENT],
        ),
      )
      .build();
  }
}
