// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {BaseCommandDefinition} from './base-command-definition.js';
import {CommandBuilder, CommandGroup, Subcommand} from '../../core/command-path-builders/command-builder.js';
import {SnapshotCommand} from '../snapshot.js';
import {type CommandDefinition} from '../../types/index.js';
import {type StrongboxLogger} from '../../core/logging/strongbox-logger.js';

@injectable()
export class SnapshotCommandDefinition extends BaseCommandDefinition {
  private readonly snapshotCommand: SnapshotCommand;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.SnapshotCommand) snapshotCommand?: SnapshotCommand,
  ) {
    super(patchInject(logger, InjectTokens.StrongboxLogger, SnapshotCommandDefinition.name));
    this.snapshotCommand = patchInject(snapshotCommand, InjectTokens.SnapshotCommand, this.constructor.name);
  }

  public static override readonly COMMAND_NAME: string = 'snapshot';
  protected static override readonly DESCRIPTION: string = 'Inspect and prune the snapshots in the data directory';

  public static readonly LIST_COMMAND: string = 'list';
  public static readonly PRUNE_COMMAND: string = 'prune';

  public getCommandDefinition(): CommandDefinition {
    return new CommandBuilder(
      SnapshotCommandDefinition.COMMAND_NAME,
      SnapshotCommandDefinition.DESCRIPTION,
      this.logger,
    )
      .setCommandGroup(
        new CommandGroup(SnapshotCommandDefinition.COMMAND_NAME, SnapshotCommandDefinition.DESCRIPTION)
          .addSubcommand(
            new Subcommand(
              SnapshotCommandDefinition.LIST_COMMAND,
              'List snapshots, oldest first, with their strategy and appliance version',
              this.snapshotCommand,
              this.snapshotCommand.list,
              SnapshotCommand.LIST_FLAGS_LIST,
            ),
          )
          .addSubcommand(
            new Subcommand(
              SnapshotCommandDefinition.PRUNE_COMMAND,
              'Remove the oldest committed snapshots beyond --keep, and incomplete snapshots left behind',
              this.snapshotCommand,
              this.snapshotCommand.prune,
              SnapshotCommand.PRUNE_FLAGS_LIST,
            ),
          ),
      )
      .build();
  }
}
