// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type BackupCommandDefinition} from './command-definitions/backup-command-definition.js';
import {type RestoreCommandDefinition} from './command-definitions/restore-command-definition.js';
import {type SnapshotCommandDefinition} from './command-definitions/snapshot-command-definition.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
@injectable()
export class Commands {
  private readonly backup: BackupCommandDefinition;
  private readonly restore: RestoreCommandDefinition;
  private readonly snapshot: SnapshotCommandDefinition;

  public constructor(
    @inject(InjectTokens.BackupCommandDefinition) backup?: BackupCommandDefinition,
    @inject(InjectTokens.RestoreCommandDefinition) restore?: RestoreCommandDefinition,
    @inject(InjectTokens.SnapshotCommandDefinition) snapshot?: SnapshotCommandDefinition,
  ) {
    this.backup = patchInject(backup, InjectTokens.BackupCommandDefinition, this.constructor.name);
    this.restore = patchInject(restore, InjectTokens.RestoreCommandDefinition, this.constructor.name);
    this.snapshot = patchInject(snapshot, InjectTokens.SnapshotCommandDefinition, this.constructor.name);
  }

  public getCommandDefinitions(): CommandDefinition[] {
    return [
      this.backup.getCommandDefinition(),
      this.restore.getCommandDefinition(),
      this.snapshot.getCommandDefinition(),
    ];
  }
}
