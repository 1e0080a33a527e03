// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../core/logging/strongbox-logger.js';
import {type BackupConfigRuntimeState} from '../core/config/backup-config-runtime-state.js';
import {type SnapshotStore} from '../core/snapshot/snapshot-store.js';
import {type Snapshot} from '../core/snapshot/snapshot.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';
import {Flags as flags} from './flags.js';
import {BaseCommand} from './base.js';

@injectable()
export class SnapshotCommand extends BaseCommand {
  private readonly store: SnapshotStore;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
    @inject(InjectTokens.SnapshotStore) store?: SnapshotStore,
  ) {
    super(
      patchInject(logger, InjectTokens.StrongboxLogger, SnapshotCommand.name),
      patchInject(configState, InjectTokens.BackupConfigRuntimeState, SnapshotCommand.name),
    );
    this.store = patchInject(store, InjectTokens.SnapshotStore, this.constructor.name);
  }

  public static readonly LIST_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [],
  };

  public static readonly PRUNE_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [flags.keep],
  };

  public static describe(snapshot: Snapshot, currentPath: string | undefined): string {
    const marker: string = snapshot.path === currentPath ? ' (current)' : '';
    if (!snapshot.committed) {
      return `${snapshot.id} incomplete`;
    }
    return `${snapshot.id} ${snapshot.strategy ?? '?'} ${snapshot.version ?? '?'}${marker}`;
  }

  public async list(argv: ArgvStruct): Promise<boolean> {
    this.loadConfiguration(argv);
    const current: string | undefined = this.store.dedupBase();
    this.logger.showList(
      `Snapshots in ${this.store.root}`,
      this.store.list().map((snapshot): string => SnapshotCommand.describe(snapshot, current)),
    );
    return true;
  }

  public async prune(argv: ArgvStruct): Promise<boolean> {
    this.loadConfiguration(argv);
    const keep: number = flags.getNumber(argv, flags.keep) ?? this.configState.config.numSnapshots;
    this.logger.showList(`Pruned snapshots (keeping ${keep})`, this.store.prune(keep));
    return true;
  }
}
