// SPDX-License-Identifier: Apache-2.0

import {type StrongboxLogger} from '../core/logging/strongbox-logger.js';
import {type BackupConfigRuntimeState} from '../core/config/backup-config-runtime-state.js';
import {type ArgvStruct} from '../types/aliases.js';
import {Flags as flags} from './flags.js';

export abstract class BaseCommand {
  protected constructor(
    protected readonly logger: StrongboxLogger,
    protected readonly configState: BackupConfigRuntimeState,
  ) {}

  /** Every command starts from the configuration named by `--config`, or the first one found. */
  protected loadConfiguration(argv: ArgvStruct): void {
    this.logger.nextTraceId();
    this.configState.load(flags.getString(argv, flags.config));
    this.logger.debug(`configuration loaded from ${this.configState.sourceFile ?? 'defaults and environment'}`);
  }
}
