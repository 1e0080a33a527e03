// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type RemoteShell} from '../../integration/ssh/remote-shell.js';
import {type RemoteTarget} from '../topology/remote-target.js';
import {type ObservedRestoreStatus, parseStatus, type RestoreStatus} from './restore-status.js';
import * as constants from '../constants.js';

/**
 * Publishes the restore status to a well-known file on the target, for other processes to observe.
 */
@injectable()
export class RemoteStatusReporter {
  private readonly logger: StrongboxLogger;
  private readonly remoteShell: RemoteShell;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RemoteShell) remoteShell?: RemoteShell,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.remoteShell = patchInject(remoteShell, InjectTokens.RemoteShell, this.constructor.name);
  }

  /**
   * Best-effort: a failed write is logged and never thrown, so it cannot mask the outcome being reported.
   * @returns whether the value was written
   */
  public async publish(target: RemoteTarget, value: RestoreStatus): Promise<boolean> {
    try {
      await this.remoteShell.exec(target, `sudo tee ${constants.REMOTE_RESTORE_STATUS_FILE} >/dev/null`, {
        input: `${value}\n`,
      });
      this.logger.debug(`restore status on ${target.host} is now '${value}'`);
      return true;
    } catch (error) {
      this.logger.warn(`unable to publish restore status '${value}' to ${target.host}`, error);
      return false;
    }
  }

  public async read(target: RemoteTarget): Promise<ObservedRestoreStatus> {
    try {
      return parseStatus(await this.remoteShell.exec(target, `cat ${constants.REMOTE_RESTORE_STATUS_FILE}`));
    } catch (error) {
      this.logger.debug(`unable to read restore status from ${target.host}`, error);
      return 'unknown';
    }
  }
}
