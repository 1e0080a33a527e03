// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../../core/logging/strongbox-logger.js';
import {type BackupConfigRuntimeState} from '../../core/config/backup-config-runtime-state.js';
import {type BackupConfigSchema} from '../../data/schema/model/config/backup-config-schema.js';
import {type BulkTransfer, type TransferRequest} from './bulk-transfer.js';
import {RsyncExecutionBuilder} from './execution/rsync-execution-builder.js';
import {type RsyncExecution} from './execution/rsync-execution.js';
import * as constants from '../../core/constants.js';

/**
 * {@link BulkTransfer} over rsync and ssh. Files are compared by checksum; on pulls, unchanged files are hard-linked
 * from the dedup base with `--link-dest`.
 */
@injectable()
export class RsyncTransfer implements BulkTransfer {
  private readonly logger: StrongboxLogger;
  private readonly configState: BackupConfigRuntimeState;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.configState = patchInject(configState, InjectTokens.BackupConfigRuntimeState, this.constructor.name);
  }

  public async transfer(request: TransferRequest): Promise<void> {
    if (request.direction === 'pull') {
      fs.mkdirSync(request.localPath, {recursive: true});
    }
    const execution: RsyncExecution = this.builder(request).build();
    this.logger.info(
      `rsync ${request.direction} ${request.target.host}:${request.remotePath} <-> ${request.localPath}`,
    );
    try {
      await execution.call();
    } catch (error) {
      this.logger.error(`rsync ${request.direction} of ${request.remotePath} failed`, error);
      throw error;
    }
    this.logger.debug(`rsync finished\n${execution.standardOutput()}`);
  }

  public builder(request: TransferRequest): RsyncExecutionBuilder {
    const config: BackupConfigSchema = this.configState.config;
    const rsh: string[] = ['ssh', '-p', request.target.port.toString(), '-l', config.sshUser, '-o', 'BatchMode=yes'];
    if (request.configFile) {
      rsh.push('-F', request.configFile);
    }
    if (config.extraSshOptions.trim()) {
      rsh.push(config.extraSshOptions.trim());
    }

    const remote: string = `${request.target.host}:${request.remotePath.replace(/\/+$/, '')}/`;
    const local: string = `${path.resolve(request.localPath)}/`;

    const builder: RsyncExecutionBuilder = new RsyncExecutionBuilder()
      .flag('--archive')
      .flag('--hard-links')
      .flag('--checksum')
      .argument('rsh', rsh.join(' '))
      .argument('rsync-path', constants.REMOTE_RSYNC_PATH);

    if (request.deleteExtraneous) {
      builder.flag('--delete');
    }
    if (request.direction === 'pull') {
      if (request.dedupBase && fs.existsSync(request.dedupBase)) {
        builder.argument('link-dest', path.resolve(request.dedupBase));
      }
      return builder.source(remote).destination(local);
    }
    return builder.source(local).destination(remote);
  }
}
