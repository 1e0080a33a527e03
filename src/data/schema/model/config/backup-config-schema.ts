// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import * as constants from '../../../../core/constants.js';

@Exclude()
export class BackupConfigSchema {
  @Expose()
  public hostname: string | undefined;

  @Expose()
  public dataDir: string;

  @Expose()
  public numSnapshots: number;

  @Expose()
  public sshUser: string;

  @Expose()
  public sshPort: number;

  @Expose()
  public extraSshOptions: string;

  @Expose()
  public transferConcurrency: number;

  @Expose()
  public createDataDir: boolean;

  public constructor(
    hostname?: string,
    dataDirectory?: string,
    numSnapshots?: number,
    sshUser?: string,
    sshPort?: number,
    extraSshOptions?: string,
    transferConcurrency?: number,
    createDataDirectory?: boolean,
  ) {
    this.hostname = hostname ?? undefined;
    this.dataDir = dataDirectory ?? constants.DEFAULT_DATA_DIR;
    this.numSnapshots = numSnapshots ?? constants.DEFAULT_NUM_SNAPSHOTS;
    this.sshUser = sshUser ?? constants.DEFAULT_SSH_USER;
    this.sshPort = sshPort ?? constants.DEFAULT_SSH_PORT;
    this.extraSshOptions = extraSshOptions ?? '';
    this.transferConcurrency = transferConcurrency ?? constants.DEFAULT_TRANSFER_CONCURRENCY;
    this.createDataDir = createDataDirectory ?? true;
  }
}
