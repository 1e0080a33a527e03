// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon from 'sinon';
import {RsyncTransfer} from '../../../../src/integration/rsync/rsync-transfer.js';
import {RsyncExecutionBuilder} from '../../../../src/integration/rsync/execution/rsync-execution-builder.js';
import {StrongboxPinoLogger} from '../../../../src/core/logging/strongbox-pino-logger.js';
import {BackupConfigRuntimeState} from '../../../../src/core/config/backup-config-runtime-state.js';
import {RemoteTarget} from '../../../../src/core/topology/remote-target.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('RsyncTransfer', (): void => {
  const target: RemoteTarget = new RemoteTarget('appliance.example', 122);
  let directory: string;
  let transfer: RsyncTransfer;

  beforeEach((): void => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'strongbox-rsync-'));
    const configState: BackupConfigRuntimeState = new BackupConfigRuntimeState(directory);
    configState.apply({});
    transfer = new RsyncTransfer(sinon.createStubInstance(StrongboxPinoLogger), configState);
  });

  afterEach((): void => {
    fs.rmSync(directory, {recursive: true, force: true});
    sinon.restore();
  });

  it('should pull into the snapshot, linking against an existing dedup base', (): void => {
    const base: string = path.join(directory, 'previous', 'repositories');
    fs.mkdirSync(base, {recursive: true});
    const local: string = path.join(directory, 'next', 'repositories');

    const arguments_: string[] = transfer
      .builder({target, direction: 'pull', localPath: local, remotePath: '/data/user/repositories/', dedupBase: base})
      .buildArguments();

    expect(arguments_).to.deep.equal([
      '--archive',
      '--hard-links',
      '--checksum',
      '--rsh=ssh -p 122 -l admin -o BatchMode=yes',
      '--rsync-path=sudo -u git rsync',
      `--link-dest=${base}`,
      'appliance.example:/data/user/repositories/',
      `${local}/`,
    ]);
  });

  it('should leave out a dedup base that does not exist', (): void => {
    const arguments_: string[] = transfer
      .builder({
        target,
        direction: 'pull',
        localPath: path.join(directory, 'pages'),
        remotePath: '/data/user/pages',
        dedupBase: path.join(directory, 'missing'),
      })
      .buildArguments();

    expect(arguments_.some((argument): boolean => argument.startsWith('--link-dest'))).to.be.false;
  });

  it('should push with delete through a tunnel configuration', (): void => {
    const local: string = path.join(directory, 'pages');

    const arguments_: string[] = transfer
      .builder({
        target: new RemoteTarget('node-2', 22),
        direction: 'push',
        localPath: local,
        remotePath: '/data/user/pages',
        deleteExtraneous: true,
        configFile: '/tmp/tunnel.conf',
      })
      .buildArguments();

    expect(arguments_).to.deep.equal([
      '--archive',
      '--hard-links',
      '--checksum',
      '--delete',
      '--rsh=ssh -p 22 -l admin -o BatchMode=yes -F /tmp/tunnel.conf',
      '--rsync-path=sudo -u git rsync',
      `${local}/`,
      'node-2:/data/user/pages/',
    ]);
  });
});

describe('RsyncExecutionBuilder', (): void => {
  it('should require a source and a destination', (): void => {
    expect((): string[] => new RsyncExecutionBuilder().source('a/').buildArguments()).to.throw(
      IllegalArgumentError,
      'source and destination must be set',
    );
  });
});
