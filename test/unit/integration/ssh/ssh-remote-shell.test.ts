// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon from 'sinon';
import {SshRemoteShell} from '../../../../src/integration/ssh/ssh-remote-shell.js';
import {SshExecutionBuilder} from '../../../../src/integration/ssh/execution/ssh-execution-builder.js';
import {SshExecution} from '../../../../src/integration/ssh/execution/ssh-execution.js';
import {SshExecutionException} from '../../../../src/integration/ssh/errors/ssh-execution-exception.js';
import {StrongboxPinoLogger} from '../../../../src/core/logging/strongbox-pino-logger.js';
import {BackupConfigRuntimeState} from '../../../../src/core/config/backup-config-runtime-state.js';
import {RemoteTarget} from '../../../../src/core/topology/remote-target.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('SshRemoteShell', (): void => {
  const target: RemoteTarget = new RemoteTarget('appliance.example', 122);

  function shell(values: Record<string, unknown> = {}): SshRemoteShell {
    const configState: BackupConfigRuntimeState = new BackupConfigRuntimeState('/tmp');
    configState.apply(values);
    return new SshRemoteShell(sinon.createStubInstance(StrongboxPinoLogger), configState);
  }

  afterEach((): void => {
    sinon.restore();
  });

  it('should run the command as the administrative user in batch mode', (): void => {
    expect(shell().builder(target, 'cat /etc/hostname').buildArguments()).to.deep.equal([
      '-p',
      '122',
      '-l',
      'admin',
      '-o',
      'BatchMode=yes',
      '--',
      'appliance.example',
      'cat /etc/hostname',
    ]);
  });

  it('should pass extra options after the built-in ones and a tunnel configuration first', (): void => {
    const arguments_: string[] = shell({sshUser: 'operator', extraSshOptions: ' -i test-key  -o ConnectTimeout=5 '})
      .builder(new RemoteTarget('node-2', 22), 'true', {configFile: '/tmp/tunnel.conf'})
      .buildArguments();

    expect(arguments_).to.deep.equal([
      '-F',
      '/tmp/tunnel.conf',
      '-p',
      '22',
      '-l',
      'operator',
      '-o',
      'BatchMode=yes',
      '-i',
      'test-key',
      '-o',
      'ConnectTimeout=5',
      '--',
      'node-2',
      'true',
    ]);
  });
});

describe('SshExecutionBuilder', (): void => {
  it('should end the options before the host', (): void => {
    expect(new SshExecutionBuilder().host('-oProxyCommand=id').remoteCommand('true').buildArguments()).to.deep.equal([
      '--',
      '-oProxyCommand=id',
      'true',
    ]);
  });

  it('should require a host and a command', (): void => {
    expect((): string[] => new SshExecutionBuilder().remoteCommand('true').buildArguments()).to.throw(
      IllegalArgumentError,
      'host must be set',
    );
    expect((): string[] => new SshExecutionBuilder().host('node-1').buildArguments()).to.throw(
      IllegalArgumentError,
      'command must be set',
    );
  });

  it('should reject empty values', (): void => {
    expect((): SshExecutionBuilder => new SshExecutionBuilder().host('')).to.throw(IllegalArgumentError);
    expect((): SshExecutionBuilder => new SshExecutionBuilder().option('BatchMode', '')).to.throw(
      IllegalArgumentError,
      'value must not be empty',
    );
  });

  it('should split extra options on whitespace', (): void => {
    expect(SshExecutionBuilder.splitOptions('  -i  key\t-v ')).to.deep.equal(['-i', 'key', '-v']);
  });
});

describe('SshExecution', (): void => {
  it('should report an executable that cannot be started', async (): Promise<void> => {
    const execution: SshExecution = new SshExecutionBuilder()
      .executable('strongbox-test-missing-ssh')
      .host('node-1')
      .remoteCommand('true')
      .build();

    await expect(execution.call()).to.be.rejectedWith(
      SshExecutionException,
      'Unable to start strongbox-test-missing-ssh',
    );
    expect(execution.exitCode()).to.equal(SshExecution.EXIT_CODE_NOT_STARTED);
  });

  describe('with a file on standard input', (): void => {
    let directory: string;
    let inputFile: string;

    beforeEach((): void => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'strongbox-ssh-'));
      inputFile = path.join(directory, 'dump.sql');
      // larger than a pipe buffer, so the writer is still busy when the command exits
      fs.writeFileSync(inputFile, 'x'.repeat(4 * 1024 * 1024));
    });

    afterEach((): void => {
      fs.rmSync(directory, {recursive: true, force: true});
    });

    it('should succeed when the command exits 0 without reading its input', async (): Promise<void> => {
      const execution: SshExecution = new SshExecution('true', [], {inputFile});

      await execution.call();

      expect(execution.exitCode()).to.equal(0);
    });

    it('should still fail on a non-zero exit', async (): Promise<void> => {
      const execution: SshExecution = new SshExecution('false', [], {inputFile});

      await expect(execution.call()).to.be.rejectedWith(SshExecutionException, 'Process exited with code 1');
      expect(execution.exitCode()).to.equal(1);
    });
  });
});
