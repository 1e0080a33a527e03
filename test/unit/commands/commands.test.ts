// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon, {type SinonStubbedInstance} from 'sinon';
import {StrongboxPinoLogger} from '../../../src/core/logging/strongbox-pino-logger.js';
import {BackupConfigRuntimeState} from '../../../src/core/config/backup-config-runtime-state.js';
import {RestoreOrchestrator} from '../../../src/core/restore/restore-orchestrator.js';
import {RestoreSession} from '../../../src/core/restore/restore-session.js';
import {SnapshotStore} from '../../../src/core/snapshot/snapshot-store.js';
import {RemoteTarget} from '../../../src/core/topology/remote-target.js';
import {RestoreCommand} from '../../../src/commands/restore.js';
import {SnapshotCommand} from '../../../src/commands/snapshot.js';
import {CommandBuilder, Subcommand} from '../../../src/core/command-path-builders/command-builder.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {StrongboxError} from '../../../src/core/errors/strongbox-error.js';
import {type CommandDefinition} from '../../../src/types/index.js';
import {type ArgvStruct} from '../../../src/types/aliases.js';

function argv(values: Record<string, unknown>): ArgvStruct {
  return {_: [], $0: 'strongbox', ...values};
}

describe('commands', (): void => {
  let directory: string;
  let configFile: string;
  let logger: SinonStubbedInstance<StrongboxPinoLogger>;
  let configState: BackupConfigRuntimeState;

  beforeEach((): void => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'strongbox-commands-'));
    configFile = path.join(directory, 'strongbox.yaml');
    fs.writeFileSync(configFile, `dataDir: ${path.join(directory, 'data')}\nnumSnapshots: 2\n`);
    logger = sinon.createStubInstance(StrongboxPinoLogger);
    configState = new BackupConfigRuntimeState(directory);
  });

  afterEach((): void => {
    fs.rmSync(directory, {recursive: true, force: true});
    sinon.restore();
  });

  describe('RestoreCommand', (): void => {
    it('should require a host', async (): Promise<void> => {
      const orchestrator: SinonStubbedInstance<RestoreOrchestrator> = sinon.createStubInstance(RestoreOrchestrator);
      const command: RestoreCommand = new RestoreCommand(logger, configState, orchestrator);

      await expect(command.restore(argv({config: configFile}))).to.be.rejectedWith(
        IllegalArgumentError,
        'restore needs the host to restore onto',
      );
      expect(orchestrator.run).not.to.have.been.called;
    });

    it('should pass the flags on to the orchestrator', async (): Promise<void> => {
      const orchestrator: SinonStubbedInstance<RestoreOrchestrator> = sinon.createStubInstance(RestoreOrchestrator);
      const session: RestoreSession = new RestoreSession(
        new RemoteTarget('appliance.example', 122),
        {id: '20260101T000000', path: '/tmp/20260101T000000', strategy: 'rsync', version: '2.6.0', committed: true},
        false,
      );
      orchestrator.run.resolves({session, executedSteps: ['mysql'], warnings: ['replication will be interrupted']});
      const command: RestoreCommand = new RestoreCommand(logger, configState, orchestrator);

      const result: boolean = await command.restore(
        argv({config: configFile, host: 'appliance.example', force: true, snapshot: '20260101T000000'}),
      );

      expect(result).to.be.true;
      expect(orchestrator.run).to.have.been.calledOnceWith({
        host: 'appliance.example',
        force: true,
        restoreSettings: false,
        snapshotId: '20260101T000000',
      });
      expect(logger.showList).to.have.been.calledOnceWith('Restored snapshot 20260101T000000 onto appliance.example', [
        'restored mysql',
        'warning: replication will be interrupted',
      ]);
    });
  });

  describe('SnapshotCommand', (): void => {
    it('should describe committed and incomplete snapshots', (): void => {
      const committed: string = SnapshotCommand.describe(
        {id: '20260101T000000', path: '/data/20260101T000000', strategy: 'cluster', version: '2.6.0', committed: true},
        '/data/20260101T000000',
      );
      const incomplete: string = SnapshotCommand.describe(
        {id: '20260102T000000', path: '/data/20260102T000000', committed: false},
        '/data/20260101T000000',
      );

      expect(committed).to.equal('20260101T000000 cluster 2.6.0 (current)');
      expect(incomplete).to.equal('20260102T000000 incomplete');
    });

    it('should prune down to the configured retention unless --keep is given', async (): Promise<void> => {
      const store: SinonStubbedInstance<SnapshotStore> = sinon.createStubInstance(SnapshotStore);
      store.prune.returns([]);
      const command: SnapshotCommand = new SnapshotCommand(logger, configState, store);

      await command.prune(argv({config: configFile}));
      await command.prune(argv({config: configFile, keep: 5}));

      expect(store.prune.firstCall).to.have.been.calledWith(2);
      expect(store.prune.secondCall).to.have.been.calledWith(5);
    });
  });

  describe('CommandBuilder', (): void => {
    const handlerClass: object = {};

    it('should name positionals in the command string', (): void => {
      const subcommand: Subcommand = new Subcommand(
        'restore',
        'Restore a snapshot',
        handlerClass,
        async (): Promise<boolean> => true,
        {required: [], optional: []},
        [{name: 'host', describe: 'target'}],
      );

      expect(subcommand.command).to.equal('restore <host>');
    });

    it('should fail a handler that does not return true', async (): Promise<void> => {
      const definition: CommandDefinition = new CommandBuilder('backup', 'Take a snapshot', logger)
        .setHandler(
          new Subcommand('backup', 'Take a snapshot', handlerClass, async (): Promise<boolean> => false, {
            required: [],
            optional: [],
          }),
        )
        .build();

      await expect(Promise.resolve(definition.handler(argv({})))).to.be.rejectedWith(
        StrongboxError,
        'Error running backup, expected return value to be true',
      );
    });

    it('should need a handler or a group', (): void => {
      expect((): CommandDefinition => new CommandBuilder('empty', 'Nothing', logger).build()).to.throw(
        StrongboxError,
        'Command empty has neither a handler nor subcommands',
      );
    });
  });
});
