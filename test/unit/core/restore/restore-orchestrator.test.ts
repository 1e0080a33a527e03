// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import path from 'node:path';
import sinon, {type SinonStub} from 'sinon';
import {RestoreOrchestrator, type RestoreResult} from '../../../../src/core/restore/restore-orchestrator.js';
import {RestoreState} from '../../../../src/core/restore/restore-state.js';
import {ConfirmationPrompt} from '../../../../src/core/prompt/confirmation-prompt.js';
import {PreconditionError} from '../../../../src/core/errors/precondition-error.js';
import {VersionMismatchError} from '../../../../src/core/errors/version-mismatch-error.js';
import {OperatorAbortError} from '../../../../src/core/errors/operator-abort-error.js';
import {StepFailedError} from '../../../../src/core/errors/step-failed-error.js';
import {type BackupStrategy} from '../../../../src/core/snapshot/backup-strategy.js';
import {type Snapshot} from '../../../../src/core/snapshot/snapshot.js';
import {type TransferRequest} from '../../../../src/integration/rsync/bulk-transfer.js';
import * as constants from '../../../../src/core/constants.js';
import {
  createTestEnvironment,
  removeTestEnvironment,
  seedSnapshot,
  type TestEnvironment,
} from '../../../helpers/test-environment.js';

const HOST: string = 'appliance.example';

const FULL_SNAPSHOT: Record<string, string> = {
  'settings/settings.json': '{}',
  'uuid/uuid': 'test-uuid',
  'mysql/mysql.sql.gz': 'dump',
  'repositories/a.git/HEAD': 'ref',
  'ssh-host-keys/ssh-host-keys.tar': 'keys',
};

describe('RestoreOrchestrator', (): void => {
  let environment: TestEnvironment;
  let ask: SinonStub<[string], Promise<string>>;
  let orchestrator: RestoreOrchestrator;

  function seed(strategy: BackupStrategy, version: string, files: Record<string, string> = FULL_SNAPSHOT): Snapshot {
    return seedSnapshot(environment.store, strategy, version, files);
  }

  function setUp(release: string): void {
    environment = createTestEnvironment({}, release);
    ask = sinon.stub<[string], Promise<string>>();
    orchestrator = new RestoreOrchestrator(
      environment.logger,
      environment.store,
      environment.probe,
      environment.reporter,
      environment.dispatcher,
      new ConfirmationPrompt(environment.logger, ask),
      environment.cleanup,
      environment.configState,
      true,
    );
  }

  beforeEach((): void => {
    setUp('2.6.0');
  });

  afterEach((): void => {
    removeTestEnvironment(environment);
    sinon.restore();
  });

  describe('gates', (): void => {
    it('should refuse a configured target that is not in maintenance mode', async (): Promise<void> => {
      seed('rsync', '2.6.0');
      environment.remoteShell.touch(constants.REMOTE_CONFIGURED_FILE);

      await expect(orchestrator.run({host: HOST, force: true, restoreSettings: false})).to.be.rejectedWith(
        PreconditionError,
        `${HOST} must be in maintenance mode before it can be restored`,
      );
      expect(orchestrator.session?.history).to.deep.equal([
        RestoreState.INIT,
        RestoreState.VALIDATING,
        RestoreState.FAILED,
      ]);
      expect(environment.remoteShell.publishedStatuses()).to.deep.equal([]);
    });

    it('should refuse to restore an old snapshot onto a cluster', async (): Promise<void> => {
      seed('cluster', '2.4.0');
      environment.remoteShell.touch(constants.REMOTE_CONFIGURED_FILE, constants.REMOTE_CLUSTER_FILE);

      const rejection: unknown = await orchestrator
        .run({host: HOST, force: true, restoreSettings: false})
        .then(
          (): undefined => undefined,
          (error: unknown): unknown => error,
        );

      expect(rejection).to.be.instanceOf(VersionMismatchError);
      if (rejection instanceof VersionMismatchError) {
        expect(rejection.actualVersion).to.equal('2.4.0');
        expect(rejection.requiredVersion).to.equal('2.5.0');
      }
      expect(orchestrator.session?.state).to.equal(RestoreState.FAILED);
      expect(environment.remoteShell.publishedStatuses()).to.deep.equal([]);
    });

    it('should refuse a cluster snapshot on a standalone target', async (): Promise<void> => {
      const snapshot: Snapshot = seed('cluster', '2.6.0');
      environment.remoteShell.touch(constants.REMOTE_CONFIGURED_FILE, constants.REMOTE_MAINTENANCE_FILE);

      await expect(orchestrator.run({host: HOST, force: true, restoreSettings: false})).to.be.rejectedWith(
        PreconditionError,
        `Snapshot ${snapshot.id} was taken from a cluster and cannot be restored onto standalone ${HOST}`,
      );
    });

    it('should require -c to restore onto an unconfigured legacy target', async (): Promise<void> => {
      removeTestEnvironment(environment);
      setUp('11.10.344');
      seed('tarball', '11.10.344');

      await expect(orchestrator.run({host: HOST, force: true, restoreSettings: false})).to.be.rejectedWith(
        PreconditionError,
        `${HOST} is not configured; restoring onto it needs settings, pass -c to restore them`,
      );
    });

    it('should refuse a target running an unsupported release', async (): Promise<void> => {
      removeTestEnvironment(environment);
      setUp('1.9.0');
      seed('rsync', '2.6.0');

      await expect(orchestrator.run({host: HOST, force: true, restoreSettings: false})).to.be.rejectedWith(
        PreconditionError,
        `${HOST} runs 1.9.0, which this version of strongbox cannot restore onto`,
      );
    });
  });

  describe('confirmation', (): void => {
    beforeEach((): void => {
      environment.remoteShell.touch(constants.REMOTE_CONFIGURED_FILE, constants.REMOTE_MAINTENANCE_FILE);
    });

    it('should stop before restoring when the operator declines', async (): Promise<void> => {
      const snapshot: Snapshot = seed('rsync', '2.6.0');
      ask.onFirstCall().resolves('');
      ask.onSecondCall().resolves('no');

      await expect(orchestrator.run({host: HOST, force: false, restoreSettings: false})).to.be.rejectedWith(
        OperatorAbortError,
      );
      expect(ask).to.have.been.calledWith(
        `Snapshot ${snapshot.id} will overwrite the data on ${HOST}. Continue? (type 'yes' to continue)`,
      );
      expect(orchestrator.session?.history).not.to.include(RestoreState.RESTORING);
      expect(environment.remoteShell.publishedStatuses()).to.deep.equal([]);
    });

    it('should not ask when forced', async (): Promise<void> => {
      seed('rsync', '2.6.0');

      await orchestrator.run({host: HOST, force: true, restoreSettings: false});

      expect(ask).not.to.have.been.called;
    });
  });

  describe('restore', (): void => {
    it('should restore every datastore onto an unconfigured appliance, host keys last', async (): Promise<void> => {
      seed('rsync', '2.6.0');

      const result: RestoreResult = await orchestrator.run({host: HOST, force: false, restoreSettings: false});

      expect(result.session.restoreSettings).to.be.true;
      expect(result.executedSteps).to.deep.equal([
        'settings',
        'services',
        'uuid',
        'mysql',
        'repositories',
        'git-hooks',
        'pages',
        'assets',
        'hookshot',
        'saml-keys',
        'elasticsearch',
        'ssh-host-keys',
      ]);
      expect(result.session.state).to.equal(RestoreState.COMPLETE);
      expect(environment.remoteShell.publishedStatuses()).to.deep.equal(['restoring', 'complete']);
      expect(ask).not.to.have.been.called;

      const commands: string[] = environment.remoteShell.commands();
      const statusWrite: string = `sudo tee ${constants.REMOTE_RESTORE_STATUS_FILE} >/dev/null`;
      const completed: number = commands.lastIndexOf(statusWrite);
      expect(commands.slice(completed + 1)).to.deep.equal([constants.REMOTE_IMPORT_SSH_HOST_KEYS_COMMAND]);
    });

    it('should publish failed and stop at the first failing step', async (): Promise<void> => {
      seed('rsync', '2.6.0');
      environment.remoteShell.touch(constants.REMOTE_CONFIGURED_FILE, constants.REMOTE_MAINTENANCE_FILE);
      environment.remoteShell.failOn(/strongbox-import-mysql/, 'import failed');

      await expect(orchestrator.run({host: HOST, force: true, restoreSettings: false})).to.be.rejectedWith(
        StepFailedError,
        "Step 'mysql' failed: import failed",
      );
      expect(orchestrator.session?.state).to.equal(RestoreState.FAILED);
      expect(environment.remoteShell.publishedStatuses()).to.deep.equal(['restoring', 'failed']);
      expect(environment.bulkTransfer.requests).to.have.length(0);
    });

    it('should keep the complete status when the configuration apply fails', async (): Promise<void> => {
      seed('rsync', '2.6.0');
      environment.remoteShell.touch(constants.REMOTE_CONFIGURED_FILE, constants.REMOTE_MAINTENANCE_FILE);
      environment.remoteShell.failOn(/strongbox-config-apply/, 'apply failed');

      const result: RestoreResult = await orchestrator.run({host: HOST, force: true, restoreSettings: false});

      expect(result.warnings).to.deep.equal(['config-apply did not complete: apply failed']);
      expect(result.executedSteps.at(-1)).to.equal('ssh-host-keys');
      expect(result.executedSteps).not.to.include('config-apply');
      expect(environment.remoteShell.publishedStatuses()).to.deep.equal(['restoring', 'complete']);
      expect(result.session.state).to.equal(RestoreState.COMPLETE);
    });

    it('should warn before restoring onto a replica', async (): Promise<void> => {
      seed('rsync', '2.6.0');
      environment.remoteShell.touch(constants.REMOTE_REPLICATION_STATE_FILE);

      const result: RestoreResult = await orchestrator.run({host: HOST, force: true, restoreSettings: false});

      expect(result.warnings).to.deep.equal([
        `${HOST} is part of a replication pair; replication will be interrupted`,
      ]);
      expect(environment.logger.showNotice).to.have.been.calledOnce;
    });
  });

  describe('interrupts', (): void => {
    it('should publish failure and remove the tunnel when interrupted mid-step', async (): Promise<void> => {
      seed('cluster', '2.6.0', {'mysql/mysql.sql.gz': 'dump', 'repositories/git-a/a.git/HEAD': 'ref'});
      environment.remoteShell.touch(constants.REMOTE_CONFIGURED_FILE, constants.REMOTE_CLUSTER_FILE);
      environment.remoteShell.on(/^strongbox-cluster-nodes --role git-server$/, (): string => 'git-a online\n');
      let configFile: string | undefined;
      sinon.stub(environment.bulkTransfer, 'transfer').callsFake(async (request: TransferRequest): Promise<void> => {
        configFile = request.configFile;
        await environment.cleanup.interrupt('SIGINT');
        throw new Error('interrupted');
      });

      await expect(orchestrator.run({host: HOST, force: true, restoreSettings: false})).to.be.rejectedWith(
        StepFailedError,
        "Step 'repositories' failed",
      );

      expect(environment.exit).to.have.been.calledOnceWithExactly(constants.EXIT_CODE_INTERRUPTED);
      expect(environment.remoteShell.publishedStatuses()).to.deep.equal(['restoring', 'failed']);
      expect(orchestrator.session?.state).to.equal(RestoreState.FAILED);
      expect(configFile).to.be.a('string');
      expect(fs.existsSync(path.dirname(configFile ?? ''))).to.be.false;
      expect(environment.cleanup.openScopes).to.equal(0);
    });
  });
});
