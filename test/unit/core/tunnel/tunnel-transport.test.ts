// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import path from 'node:path';
import sinon, {type SinonStub} from 'sinon';
import {type ActiveTunnel} from '../../../../src/core/tunnel/tunnel-transport.js';
import {FanOutError} from '../../../../src/core/tunnel/fan-out-error.js';
import {RemoteTarget} from '../../../../src/core/topology/remote-target.js';
import {ClusterNode} from '../../../../src/core/topology/cluster-node.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {createTestEnvironment, removeTestEnvironment, type TestEnvironment} from '../../../helpers/test-environment.js';

function member(hostname: string): ClusterNode {
  return new ClusterNode(hostname, 122, 'git-server', true);
}

describe('TunnelTransport', (): void => {
  let environment: TestEnvironment;
  const entry: RemoteTarget = new RemoteTarget('entry.example', 122);
  const members: ClusterNode[] = [member('a'), member('b'), member('c')];

  beforeEach((): void => {
    environment = createTestEnvironment();
  });

  afterEach((): void => {
    removeTestEnvironment(environment);
    sinon.restore();
  });

  describe('firstSuccess', (): void => {
    it('should act only on the first member the predicate accepts', async (): Promise<void> => {
      const probed: string[] = [];
      const acted: string[] = [];

      const chosen: ClusterNode | undefined = await environment.transport.firstSuccess(
        members,
        async (candidate: ClusterNode): Promise<boolean> => {
          probed.push(candidate.hostname);
          return candidate.hostname === 'b';
        },
        async (candidate: ClusterNode): Promise<void> => {
          acted.push(candidate.hostname);
        },
      );

      expect(chosen?.hostname).to.equal('b');
      expect(probed).to.deep.equal(['a', 'b']);
      expect(acted).to.deep.equal(['b']);
    });

    it('should treat a failing probe as not accepting', async (): Promise<void> => {
      const acted: string[] = [];

      await environment.transport.firstSuccess(
        members,
        async (candidate: ClusterNode): Promise<boolean> => {
          if (candidate.hostname === 'a') {
            throw new Error('unreachable');
          }
          return true;
        },
        async (candidate: ClusterNode): Promise<void> => {
          acted.push(candidate.hostname);
        },
      );

      expect(acted).to.deep.equal(['b']);
    });

    it('should do nothing when no member is accepted', async (): Promise<void> => {
      const action: SinonStub<[ClusterNode], Promise<void>> = sinon.stub<[ClusterNode], Promise<void>>();

      const chosen: ClusterNode | undefined = await environment.transport.firstSuccess(
        members,
        async (): Promise<boolean> => false,
        action,
      );

      expect(chosen).to.be.undefined;
      expect(action).not.to.have.been.called;
    });
  });

  describe('fanOut', (): void => {
    it('should visit every member and rethrow a single failure as is', async (): Promise<void> => {
      const visited: string[] = [];
      const failure: Error = new Error('disk full on b');

      await expect(
        environment.transport.fanOut(members, async (candidate: ClusterNode): Promise<void> => {
          visited.push(candidate.hostname);
          if (candidate.hostname === 'b') {
            throw failure;
          }
        }),
      ).to.be.rejectedWith(failure);
      expect([...visited].sort()).to.deep.equal(['a', 'b', 'c']);
    });

    it('should collect several failures into one error', async (): Promise<void> => {
      const rejection: unknown = await environment.transport
        .fanOut(members, async (candidate: ClusterNode): Promise<void> => {
          if (candidate.hostname !== 'a') {
            throw new Error(`failed on ${candidate.hostname}`);
          }
        })
        .then(
          (): undefined => undefined,
          (error: unknown): unknown => error,
        );

      expect(rejection).to.be.instanceOf(FanOutError);
      if (rejection instanceof FanOutError) {
        expect(rejection.failures.map((failure): string => failure.member.hostname).sort()).to.deep.equal(['b', 'c']);
      }
    });

    it('should keep at most transferConcurrency transfers in flight', async (): Promise<void> => {
      environment.configState.apply({dataDir: environment.configState.config.dataDir, transferConcurrency: 2});
      let inFlight: number = 0;
      let highest: number = 0;

      await environment.transport.fanOut(
        [...members, member('d'), member('e')],
        async (): Promise<void> => {
          inFlight++;
          highest = Math.max(highest, inFlight);
          await new Promise<void>((resolve): void => {
            setImmediate(resolve);
          });
          inFlight--;
        },
      );

      expect(highest).to.equal(2);
    });
  });

  describe('withTunnel', (): void => {
    it('should remove its configuration when the body fails', async (): Promise<void> => {
      let configFile: string = '';

      await expect(
        environment.transport.withTunnel(
          environment.transport.buildTunnel(entry, [member('a')]),
          async (tunnel: ActiveTunnel): Promise<void> => {
            configFile = tunnel.configFile;
            throw new Error('transfer failed');
          },
        ),
      ).to.be.rejectedWith(Error, 'transfer failed');

      expect(configFile).not.to.equal('');
      expect(fs.existsSync(path.dirname(configFile))).to.be.false;
      expect(environment.cleanup.openScopes).to.equal(0);
    });

    it('should route members through the tunnel and remove its configuration', async (): Promise<void> => {
      let configFile: string = '';

      await environment.transport.withTunnel(
        environment.transport.buildTunnel(entry, [member('entry.example'), member('a')]),
        async (tunnel: ActiveTunnel): Promise<void> => {
          configFile = tunnel.configFile;
          expect(fs.readFileSync(configFile, 'utf8')).to.contain('Host a\n');

          await environment.transport.runOverTunnel(tunnel, member('a'), 'hostname');
          await environment.transport.runOverTunnel(tunnel, member('entry.example'), 'hostname');
          await environment.transport.transferOverTunnel(tunnel, member('a'), {
            direction: 'pull',
            localPath: '/tmp/strongbox-test-local',
            remotePath: '/data/user/repositories',
          });
          await expect(environment.transport.runOverTunnel(tunnel, member('z'), 'hostname')).to.be.rejectedWith(
            IllegalArgumentError,
            'z is not reachable through this tunnel',
          );
        },
      );

      const routes: Array<[string, string | undefined]> = environment.remoteShell.calls.map(
        (call): [string, string | undefined] => [call.host, call.options.configFile],
      );
      expect(routes).to.deep.equal([
        ['a', configFile],
        ['entry.example', undefined],
      ]);
      expect(environment.bulkTransfer.requests[0]).to.deep.include({configFile, direction: 'pull'});
      expect(environment.bulkTransfer.requests[0].target.host).to.equal('a');
      expect(fs.existsSync(configFile)).to.be.false;
    });
  });
});
