// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {RestoreSession} from '../../../../src/core/restore/restore-session.js';
import {canTransition, isTerminal, RestoreState} from '../../../../src/core/restore/restore-state.js';
import {RemoteTarget} from '../../../../src/core/topology/remote-target.js';
import {type CommittedSnapshot} from '../../../../src/core/snapshot/snapshot.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

const SNAPSHOT: CommittedSnapshot = {
  id: '20240102T030405',
  path: '/tmp/strongbox-test/20240102T030405',
  strategy: 'tarball',
  version: '11.10.344',
  committed: true,
};

describe('RestoreState', (): void => {
  it('should only move forward', (): void => {
    expect(canTransition(RestoreState.INIT, RestoreState.VALIDATING)).to.be.true;
    expect(canTransition(RestoreState.VALIDATING, RestoreState.RESTORING)).to.be.true;
    expect(canTransition(RestoreState.RESTORING, RestoreState.COMPLETE)).to.be.true;
    expect(canTransition(RestoreState.VALIDATING, RestoreState.FAILED)).to.be.true;
    expect(canTransition(RestoreState.INIT, RestoreState.RESTORING)).to.be.false;
    expect(canTransition(RestoreState.COMPLETE, RestoreState.FAILED)).to.be.false;
  });

  it('should treat complete and failed as terminal', (): void => {
    expect(isTerminal(RestoreState.COMPLETE)).to.be.true;
    expect(isTerminal(RestoreState.FAILED)).to.be.true;
    expect(isTerminal(RestoreState.RESTORING)).to.be.false;
  });
});

describe('RestoreSession', (): void => {
  it('should take its strategy from the snapshot', (): void => {
    const session: RestoreSession = new RestoreSession(new RemoteTarget('appliance.example', 122), SNAPSHOT, false);

    expect(session.strategy).to.equal('tarball');
    expect(session.host).to.equal('appliance.example');
    expect(session.state).to.equal(RestoreState.INIT);
  });

  it('should record its transitions and refuse invalid ones', (): void => {
    const session: RestoreSession = new RestoreSession(new RemoteTarget('appliance.example', 122), SNAPSHOT, false);
    session.transitionTo(RestoreState.VALIDATING);

    expect((): void => session.transitionTo(RestoreState.COMPLETE)).to.throw(
      IllegalArgumentError,
      'Invalid restore state transition validating -> complete',
    );
    session.transitionTo(RestoreState.FAILED);
    expect(session.history).to.deep.equal([RestoreState.INIT, RestoreState.VALIDATING, RestoreState.FAILED]);
  });
});
