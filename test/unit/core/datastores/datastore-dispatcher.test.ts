// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon, {type SinonStubbedInstance} from 'sinon';
import {DatastoreDispatcher} from '../../../../src/core/datastores/datastore-dispatcher.js';
import {type Routine, type RoutineSource, type RoutineTable} from '../../../../src/core/datastores/routine.js';
import {StrongboxPinoLogger} from '../../../../src/core/logging/strongbox-pino-logger.js';
import {StrongboxError} from '../../../../src/core/errors/strongbox-error.js';

function routine(): Routine {
  return async (): Promise<void> => undefined;
}

function source(table: RoutineTable): RoutineSource {
  return {table: (): RoutineTable => table};
}

describe('DatastoreDispatcher', (): void => {
  const clusterRepositories: Routine = routine();
  const rsyncRepositories: Routine = routine();
  const anyRepositories: Routine = routine();
  const clusterStorage: Routine = routine();
  const backupMysql: Routine = routine();
  let logger: SinonStubbedInstance<StrongboxPinoLogger>;
  let dispatcher: DatastoreDispatcher;

  beforeEach((): void => {
    logger = sinon.createStubInstance(StrongboxPinoLogger);
    dispatcher = new DatastoreDispatcher(
      logger,
      source({
        repositories: {cluster: clusterRepositories, rsync: rsyncRepositories, any: anyRepositories},
        storage: {cluster: clusterStorage},
      }),
      source({mysql: {any: backupMysql}}),
    );
  });

  afterEach((): void => {
    sinon.restore();
  });

  it('should prefer the cluster routine on a cluster whatever the strategy', (): void => {
    expect(dispatcher.routineFor('repositories', {isCluster: true, strategy: 'rsync'})).to.equal(clusterRepositories);
    expect(dispatcher.routineFor('repositories', {isCluster: true, strategy: 'tarball'})).to.equal(
      clusterRepositories,
    );
  });

  it('should use the routine of the strategy, then the strategy-independent one', (): void => {
    expect(dispatcher.routineFor('repositories', {isCluster: false, strategy: 'rsync'})).to.equal(rsyncRepositories);
    expect(dispatcher.routineFor('repositories', {isCluster: false, strategy: 'tarball'})).to.equal(anyRepositories);
  });

  it('should fail when no routine covers the step', (): void => {
    expect((): Routine => dispatcher.routineFor('storage', {isCluster: false, strategy: 'rsync'})).to.throw(
      StrongboxError,
      "No restore routine for step 'storage' (standalone, rsync)",
    );
    expect((): Routine => dispatcher.routineFor('uuid', {isCluster: true, strategy: 'cluster'})).to.throw(
      StrongboxError,
      "No restore routine for step 'uuid' (cluster, cluster)",
    );
  });

  it('should look backup routines up in their own table', (): void => {
    expect(dispatcher.backupRoutineFor('mysql', {isCluster: false, strategy: 'rsync'})).to.equal(backupMysql);
    expect((): Routine => dispatcher.backupRoutineFor('repositories', {isCluster: false, strategy: 'rsync'})).to.throw(
      StrongboxError,
      "No backup routine for step 'repositories'",
    );
  });

  it('should take the strategy recorded in the snapshot', (): void => {
    expect(dispatcher.resolveStrategy({snapshot: {strategy: 'tarball'}})).to.equal('tarball');
  });
});
