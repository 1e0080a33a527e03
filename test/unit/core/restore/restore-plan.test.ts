// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {buildRestorePlan} from '../../../../src/core/restore/restore-plan.js';
import {RestoreSession} from '../../../../src/core/restore/restore-session.js';
import {buildPlan, type DatastoreStep, type StepName} from '../../../../src/core/datastores/datastore-step.js';
import {RemoteTarget} from '../../../../src/core/topology/remote-target.js';
import {type BackupStrategy} from '../../../../src/core/snapshot/backup-strategy.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

function session(
  facts: {isCluster: boolean; isConfigured: boolean; restoreSettings: boolean},
  strategy: BackupStrategy = 'rsync',
  hasUuid: boolean = true,
): RestoreSession {
  const result: RestoreSession = new RestoreSession(
    new RemoteTarget('appliance.example', 122),
    {id: '20240102T030405', path: '/tmp/strongbox-test', strategy, version: '2.6.0', committed: true},
    hasUuid,
  );
  result.isCluster = facts.isCluster;
  result.isConfigured = facts.isConfigured;
  result.restoreSettings = facts.restoreSettings;
  return result;
}

function names(steps: DatastoreStep<RestoreSession>[]): StepName[] {
  return steps.map((step): StepName => step.name);
}

describe('restore plan', (): void => {
  it('should order the steps of a configured standalone target', (): void => {
    const plan: DatastoreStep<RestoreSession>[] = buildRestorePlan(
      session({isCluster: false, isConfigured: true, restoreSettings: false}),
    );

    expect(names(plan)).to.deep.equal([
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
      'config-apply',
      'ssh-host-keys',
    ]);
  });

  it('should skip the standalone-only steps on a cluster', (): void => {
    expect(
      names(buildRestorePlan(session({isCluster: true, isConfigured: true, restoreSettings: true}, 'cluster'))),
    ).to.deep.equal([
      'settings',
      'mysql',
      'repositories',
      'git-hooks',
      'pages',
      'storage',
      'saml-keys',
      'elasticsearch',
      'config-apply',
    ]);
  });

  it('should leave out the identity and configuration apply when there is nothing to apply them to', (): void => {
    expect(
      names(buildRestorePlan(session({isCluster: false, isConfigured: false, restoreSettings: true}, 'rsync', false))),
    ).to.deep.equal([
      'settings',
      'services',
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
  });

  it('should run ssh host keys last and after complete', (): void => {
    const plan: DatastoreStep<RestoreSession>[] = buildRestorePlan(
      session({isCluster: false, isConfigured: true, restoreSettings: true}),
    );

    expect(plan.at(-1)?.name).to.equal('ssh-host-keys');
    expect(names(plan.filter((step): boolean => step.phase === 'after-complete'))).to.deep.equal([
      'config-apply',
      'ssh-host-keys',
    ]);
  });
});

describe('buildPlan', (): void => {
  const step = (name: StepName, dependsOn: StepName[] = []): DatastoreStep<object> => ({
    name,
    rationale: 'test',
    dependsOn,
    phase: 'main',
    applies: (): boolean => true,
  });

  it('should refuse a step ordered before an applicable dependency', (): void => {
    expect((): DatastoreStep<object>[] => buildPlan([step('repositories', ['mysql']), step('mysql')], {})).to.throw(
      IllegalArgumentError,
      "Step 'repositories' must run after 'mysql'",
    );
  });

  it('should ignore a dependency that does not apply', (): void => {
    expect(buildPlan([step('repositories', ['mysql'])], {}).map((entry): StepName => entry.name)).to.deep.equal([
      'repositories',
    ]);
  });

  it('should refuse a step listed twice', (): void => {
    expect((): DatastoreStep<object>[] => buildPlan([step('mysql'), step('mysql')], {})).to.throw(
      IllegalArgumentError,
      "Step 'mysql' is listed more than once",
    );
  });
});
