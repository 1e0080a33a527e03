// SPDX-License-Identifier: Apache-2.0

import {buildPlan, type DatastoreStep} from '../datastores/datastore-step.js';
import {type RemoteTarget} from '../topology/remote-target.js';
import {type Snapshot} from '../snapshot/snapshot.js';
import {type BackupStrategy} from '../snapshot/backup-strategy.js';

export interface BackupSession {
  readonly target: RemoteTarget;
  readonly snapshot: Snapshot;
  readonly strategy: BackupStrategy;
  readonly isCluster: boolean;
  readonly hasUuid: boolean;
}

const standalone = (session: BackupSession): boolean => !session.isCluster;
const always = (): boolean => true;

function step(
  name: DatastoreStep<BackupSession>['name'],
  rationale: string,
  applies: (session: BackupSession) => boolean = always,
): DatastoreStep<BackupSession> {
  return {name, rationale, dependsOn: [], phase: 'main', applies};
}

/** Backup order, the same datastore order a restore uses. */
export const BACKUP_STEPS: readonly DatastoreStep<BackupSession>[] = [
  step('settings', 'configuration and license'),
  step('ssh-host-keys', 'host key material of a standalone appliance', standalone),
  step('uuid', 'appliance identity', (session: BackupSession): boolean => standalone(session) && session.hasUuid),
  step('mysql', 'metadata database dump'),
  step('repositories', 'repository data'),
  step('git-hooks', 'shared hook configuration'),
  step('pages', 'page content'),
  step('assets', 'per-appliance blob storage', standalone),
  step(
    'storage',
    'blob storage sharded across storage servers',
    (session: BackupSession): boolean => session.isCluster,
  ),
  step('hookshot', 'webhook delivery logs', standalone),
  step('saml-keys', 'credentials'),
  step('elasticsearch', 'search indices'),
];

export function buildBackupPlan(session: BackupSession): DatastoreStep<BackupSession>[] {
  return buildPlan(BACKUP_STEPS, session);
}
