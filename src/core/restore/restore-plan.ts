// SPDX-License-Identifier: Apache-2.0

import {buildPlan, type DatastoreStep} from '../datastores/datastore-step.js';
import {type RestoreSession} from './restore-session.js';

const standalone = (session: RestoreSession): boolean => !session.isCluster;
const always = (): boolean => true;

/** Restore order. Steps run in this order; `dependsOn` is checked whenever a plan is built. */
export const RESTORE_STEPS: readonly DatastoreStep<RestoreSession>[] = [
  {
    name: 'settings',
    rationale: 'configuration and license come first, everything else reads them',
    dependsOn: [],
    phase: 'main',
    applies: (session: RestoreSession): boolean => session.restoreSettings,
  },
  {
    name: 'services',
    rationale: 'the databases must be running before anything is imported into them',
    dependsOn: ['settings'],
    phase: 'main',
    applies: standalone,
  },
  {
    name: 'uuid',
    rationale: 'the appliance identity is in place before its data',
    dependsOn: ['services'],
    phase: 'main',
    applies: (session: RestoreSession): boolean => standalone(session) && session.hasUuid,
  },
  {
    name: 'mysql',
    rationale: 'metadata referenced by every later datastore',
    dependsOn: ['services', 'uuid'],
    phase: 'main',
    applies: always,
  },
  {
    name: 'repositories',
    rationale: 'repository data, referenced by the database',
    dependsOn: ['mysql'],
    phase: 'main',
    applies: always,
  },
  {
    name: 'git-hooks',
    rationale: 'shared hook configuration, identical on every git server',
    dependsOn: ['mysql'],
    phase: 'main',
    applies: always,
  },
  {name: 'pages', rationale: 'page content', dependsOn: ['mysql'], phase: 'main', applies: always},
  {name: 'assets', rationale: 'per-appliance blob storage', dependsOn: ['mysql'], phase: 'main', applies: standalone},
  {
    name: 'storage',
    rationale: 'blob storage sharded across storage servers',
    dependsOn: ['mysql'],
    phase: 'main',
    applies: (session: RestoreSession): boolean => session.isCluster,
  },
  {name: 'hookshot', rationale: 'webhook delivery logs', dependsOn: ['mysql'], phase: 'main', applies: standalone},
  {name: 'saml-keys', rationale: 'credentials', dependsOn: ['settings'], phase: 'main', applies: always},
  {
    name: 'elasticsearch',
    rationale: 'search indices are derived from repository and database content',
    dependsOn: ['mysql', 'repositories'],
    phase: 'main',
    applies: always,
  },
  {
    name: 'config-apply',
    rationale: 'migrations run against the freshly restored data',
    dependsOn: ['elasticsearch'],
    phase: 'after-complete',
    bestEffort: true,
    applies: (session: RestoreSession): boolean => session.isCluster || session.isConfigured,
  },
  {
    name: 'ssh-host-keys',
    rationale: 'new host keys can break the control channel, so they go last',
    dependsOn: ['config-apply'],
    phase: 'after-complete',
    applies: standalone,
  },
];

export function buildRestorePlan(session: RestoreSession): DatastoreStep<RestoreSession>[] {
  return buildPlan(RESTORE_STEPS, session);
}
