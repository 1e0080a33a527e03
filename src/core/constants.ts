// SPDX-License-Identifier: Apache-2.0

import {PRESET_TIMER} from 'listr2';
import os from 'node:os';
import path from 'node:path';

export function getEnvironmentVariable(name: string): string | undefined {
  const value: string | undefined = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

// -------------------- strongbox related constants ----------------------------------------------------------------
export const STRONGBOX_HOME_DIR: string =
  getEnvironmentVariable('STRONGBOX_HOME') || path.join(os.homedir(), '.strongbox');
export const STRONGBOX_LOG_LEVEL: string = getEnvironmentVariable('STRONGBOX_LOG_LEVEL') || 'info';
export const DEFAULT_CONFIG_FILE_NAME: string = 'strongbox.yaml';
export const CONFIG_FILE_ENVIRONMENT_VARIABLE: string = 'STRONGBOX_CONFIG';
export const DEFAULT_DATA_DIR: string = './data';

// -------------------- snapshot layout ----------------------------------------------------------------------------
export const SNAPSHOT_CURRENT_LINK: string = 'current';
export const SNAPSHOT_STRATEGY_FILE: string = 'strategy';
export const SNAPSHOT_VERSION_FILE: string = 'version';
export const SNAPSHOT_INCOMPLETE_FILE: string = 'incomplete';
export const SNAPSHOT_LOCK_FILE: string = 'in-progress';
export const SNAPSHOT_ID_PATTERN: RegExp = /^\d{8}T\d{6}(-\d+)?$/;
export const SNAPSHOT_SETTINGS_FILE: string = 'settings/settings.json';
export const SNAPSHOT_LICENSE_FILE: string = 'settings/license';
export const SNAPSHOT_UUID_FILE: string = 'uuid/uuid';
export const SNAPSHOT_MYSQL_DUMP_FILE: string = 'mysql/mysql.sql.gz';
export const SNAPSHOT_SSH_HOST_KEYS_FILE: string = 'ssh-host-keys/ssh-host-keys.tar';
export const COMPARE_CHUNK_SIZE: number = 1024 * 1024;

// -------------------- remote appliance layout --------------------------------------------------------------------
export const DEFAULT_SSH_USER: string = 'admin';
export const DEFAULT_SSH_PORT: number = 122;
export const HOSTNAME_PATTERN: RegExp = /^[A-Za-z0-9][A-Za-z0-9.-]*$/;
export const REMOTE_RELEASE_FILE: string = '/etc/strongbox/appliance-release';
export const REMOTE_CONFIGURED_FILE: string = '/etc/strongbox/configured';
export const REMOTE_CLUSTER_FILE: string = '/etc/strongbox/cluster';
export const REMOTE_REPLICATION_STATE_FILE: string = '/etc/strongbox/repl-state';
export const REMOTE_DATA_USER_DIR: string = '/data/user';
export const REMOTE_MAINTENANCE_FILE: string = `${REMOTE_DATA_USER_DIR}/common/maintenance`;
export const REMOTE_RESTORE_STATUS_FILE: string = `${REMOTE_DATA_USER_DIR}/common/restore-status`;
export const REMOTE_UUID_FILE: string = `${REMOTE_DATA_USER_DIR}/common/uuid`;
export const REMOTE_STAGING_DIR: string = `${REMOTE_DATA_USER_DIR}/restore-staging`;
export const REMOTE_RSYNC_PATH: string = 'sudo -u git rsync';

// appliance-side tools, invoked as opaque remote commands
export const REMOTE_CLUSTER_NODES_COMMAND: string = 'strongbox-cluster-nodes';
export const REMOTE_SERVICE_ENSURE_COMMAND: string = 'sudo strongbox-service-ensure mysql elasticsearch';
export const REMOTE_CONFIG_APPLY_COMMAND: string = 'sudo strongbox-config-apply';
export const REMOTE_CLUSTER_CONFIG_APPLY_COMMAND: string = 'sudo strongbox-cluster-config-apply';
export const REMOTE_ES_IMPORT_COMMAND: string = 'sudo strongbox-es-import';
export const REMOTE_EXPORT_SETTINGS_COMMAND: string = 'sudo strongbox-export-settings';
export const REMOTE_IMPORT_SETTINGS_COMMAND: string = 'sudo strongbox-import-settings';
export const REMOTE_EXPORT_LICENSE_COMMAND: string = 'sudo strongbox-export-license';
export const REMOTE_IMPORT_LICENSE_COMMAND: string = 'sudo strongbox-import-license';
export const REMOTE_EXPORT_MYSQL_COMMAND: string = 'sudo strongbox-export-mysql';
export const REMOTE_IMPORT_MYSQL_COMMAND: string = 'sudo strongbox-import-mysql';
export const REMOTE_EXPORT_TARBALL_COMMAND: string = 'sudo strongbox-export-tarball';
export const REMOTE_IMPORT_TARBALL_COMMAND: string = 'sudo strongbox-import-tarball';
export const REMOTE_EXPORT_SSH_HOST_KEYS_COMMAND: string = 'sudo strongbox-export-ssh-host-keys';
export const REMOTE_IMPORT_SSH_HOST_KEYS_COMMAND: string = 'sudo strongbox-import-ssh-host-keys';
export const REMOTE_GIT_HOOKS_ENVIRONMENTS_DIR: string = `${REMOTE_DATA_USER_DIR}/git-hooks/environments`;
export const REMOTE_SAML_KEYS_DIR: string = `${REMOTE_DATA_USER_DIR}/common/saml-keys`;

// -------------------- versions -----------------------------------------------------------------------------------
export const MINIMUM_SUPPORTED_LEGACY_VERSION: string = '11.10.340';
export const MINIMUM_SUPPORTED_VERSION: string = '2.0.0';
export const MINIMUM_CLUSTER_SNAPSHOT_VERSION: string = '2.5.0';
export const LEGACY_MAJOR_VERSION: number = 11;

// -------------------- transfers ----------------------------------------------------------------------------------
export const DEFAULT_TRANSFER_CONCURRENCY: number = 4;
export const DEFAULT_NUM_SNAPSHOTS: number = 10;
export const SSH_SERVER_ALIVE_INTERVAL: number = 60;
export const TUNNEL_PROXY_NETCAT: string = 'nc';

// -------------------- listr --------------------------------------------------------------------------------------
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION: typeof PRESET_TIMER = {
  ...PRESET_TIMER,
  condition: (duration: number): boolean => duration > 100,
};
export const LISTR_SILENT: boolean = Boolean(getEnvironmentVariable('STRONGBOX_SILENT_TASKS'));

export const EXIT_CODE_SUCCESS: number = 0;
export const EXIT_CODE_FAILURE: number = 1;
export const EXIT_CODE_INTERRUPTED: number = 130;
