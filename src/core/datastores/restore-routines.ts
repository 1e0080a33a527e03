// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type RemoteShell} from '../../integration/ssh/remote-shell.js';
import {type BulkTransfer} from '../../integration/rsync/bulk-transfer.js';
import {type ActiveTunnel, type TunnelTransport} from '../tunnel/tunnel-transport.js';
import {type TopologyResolver} from '../topology/topology-resolver.js';
import {type ClusterNode, type NodeRole} from '../topology/cluster-node.js';
import {StrongboxError} from '../errors/strongbox-error.js';
import {DatastoreRoutines} from './datastore-routines.js';
import {type Routine, type RoutineContext, type RoutineKey, type RoutineTable} from './routine.js';
import * as constants from '../constants.js';

/**
 * Puts each datastore of a snapshot back onto the target. Sharded cluster data goes to the member named by its
 * shard directory; everything else goes to the entry host.
 */
@injectable()
export class RestoreRoutines extends DatastoreRoutines {
  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RemoteShell) remoteShell?: RemoteShell,
    @inject(InjectTokens.BulkTransfer) bulkTransfer?: BulkTransfer,
    @inject(InjectTokens.TunnelTransport) transport?: TunnelTransport,
    @inject(InjectTokens.TopologyResolver) resolver?: TopologyResolver,
  ) {
    super(
      patchInject(logger, InjectTokens.StrongboxLogger, RestoreRoutines.name),
      patchInject(remoteShell, InjectTokens.RemoteShell, RestoreRoutines.name),
      patchInject(bulkTransfer, InjectTokens.BulkTransfer, RestoreRoutines.name),
      patchInject(transport, InjectTokens.TunnelTransport, RestoreRoutines.name),
      patchInject(resolver, InjectTokens.TopologyResolver, RestoreRoutines.name),
    );
  }

  public table(): RoutineTable {
    const perAppliance = (datastore: string): Partial<Record<RoutineKey, Routine>> => ({
      rsync: async (context: RoutineContext): Promise<void> => this.pushDirectory(context, datastore),
      tarball: async (context: RoutineContext): Promise<void> => this.importTarball(context, datastore),
    });

    return {
      settings: {any: async (context: RoutineContext): Promise<void> => this.importSettings(context)},
      services: {
        any: async (context: RoutineContext): Promise<void> =>
          this.run(context, constants.REMOTE_SERVICE_ENSURE_COMMAND),
      },
      uuid: {
        any: async (context: RoutineContext): Promise<void> =>
          this.importFile(context, constants.SNAPSHOT_UUID_FILE, `sudo tee ${constants.REMOTE_UUID_FILE} >/dev/null`),
      },
      mysql: {
        any: async (context: RoutineContext): Promise<void> =>
          this.importFile(context, constants.SNAPSHOT_MYSQL_DUMP_FILE, constants.REMOTE_IMPORT_MYSQL_COMMAND, true),
      },
      repositories: {
        ...perAppliance('repositories'),
        cluster: async (context: RoutineContext): Promise<void> =>
          this.pushShards(context, 'repositories', 'git-server'),
      },
      'git-hooks': {
        ...perAppliance('git-hooks'),
        cluster: async (context: RoutineContext): Promise<void> =>
          this.pushToMembers(context, 'git-hooks', 'git-server'),
      },
      pages: {
        ...perAppliance('pages'),
        cluster: async (context: RoutineContext): Promise<void> => this.pushShards(context, 'pages', 'pages-server'),
      },
      assets: perAppliance('assets'),
      storage: {
        cluster: async (context: RoutineContext): Promise<void> =>
          this.pushShards(context, 'storage', 'storage-server'),
      },
      hookshot: perAppliance('hookshot'),
      'saml-keys': {
        any: async (context: RoutineContext): Promise<void> =>
          this.pushDirectory(context, 'saml-keys', constants.REMOTE_SAML_KEYS_DIR),
      },
      elasticsearch: {
        any: async (context: RoutineContext): Promise<void> => this.importSearchIndices(context),
        tarball: async (context: RoutineContext): Promise<void> => this.importTarball(context, 'elasticsearch'),
      },
      'config-apply': {
        any: async (context: RoutineContext): Promise<void> => this.run(context, constants.REMOTE_CONFIG_APPLY_COMMAND),
        cluster: async (context: RoutineContext): Promise<void> =>
          this.run(context, constants.REMOTE_CLUSTER_CONFIG_APPLY_COMMAND),
      },
      'ssh-host-keys': {
        any: async (context: RoutineContext): Promise<void> =>
          this.importFile(
            context,
            constants.SNAPSHOT_SSH_HOST_KEYS_FILE,
            constants.REMOTE_IMPORT_SSH_HOST_KEYS_COMMAND,
          ),
      },
    };
  }

  private async run(context: RoutineContext, command: string): Promise<void> {
    await this.remoteShell.exec(context.target, command);
  }

  private async importSettings(context: RoutineContext): Promise<void> {
    await this.importFile(context, constants.SNAPSHOT_SETTINGS_FILE, constants.REMOTE_IMPORT_SETTINGS_COMMAND);
    await this.importFile(
      context,
      constants.SNAPSHOT_LICENSE_FILE,
      constants.REMOTE_IMPORT_LICENSE_COMMAND,
      false,
      false,
    );
  }

  /** Feeds a snapshot file to a remote import command on stdin. */
  private async importFile(
    context: RoutineContext,
    relative: string,
    command: string,
    gunzip: boolean = false,
    required: boolean = true,
  ): Promise<void> {
    const file: string = path.join(context.snapshot.path, relative);
    if (!fs.existsSync(file)) {
      if (required) {
        throw new StrongboxError(`Snapshot ${context.snapshot.id} has no ${relative}`);
      }
      this.logger.debug(`snapshot ${context.snapshot.id} has no ${relative}, skipping`);
      return;
    }
    await this.remoteShell.exec(context.target, command, {inputFile: file, gunzipInput: gunzip});
  }

  private async importTarball(context: RoutineContext, datastore: string): Promise<void> {
    await this.importFile(
      context,
      DatastoreRoutines.tarballFile(datastore),
      `${constants.REMOTE_IMPORT_TARBALL_COMMAND} ${datastore}`,
    );
  }

  private async pushDirectory(
    context: RoutineContext,
    datastore: string,
    remotePath: string = DatastoreRoutines.remoteDirectory(datastore),
  ): Promise<void> {
    const localPath: string = path.join(context.snapshot.path, datastore);
    if (!fs.existsSync(localPath)) {
      this.logger.debug(`snapshot ${context.snapshot.id} has no ${datastore} data, skipping`);
      return;
    }
    await this.bulkTransfer.transfer({
      target: context.target,
      direction: 'push',
      localPath,
      remotePath,
      deleteExtraneous: true,
    });
  }

  /** Search indices are staged on the target and imported from there. */
  private async importSearchIndices(context: RoutineContext): Promise<void> {
    const staging: string = `${constants.REMOTE_STAGING_DIR}/elasticsearch`;
    if (!fs.existsSync(path.join(context.snapshot.path, 'elasticsearch'))) {
      this.logger.debug(`snapshot ${context.snapshot.id} has no search indices, skipping`);
      return;
    }
    await this.pushDirectory(context, 'elasticsearch', staging);
    await this.run(context, `${constants.REMOTE_ES_IMPORT_COMMAND} ${staging}`);
  }

  /**
   * Cluster snapshots keep sharded data as `<datastore>/<hostname>/`; each shard goes back to its member, and
   * every shard must have an online member to go to. Data from a standalone snapshot is not sharded and is sent
   * to every member of the role instead.
   */
  private async pushShards(context: RoutineContext, datastore: string, role: NodeRole): Promise<void> {
    if (context.strategy !== 'cluster') {
      return this.pushToMembers(context, datastore, role);
    }
    const root: string = path.join(context.snapshot.path, datastore);
    if (!fs.existsSync(root)) {
      this.logger.debug(`snapshot ${context.snapshot.id} has no ${datastore} shards, skipping`);
      return;
    }
    const shards: string[] = fs
      .readdirSync(root, {withFileTypes: true})
      .filter((entry): boolean => entry.isDirectory())
      .map((entry): string => entry.name)
      .sort();

    await this.acrossMembers(context, role, async (tunnel: ActiveTunnel, members: ClusterNode[]): Promise<void> => {
      const missing: string[] = shards.filter(
        (hostname): boolean => !members.some((member): boolean => member.hostname === hostname),
      );
      if (missing.length > 0) {
        throw new StrongboxError(`No online ${role} member for the ${datastore} shard(s) of ${missing.join(', ')}`);
      }
      const owners: ClusterNode[] = members.filter((member): boolean => shards.includes(member.hostname));
      await this.transport.fanOut(owners, async (member: ClusterNode): Promise<void> =>
        this.transport.transferOverTunnel(tunnel, member, {
          direction: 'push',
          localPath: path.join(root, member.hostname),
          remotePath: DatastoreRoutines.remoteDirectory(datastore),
        }),
      );
    });
  }

  /** The same data to every member of the role. */
  private async pushToMembers(context: RoutineContext, datastore: string, role: NodeRole): Promise<void> {
    const localPath: string = path.join(context.snapshot.path, datastore);
    if (!fs.existsSync(localPath)) {
      this.logger.debug(`snapshot ${context.snapshot.id} has no ${datastore} data, skipping`);
      return;
    }
    await this.acrossMembers(context, role, async (tunnel: ActiveTunnel, members: ClusterNode[]): Promise<void> =>
      this.transport.fanOut(members, async (member: ClusterNode): Promise<void> =>
        this.transport.transferOverTunnel(tunnel, member, {
          direction: 'push',
          localPath,
          remotePath: DatastoreRoutines.remoteDirectory(datastore),
        }),
      ),
    );
  }
}
