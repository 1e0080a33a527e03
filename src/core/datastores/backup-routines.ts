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
import {DatastoreRoutines} from './datastore-routines.js';
import {type Routine, type RoutineContext, type RoutineKey, type RoutineTable} from './routine.js';
import * as constants from '../constants.js';

/**
 * Copies each datastore of the target into a snapshot, the mirror image of {@link RestoreRoutines}.
 */
@injectable()
export class BackupRoutines extends DatastoreRoutines {
  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RemoteShell) remoteShell?: RemoteShell,
    @inject(InjectTokens.BulkTransfer) bulkTransfer?: BulkTransfer,
    @inject(InjectTokens.TunnelTransport) transport?: TunnelTransport,
    @inject(InjectTokens.TopologyResolver) resolver?: TopologyResolver,
  ) {
    super(
      patchInject(logger, InjectTokens.StrongboxLogger, BackupRoutines.name),
      patchInject(remoteShell, InjectTokens.RemoteShell, BackupRoutines.name),
      patchInject(bulkTransfer, InjectTokens.BulkTransfer, BackupRoutines.name),
      patchInject(transport, InjectTokens.TunnelTransport, BackupRoutines.name),
      patchInject(resolver, InjectTokens.TopologyResolver, BackupRoutines.name),
    );
  }

  public table(): RoutineTable {
    const perAppliance = (datastore: string): Partial<Record<RoutineKey, Routine>> => ({
      rsync: async (context: RoutineContext): Promise<void> => this.pullDirectory(context, datastore),
      tarball: async (context: RoutineContext): Promise<void> => this.exportTarball(context, datastore),
    });

    return {
      settings: {
        any: async (context: RoutineContext): Promise<void> => {
          await this.exportFile(context, constants.SNAPSHOT_SETTINGS_FILE, constants.REMOTE_EXPORT_SETTINGS_COMMAND);
          await this.exportFile(context, constants.SNAPSHOT_LICENSE_FILE, constants.REMOTE_EXPORT_LICENSE_COMMAND);
        },
      },
      'ssh-host-keys': {
        any: async (context: RoutineContext): Promise<void> =>
          this.exportFile(
            context,
            constants.SNAPSHOT_SSH_HOST_KEYS_FILE,
            constants.REMOTE_EXPORT_SSH_HOST_KEYS_COMMAND,
          ),
      },
      uuid: {
        any: async (context: RoutineContext): Promise<void> =>
          this.exportFile(context, constants.SNAPSHOT_UUID_FILE, `cat ${constants.REMOTE_UUID_FILE}`),
      },
      mysql: {
        any: async (context: RoutineContext): Promise<void> =>
          this.exportFile(context, constants.SNAPSHOT_MYSQL_DUMP_FILE, constants.REMOTE_EXPORT_MYSQL_COMMAND, true),
      },
      repositories: {
        ...perAppliance('repositories'),
        cluster: async (context: RoutineContext): Promise<void> =>
          this.pullShards(context, 'repositories', 'git-server'),
      },
      'git-hooks': {
        ...perAppliance('git-hooks'),
        cluster: async (context: RoutineContext): Promise<void> => this.pullHookEnvironments(context),
      },
      pages: {
        ...perAppliance('pages'),
        cluster: async (context: RoutineContext): Promise<void> => this.pullShards(context, 'pages', 'pages-server'),
      },
      assets: perAppliance('assets'),
      storage: {
        cluster: async (context: RoutineContext): Promise<void> =>
          this.pullShards(context, 'storage', 'storage-server'),
      },
      hookshot: perAppliance('hookshot'),
      'saml-keys': {
        any: async (context: RoutineContext): Promise<void> =>
          this.pullDirectory(context, 'saml-keys', constants.REMOTE_SAML_KEYS_DIR),
      },
      elasticsearch: {
        any: async (context: RoutineContext): Promise<void> => this.pullDirectory(context, 'elasticsearch'),
        tarball: async (context: RoutineContext): Promise<void> => this.exportTarball(context, 'elasticsearch'),
      },
    };
  }

  /** Writes the stdout of a remote export command to a snapshot file. */
  private async exportFile(
    context: RoutineContext,
    relative: string,
    command: string,
    gzip: boolean = false,
  ): Promise<void> {
    const file: string = path.join(context.snapshot.path, relative);
    fs.mkdirSync(path.dirname(file), {recursive: true});
    await this.remoteShell.exec(context.target, command, {outputFile: file, gzipOutput: gzip});
  }

  private async exportTarball(context: RoutineContext, datastore: string): Promise<void> {
    await this.exportFile(
      context,
      DatastoreRoutines.tarballFile(datastore),
      `${constants.REMOTE_EXPORT_TARBALL_COMMAND} ${datastore}`,
    );
  }

  private async pullDirectory(
    context: RoutineContext,
    datastore: string,
    remotePath: string = DatastoreRoutines.remoteDirectory(datastore),
  ): Promise<void> {
    await this.bulkTransfer.transfer({
      target: context.target,
      direction: 'pull',
      localPath: path.join(context.snapshot.path, datastore),
      remotePath,
      dedupBase: context.dedupBase ? path.join(context.dedupBase, datastore) : undefined,
    });
  }

  /** Every member holds its own shard; each lands in `<datastore>/<hostname>/`. */
  private async pullShards(context: RoutineContext, datastore: string, role: NodeRole): Promise<void> {
    await this.acrossMembers(context, role, async (tunnel: ActiveTunnel, members: ClusterNode[]): Promise<void> =>
      this.transport.fanOut(members, async (member: ClusterNode): Promise<void> =>
        this.transport.transferOverTunnel(tunnel, member, {
          direction: 'pull',
          localPath: path.join(context.snapshot.path, datastore, member.hostname),
          remotePath: DatastoreRoutines.remoteDirectory(datastore),
          dedupBase: context.dedupBase ? path.join(context.dedupBase, datastore, member.hostname) : undefined,
        }),
      ),
    );
  }

  /** Hook environments are replicated to every git-server member; one copy, from the first member that has them. */
  private async pullHookEnvironments(context: RoutineContext): Promise<void> {
    await this.acrossMembers(
      context,
      'git-server',
      async (tunnel: ActiveTunnel, members: ClusterNode[]): Promise<void> => {
        await this.transport.firstSuccess(
          members,
          async (member: ClusterNode): Promise<boolean> => {
            const output: string = await this.transport.runOverTunnel(
              tunnel,
              member,
              `[ -d '${constants.REMOTE_GIT_HOOKS_ENVIRONMENTS_DIR}' ] && echo yes || echo no`,
            );
            return output.trim() === 'yes';
          },
          async (member: ClusterNode): Promise<void> =>
            this.transport.transferOverTunnel(tunnel, member, {
              direction: 'pull',
              localPath: path.join(context.snapshot.path, 'git-hooks'),
              remotePath: DatastoreRoutines.remoteDirectory('git-hooks'),
              dedupBase: context.dedupBase ? path.join(context.dedupBase, 'git-hooks') : undefined,
            }),
        );
      },
    );
  }
}
