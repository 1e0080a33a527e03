// SPDX-License-Identifier: Apache-2.0

import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type RemoteShell} from '../../integration/ssh/remote-shell.js';
import {type BulkTransfer} from '../../integration/rsync/bulk-transfer.js';
import {type ActiveTunnel, type TunnelTransport} from '../tunnel/tunnel-transport.js';
import {type TopologyResolver} from '../topology/topology-resolver.js';
import {type ClusterNode, type NodeRole} from '../topology/cluster-node.js';
import {type RoutineContext, type RoutineSource, type RoutineTable} from './routine.js';
import * as constants from '../constants.js';

/**
 * Collaborators and path conventions shared by the backup and the restore routines.
 */
export abstract class DatastoreRoutines implements RoutineSource {
  protected constructor(
    protected readonly logger: StrongboxLogger,
    protected readonly remoteShell: RemoteShell,
    protected readonly bulkTransfer: BulkTransfer,
    protected readonly transport: TunnelTransport,
    protected readonly resolver: TopologyResolver,
  ) {}

  public abstract table(): RoutineTable;

  protected static remoteDirectory(datastore: string): string {
    return `${constants.REMOTE_DATA_USER_DIR}/${datastore}`;
  }

  protected static tarballFile(datastore: string): string {
    return `${datastore}/${datastore}.tar`;
  }

  /**
   * Opens a tunnel to the online members holding `role` and runs `body` inside it.
   * No online member means there is nothing to do.
   */
  protected async acrossMembers(
    context: RoutineContext,
    role: NodeRole,
    body: (tunnel: ActiveTunnel, members: ClusterNode[]) => Promise<void>,
  ): Promise<void> {
    const members: ClusterNode[] = await this.resolver.membersWithRole(context.target, role);
    if (members.length === 0) {
      this.logger.warn(`no online ${role} member found through ${context.target.host}, nothing to do`);
      return;
    }
    await this.transport.withTunnel(
      this.transport.buildTunnel(context.target, members),
      async (tunnel: ActiveTunnel): Promise<void> => body(tunnel, members),
    );
  }
}
