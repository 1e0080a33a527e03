// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type RemoteShell} from '../../integration/ssh/remote-shell.js';
import {type BackupConfigRuntimeState} from '../config/backup-config-runtime-state.js';
import {type RemoteTarget} from './remote-target.js';
import {ClusterNode, type NodeRole} from './cluster-node.js';
import * as constants from '../constants.js';

/**
 * Asks the cluster control plane, through the entry host, which members hold a role.
 */
@injectable()
export class TopologyResolver {
  private readonly logger: StrongboxLogger;
  private readonly remoteShell: RemoteShell;
  private readonly configState: BackupConfigRuntimeState;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RemoteShell) remoteShell?: RemoteShell,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.remoteShell = patchInject(remoteShell, InjectTokens.RemoteShell, this.constructor.name);
    this.configState = patchInject(configState, InjectTokens.BackupConfigRuntimeState, this.constructor.name);
  }

  /**
   * Online members with the role, ordered by hostname. A failed query yields no members; callers treat that as
   * nothing to do.
   */
  public async membersWithRole(entry: RemoteTarget, role: NodeRole): Promise<ClusterNode[]> {
    let output: string;
    try {
      output = await this.remoteShell.exec(entry, `${constants.REMOTE_CLUSTER_NODES_COMMAND} --role ${role}`);
    } catch (error) {
      this.logger.warn(`unable to list ${role} members through ${entry.host}`, error);
      return [];
    }

    const members: ClusterNode[] = [];
    for (const line of output.split(/\r?\n/)) {
      const node: ClusterNode | undefined = this.parseLine(line, role);
      if (node?.online) {
        members.push(node);
      }
    }
    members.sort((a, b): number => (a.hostname < b.hostname ? -1 : a.hostname > b.hostname ? 1 : 0));
    this.logger.debug(`${role} members: ${members.map((node): string => node.hostname).join(', ') || '(none)'}`);
    return members;
  }

  /** `<hostname>[:<port>] <online|offline>`; anything else is skipped. */
  private parseLine(line: string, role: NodeRole): ClusterNode | undefined {
    const match: RegExpExecArray | null = /^\s*([^\s:]+)(?::(\d+))?\s+(online|offline)\s*$/.exec(line);
    if (!match) {
      if (line.trim()) {
        this.logger.debug(`ignoring cluster member line '${line}'`);
      }
      return undefined;
    }
    if (!constants.HOSTNAME_PATTERN.test(match[1])) {
      this.logger.warn(`ignoring cluster member with invalid hostname '${match[1]}'`);
      return undefined;
    }
    const port: number = match[2] === undefined ? this.configState.config.sshPort : Number(match[2]);
    return new ClusterNode(match[1], port, role, match[3] === 'online');
  }
}
