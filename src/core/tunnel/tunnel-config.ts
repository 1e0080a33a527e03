// SPDX-License-Identifier: Apache-2.0

import {type RemoteTarget} from '../topology/remote-target.js';
import {type ClusterNode} from '../topology/cluster-node.js';
import * as constants from '../constants.js';

export interface ProxyRule {
  readonly host: string;
  readonly proxyCommand: string;
}

/**
 * Proxy rules routing ssh connections for internal cluster members through the entry host. Host keys of the
 * internal hops are not checked; the entry host is verified as `extraSshOptions` says.
 */
export class TunnelConfig {
  public constructor(
    public readonly entry: RemoteTarget,
    public readonly rules: readonly ProxyRule[],
  ) {}

  public static build(
    entry: RemoteTarget,
    members: ClusterNode[],
    user: string,
    extraSshOptions: string,
  ): TunnelConfig {
    const options: string = extraSshOptions.trim();
    const proxyCommand: string = [
      'ssh',
      '-q',
      ...(options ? [options] : []),
      '-p',
      entry.port.toString(),
      '-l',
      user,
      entry.host,
      constants.TUNNEL_PROXY_NETCAT,
      '%h',
      '%p',
    ].join(' ');

    const hosts: string[] = [];
    for (const member of members) {
      if (member.hostname !== entry.host && !hosts.includes(member.hostname)) {
        hosts.push(member.hostname);
      }
    }
    return new TunnelConfig(
      entry,
      hosts.map((host): ProxyRule => ({host, proxyCommand})),
    );
  }

  /** Whether connections to the host go through the entry host. */
  public routes(hostname: string): boolean {
    return this.rules.some((rule): boolean => rule.host === hostname);
  }

  /** The ssh client configuration text. */
  public render(): string {
    return this.rules
      .map((rule): string =>
        [
          `Host ${rule.host}`,
          `  ServerAliveInterval ${constants.SSH_SERVER_ALIVE_INTERVAL}`,
          `  ProxyCommand ${rule.proxyCommand}`,
          '  StrictHostKeyChecking no',
          '  UserKnownHostsFile /dev/null',
          '',
        ].join('\n'),
      )
      .join('\n');
  }
}
