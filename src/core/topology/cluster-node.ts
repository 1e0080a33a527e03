// SPDX-License-Identifier: Apache-2.0

export type NodeRole = 'git-server' | 'pages-server' | 'storage-server' | 'elasticsearch-server';

/** A cluster member as reported by the control plane. Discovered per operation, never cached. */
export class ClusterNode {
  public constructor(
    public readonly hostname: string,
    public readonly port: number,
    public readonly role: NodeRole,
    public readonly online: boolean,
  ) {}
}
