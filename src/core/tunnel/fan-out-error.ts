// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from '../errors/strongbox-error.js';
import {type ClusterNode} from '../topology/cluster-node.js';

export interface MemberFailure {
  readonly member: ClusterNode;
  readonly error: unknown;
}

/** More than one member failed during a fan-out. The first failure is the cause. */
export class FanOutError extends StrongboxError {
  public constructor(public readonly failures: readonly MemberFailure[]) {
    super(
      `Transfer failed on ${failures.length} members: ${failures
        .map(
          (failure): string =>
            `${failure.member.hostname} (${failure.error instanceof Error ? failure.error.message : String(failure.error)})`,
        )
        .join(', ')}`,
      failures[0]?.error,
      {members: failures.map((failure): string => failure.member.hostname)},
    );
  }
}
