// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from './strongbox-error.js';

/**
 * A check that must hold before anything destructive happens did not hold: the target is unreachable or
 * incompatible, not in maintenance mode, or the snapshot cannot be restored onto it.
 */
export class PreconditionError extends StrongboxError {
  public constructor(message: string, cause?: unknown, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}
