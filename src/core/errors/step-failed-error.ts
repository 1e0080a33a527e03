// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from './strongbox-error.js';

/** A datastore step failed. The collaborator's error is kept, unchanged, as the cause. */
export class StepFailedError extends StrongboxError {
  public constructor(
    public readonly stepName: string,
    cause: unknown,
  ) {
    super(`Step '${stepName}' failed: ${cause instanceof Error ? cause.message : String(cause)}`, cause, {
      stepName,
    });
  }
}
