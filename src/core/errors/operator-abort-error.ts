// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from './strongbox-error.js';

/** The operator declined the confirmation prompt. Not a failure, but the process still exits non-zero. */
export class OperatorAbortError extends StrongboxError {
  public constructor(message: string = 'Restore aborted by operator') {
    super(message);
  }
}
