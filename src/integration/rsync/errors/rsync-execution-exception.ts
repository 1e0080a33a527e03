// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from '../../../core/errors/strongbox-error.js';

/**
 * Exception thrown when an rsync transfer exits non-zero or cannot be started.
 */
export class RsyncExecutionException extends StrongboxError {
  private static readonly DEFAULT_MESSAGE: string = 'Execution of the rsync command failed with exit code: %d';

  public constructor(
    public readonly exitCode: number,
    message?: string,
    public readonly stdErr: string = '',
    cause?: Error,
  ) {
    super(message ?? RsyncExecutionException.DEFAULT_MESSAGE.replace('%d', exitCode.toString()), cause, {
      exitCode,
      stdErr,
    });
  }

  public override toString(): string {
    return `RsyncExecutionException{message=${this.message}, exitCode=${this.exitCode}, stdErr='${this.stdErr}'}`;
  }
}
