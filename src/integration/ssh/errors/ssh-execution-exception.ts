// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from '../../../core/errors/strongbox-error.js';

/**
 * Exception thrown when an ssh invocation exits non-zero or cannot be started.
 */
export class SshExecutionException extends StrongboxError {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE: string = 'Execution of the ssh command failed with exit code: %d';

  public constructor(
    public readonly exitCode: number,
    message?: string,
    public readonly stdOut: string = '',
    public readonly stdErr: string = '',
    cause?: Error,
  ) {
    super(message ?? SshExecutionException.DEFAULT_MESSAGE.replace('%d', exitCode.toString()), cause, {
      exitCode,
      stdErr,
    });
  }

  public override toString(): string {
    return `SshExecutionException{message=${this.message}, exitCode=${this.exitCode}, stdOut='${this.stdOut}', stdErr='${this.stdErr}'}`;
  }
}
