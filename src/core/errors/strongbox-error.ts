// SPDX-License-Identifier: Apache-2.0

export class StrongboxError extends Error {
  public readonly statusCode?: number;

  /**
   * Base of every error strongbox raises on purpose. A numeric `code` on an
   * Error cause becomes the `statusCode`, and the cause's stack is appended.
   */
  public constructor(
    message: string,
    cause?: unknown,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);

    if (cause instanceof Error) {
      this.cause = cause;
      if ('code' in cause && typeof cause.code === 'number') {
        this.statusCode = cause.code;
      }
      this.stack += `\nCaused by: ${cause.stack}`;
    } else if (cause !== undefined && cause !== null) {
      this.cause = cause;
    }
  }
}
