// SPDX-License-Identifier: Apache-2.0

import {PreconditionError} from './precondition-error.js';

export class VersionMismatchError extends PreconditionError {
  public constructor(
    message: string,
    public readonly actualVersion: string,
    public readonly requiredVersion: string,
  ) {
    super(message, undefined, {actualVersion, requiredVersion});
  }
}
