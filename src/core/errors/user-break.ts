// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from './strongbox-error.js';

/** Thrown to leave the CLI early on purpose (e.g. after printing the version). Exits with 0. */
export class UserBreak extends StrongboxError {
  public constructor(message: string) {
    super(message);
  }
}
