// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {StrongboxError} from '../errors/strongbox-error.js';

/**
 * Returns the injected parameter, or resolves it from the container when the caller constructed the class by hand
 * and left the parameter out.
 *
 * @param parameter - the constructor parameter as received
 * @param token - the registration to fall back to
 * @param className - the class being constructed, used in the error message
 */
export function patchInject<T>(parameter: T | undefined, token: symbol, className: string): T {
  if (parameter !== undefined && parameter !== null) {
    return parameter;
  }
  if (!container.isRegistered(token, true)) {
    throw new StrongboxError(`${className}: nothing is registered for ${token.description ?? token.toString()}`);
  }
  return container.resolve<T>(token);
}
