// SPDX-License-Identifier: Apache-2.0

import {container, type InjectionToken} from 'tsyringe-neo';
import {DeployerError} from '../errors/deployer-error.js';

/**
 * Returns the explicitly supplied constructor argument, or resolves it from the container when it was omitted.
 *
 * @param parameter - the value handed to the constructor
 * @param token - the token to resolve when the parameter is missing
 * @param callingClass - the class being constructed, used in the error message
 */
export function patchInject<T>(parameter: T | undefined | null, token: InjectionToken<T>, callingClass: string): T {
  if (parameter !== undefined && parameter !== null) {
    return parameter;
  }

  if (!container.isRegistered(token, true)) {
    throw new DeployerError(`${callingClass}: no value supplied and nothing registered for ${String(token)}`);
  }

  return container.resolve<T>(token);
}
