// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from './deployer-error.js';

/**
 * A programming error: an object was asked to do something its current state does not permit.
 */
export class IllegalStateError extends DeployerError {
  public constructor(message: string, meta?: Record<string, unknown>) {
    super(message, undefined, meta);
  }
}
