// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from './deployer-error.js';

/**
 * Raised when a caller supplies a value that can never succeed, before any remote call is made.
 */
export class IllegalArgumentError extends DeployerError {
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
