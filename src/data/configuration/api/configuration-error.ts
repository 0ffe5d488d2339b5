// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

/**
 * General purpose error for configuration failures.
 */
export class ConfigurationError extends DeployerError {
  /**
   * Creates a new instance of ConfigurationError.
   *
   * @param message - The error message.
   * @param cause - The underlying cause of the error, if any.
   * @param meta - Additional metadata associated with the error.
   */
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
