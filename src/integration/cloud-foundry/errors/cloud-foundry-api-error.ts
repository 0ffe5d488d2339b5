// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

/**
 * A request to the platform failed with an HTTP status, or never got a response.
 */
export class CloudFoundryApiError extends DeployerError {
  /**
   * @param message - the error message
   * @param statusCode - the HTTP status code, absent when no response was received
   * @param cause - the underlying cause of the error
   * @param meta - additional metadata associated with the error
   */
  public constructor(
    message: string,
    public readonly httpStatus?: number,
    cause?: unknown,
    meta?: Record<string, unknown>,
  ) {
    super(message, cause, {...meta, httpStatus});
  }
}
