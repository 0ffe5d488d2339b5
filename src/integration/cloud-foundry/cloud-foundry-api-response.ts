// SPDX-License-Identifier: Apache-2.0

import {StatusCodes} from 'http-status-codes';
import {CloudFoundryApiError} from './errors/cloud-foundry-api-error.js';
import {SslHandshakeError} from './errors/ssl-handshake-error.js';

export class CloudFoundryApiResponse {
  private constructor() {}

  /**
   * Checks if the error was raised for a "Not Found" (404) response.
   */
  public static isNotFound(error: unknown): boolean {
    return error instanceof CloudFoundryApiError && error.httpStatus === StatusCodes.NOT_FOUND;
  }

  /**
   * Checks if the error was raised by a broken TLS session.
   */
  public static isSslFailure(error: unknown): boolean {
    return error instanceof SslHandshakeError;
  }
}
