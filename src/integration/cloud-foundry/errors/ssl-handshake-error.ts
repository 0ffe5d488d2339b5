// SPDX-License-Identifier: Apache-2.0

import {CloudFoundryApiError} from './cloud-foundry-api-error.js';

/**
 * The TLS session with the platform broke down before a response arrived, or its certificate was rejected.
 */
export class SslHandshakeError extends CloudFoundryApiError {
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, undefined, cause, meta);
  }
}
