// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

export class UnsupportedHealthCheckError extends IllegalArgumentError {
  public constructor(public readonly healthCheck: string) {
    super(`Unsupported health check type '${healthCheck}', expected one of port, process, http or none`, undefined, {
      healthCheck,
    });
  }
}
