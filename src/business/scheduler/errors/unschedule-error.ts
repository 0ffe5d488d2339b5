// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

export class UnscheduleError extends DeployerError {
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
