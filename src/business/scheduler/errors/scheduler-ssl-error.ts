// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

/**
 * The TLS session with the scheduler service broke down. The only failure schedule creation retries.
 */
export class SchedulerSslError extends DeployerError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
