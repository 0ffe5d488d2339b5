// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from './deployer-error.js';
import {type Duration} from '../time/duration.js';

export class OperationTimeoutError extends DeployerError {
  public constructor(description: string, timeout: Duration) {
    super(`${description} did not complete within ${timeout.toMillis()}ms`, undefined, {
      timeoutMillis: timeout.toMillis(),
    });
  }
}
