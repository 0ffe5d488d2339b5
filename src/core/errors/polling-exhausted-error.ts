// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from './deployer-error.js';

export class PollingExhaustedError extends DeployerError {
  /**
   * @param description - what was being waited for
   * @param attempts - the number of attempts that were made
   * @param elapsedMillis - wall clock time spent before giving up
   * @param cause - the last failure, when giving up on a retried operation
   */
  public constructor(
    public readonly description: string,
    public readonly attempts: number,
    public readonly elapsedMillis: number,
    cause?: unknown,
  ) {
    super(`Gave up on ${description} after ${attempts} attempt(s) in ${elapsedMillis}ms`, cause, {
      attempts,
      elapsedMillis,
    });
  }
}
