// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

export class StagingFailedError extends DeployerError {
  public constructor(
    public readonly applicationName: string,
    public readonly reason: string,
  ) {
    super(`staging of ${applicationName} failed: ${reason}`, undefined, {applicationName, reason});
  }
}
