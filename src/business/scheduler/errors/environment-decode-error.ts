// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

export class EnvironmentDecodeError extends DeployerError {
  public constructor(
    public readonly applicationName: string,
    variable: string,
    cause?: unknown,
  ) {
    super(`Unable to decode ${variable} of application ${applicationName}`, cause, {applicationName, variable});
  }
}
