// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

export class CreateScheduleError extends DeployerError {
  public constructor(
    public readonly scheduleName: string,
    cause?: unknown,
  ) {
    super(`Failed to create schedule ${scheduleName}`, cause, {scheduleName});
  }
}
