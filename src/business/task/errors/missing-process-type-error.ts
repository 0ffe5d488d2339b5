// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';
import * as constants from '../../../core/constants.js';

export class MissingProcessTypeError extends DeployerError {
  public constructor(
    public readonly applicationName: string,
    public readonly dropletId: string,
  ) {
    super(
      `droplet ${dropletId} of ${applicationName} has no web process type; set ${constants.TASK_COMMAND_PROPERTY_KEY} to launch it`,
      undefined,
      {applicationName, dropletId},
    );
  }
}
