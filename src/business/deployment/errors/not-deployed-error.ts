// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';

export class NotDeployedError extends DeployerError {
  public constructor(public readonly deploymentId: string) {
    super(`App ${deploymentId} is not deployed`, undefined, {deploymentId});
  }
}
