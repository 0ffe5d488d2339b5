// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from '../../../core/errors/deployer-error.js';
import {type DeploymentState} from '../../status/deployment-state.js';

export class AlreadyDeployedError extends DeployerError {
  public constructor(
    public readonly deploymentId: string,
    public readonly state: DeploymentState,
  ) {
    super(`App ${deploymentId} is already deployed with state ${state}`, undefined, {deploymentId, state});
  }
}
