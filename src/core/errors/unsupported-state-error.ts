// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from './deployer-error.js';

/**
 * A remote resource reported a state this deployer has no mapping for.
 */
export class UnsupportedStateError extends DeployerError {
  public constructor(
    public readonly resourceKind: string,
    public readonly rawValue: string,
  ) {
    super(`Unsupported CF ${resourceKind} state: ${rawValue}`, undefined, {resourceKind, rawValue});
  }
}
