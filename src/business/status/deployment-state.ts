// SPDX-License-Identifier: Apache-2.0

export enum DeploymentState {
  DEPLOYING = 'deploying',
  DEPLOYED = 'deployed',
  UNDEPLOYED = 'undeployed',
  PARTIAL = 'partial',
  FAILED = 'failed',
  ERROR = 'error',
  UNKNOWN = 'unknown',
}
