// SPDX-License-Identifier: Apache-2.0

import {DeploymentState} from './deployment-state.js';
import {UnsupportedStateError} from '../../core/errors/unsupported-state-error.js';

const KNOWN_STATES: readonly string[] = ['STARTING', 'DOWN', 'CRASHED', 'FLAPPING', 'RUNNING', 'UNKNOWN'] as const;

export type KnownInstanceState = 'STARTING' | 'DOWN' | 'CRASHED' | 'FLAPPING' | 'RUNNING' | 'UNKNOWN';

/**
 * What the platform reported for one instance slot.
 */
export type InstanceState =
  | {readonly kind: 'observed'; readonly value: KnownInstanceState}
  | {readonly kind: 'absent'}
  | {readonly kind: 'unsupported'; readonly value: string};

function isKnown(value: string): value is KnownInstanceState {
  return KNOWN_STATES.includes(value);
}

export function classifyInstanceState(raw: string | undefined): InstanceState {
  if (raw === undefined) {
    return {kind: 'absent'};
  }
  return isKnown(raw) ? {kind: 'observed', value: raw} : {kind: 'unsupported', value: raw};
}

/**
 * Maps an instance state onto the deployment state of that instance. A slot the platform said nothing about counts
 * as failed; FLAPPING is reported for healthy instances often enough to count as deployed.
 *
 * @throws {UnsupportedStateError} for a state outside the known set
 */
export function toDeploymentState(state: InstanceState): DeploymentState {
  switch (state.kind) {
    case 'absent': {
      return DeploymentState.FAILED;
    }
    case 'unsupported': {
      throw new UnsupportedStateError('instance', state.value);
    }
    case 'observed': {
      switch (state.value) {
        case 'STARTING':
        case 'DOWN': {
          return DeploymentState.DEPLOYING;
        }
        case 'CRASHED': {
          return DeploymentState.FAILED;
        }
        case 'FLAPPING':
        case 'RUNNING': {
          return DeploymentState.DEPLOYED;
        }
        case 'UNKNOWN': {
          return DeploymentState.UNKNOWN;
        }
      }
    }
  }
}
