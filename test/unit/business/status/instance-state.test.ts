// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {classifyInstanceState, toDeploymentState} from '../../../../src/business/status/instance-state.js';
import {DeploymentState} from '../../../../src/business/status/deployment-state.js';
import {UnsupportedStateError} from '../../../../src/core/errors/unsupported-state-error.js';

describe('instance state', (): void => {
  const table: [string, DeploymentState][] = [
    ['STARTING', DeploymentState.DEPLOYING],
    ['DOWN', DeploymentState.DEPLOYING],
    ['CRASHED', DeploymentState.FAILED],
    ['FLAPPING', DeploymentState.DEPLOYED],
    ['RUNNING', DeploymentState.DEPLOYED],
    ['UNKNOWN', DeploymentState.UNKNOWN],
  ];

  for (const [raw, expected] of table) {
    it(`maps ${raw} to ${expected}`, (): void => {
      expect(toDeploymentState(classifyInstanceState(raw))).to.equal(expected);
    });
  }

  it('counts a slot without a reported state as failed', (): void => {
    expect(classifyInstanceState(undefined)).to.deep.equal({kind: 'absent'});
    expect(toDeploymentState(classifyInstanceState(undefined))).to.equal(DeploymentState.FAILED);
  });

  it('fails on a state outside the known set', (): void => {
    expect((): DeploymentState => toDeploymentState(classifyInstanceState('EXPLODED'))).to.throw(
      UnsupportedStateError,
      'Unsupported CF instance state: EXPLODED',
    );
  });
});
