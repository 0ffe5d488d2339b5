// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {AppStatus, type AppStatusBuilder} from '../../../../src/business/status/app-status.js';
import {AppInstanceStatus} from '../../../../src/business/status/app-instance-status.js';
import {DeploymentState} from '../../../../src/business/status/deployment-state.js';
import {type ApplicationDetail} from '../../../../src/integration/cloud-foundry/resources/application/application.js';

const detail: ApplicationDetail = {
  id: 'app-guid',
  name: 'time',
  requestedState: 'STARTED',
  instances: 0,
  runningInstances: 0,
  memoryLimit: 1024,
  diskQuota: 1024,
  urls: [],
  instanceDetails: [],
};

function statusOf(...states: (string | undefined)[]): AppStatus {
  const builder: AppStatusBuilder = AppStatus.of('time');
  for (const [index, state] of states.entries()) {
    builder.with(new AppInstanceStatus(detail, index, state === undefined ? undefined : {index, state}));
  }
  return builder.build();
}

describe('AppStatus', (): void => {
  it('is unknown without instances', (): void => {
    expect(statusOf().state).to.equal(DeploymentState.UNKNOWN);
  });

  it('takes the state shared by every instance', (): void => {
    expect(statusOf('RUNNING', 'FLAPPING').state).to.equal(DeploymentState.DEPLOYED);
    expect(statusOf('CRASHED', 'CRASHED').state).to.equal(DeploymentState.FAILED);
    expect(statusOf('STARTING').state).to.equal(DeploymentState.DEPLOYING);
  });

  it('is deploying while any instance is still starting', (): void => {
    expect(statusOf('RUNNING', 'STARTING', 'CRASHED').state).to.equal(DeploymentState.DEPLOYING);
  });

  it('is partial when only some instances run', (): void => {
    expect(statusOf('RUNNING', 'CRASHED').state).to.equal(DeploymentState.PARTIAL);
    expect(statusOf('RUNNING', undefined).state).to.equal(DeploymentState.PARTIAL);
  });

  it('is failed when instances failed and the rest is unknown', (): void => {
    expect(statusOf('CRASHED', 'UNKNOWN').state).to.equal(DeploymentState.FAILED);
  });

  it('prefers an explicit state over the instances', (): void => {
    const status: AppStatus = AppStatus.of('time')
      .with(new AppInstanceStatus(detail, 0, {index: 0, state: 'RUNNING'}))
      .withGeneralState(DeploymentState.ERROR)
      .build();

    expect(status.state).to.equal(DeploymentState.ERROR);
    expect(status.toString()).to.equal('AppStatus[time : error]');
  });

  it('orders instances by index', (): void => {
    const status: AppStatus = AppStatus.of('time')
      .with(new AppInstanceStatus(detail, 1, {index: 1, state: 'RUNNING'}))
      .with(new AppInstanceStatus(detail, 0, {index: 0, state: 'RUNNING'}))
      .build();

    expect(status.instances.map((instance: AppInstanceStatus): string => instance.id)).to.deep.equal([
      'time-0',
      'time-1',
    ]);
  });
});
