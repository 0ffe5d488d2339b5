// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {DeploymentHandle, DeploymentPhase} from '../../../../src/business/deployment/deployment-handle.js';
import {AsyncOperation} from '../../../../src/business/deployment/async-operation.js';
import {IllegalStateError} from '../../../../src/core/errors/illegal-state-error.js';
import {ResourceNotFoundError} from '../../../../src/integration/cloud-foundry/errors/resource-not-found-error.js';
import {ResourceOperation} from '../../../../src/integration/cloud-foundry/resources/resource-operation.js';
import {ResourceType} from '../../../../src/integration/cloud-foundry/resources/resource-type.js';
import {TestLogger} from '../../../helpers/test-logger.js';

describe('DeploymentHandle', (): void => {
  let logger: TestLogger;
  let handle: DeploymentHandle;

  beforeEach((): void => {
    logger = new TestLogger();
    handle = new DeploymentHandle('time', logger);
  });

  it('walks the phases in order', (): void => {
    handle.transition(DeploymentPhase.CHECKING_EXISTENCE);
    handle.transition(DeploymentPhase.REUSING);
    handle.transition(DeploymentPhase.CONFIGURING);

    expect(handle.phase).to.equal(DeploymentPhase.CONFIGURING);
    expect(logger.messages('debug')).to.include('deployment time: REUSING -> CONFIGURING');
  });

  it('refuses to skip a phase', (): void => {
    expect((): void => handle.transition(DeploymentPhase.STARTING)).to.throw(
      IllegalStateError,
      'deployment time cannot move from UNRESOLVED to STARTING',
    );
  });

  it('can fail from any phase that is not terminal', (): void => {
    handle.transition(DeploymentPhase.CHECKING_EXISTENCE);
    handle.transition(DeploymentPhase.ERROR);

    expect((): void => handle.transition(DeploymentPhase.ERROR)).to.throw(IllegalStateError);
  });

  it('has no outcome before the work is attached', (): void => {
    expect((): Promise<void> => handle.completion()).to.throw(IllegalStateError, 'deployment time has not been started');
  });
});

describe('AsyncOperation', (): void => {
  it('treats a missing resource as settled', async (): Promise<void> => {
    const logger: TestLogger = new TestLogger();
    const missing: ResourceNotFoundError = new ResourceNotFoundError(
      ResourceOperation.DELETE,
      ResourceType.APPLICATION,
      'time',
    );
    const operation: AsyncOperation = new AsyncOperation('undeployment of time', Promise.reject(missing), logger);

    await operation.completion();

    expect(await operation.outcome).to.deep.equal({status: 'not-found', error: missing});
    expect(logger.messages('warn')).to.deep.equal(['undeployment of time: resource not found']);
  });
});
