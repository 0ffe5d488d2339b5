// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {PackageDriver} from '../../../../src/business/lifecycle/package-driver.js';
import {type ResourceHandle} from '../../../../src/business/lifecycle/resource-handle.js';
import {ResourceState} from '../../../../src/business/lifecycle/resource-state.js';
import {BackoffPolicy} from '../../../../src/core/retry/backoff-policy.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {PollingExhaustedError} from '../../../../src/core/errors/polling-exhausted-error.js';
import {type Package} from '../../../../src/integration/cloud-foundry/resources/package/package.js';
import {InMemoryCloudFoundryClient} from '../../../helpers/in-memory-cloud-foundry-client.js';
import {ManualTime} from '../../../helpers/test-time.js';
import {expectRejection} from '../../../helpers/expect-rejection.js';

describe('PackageDriver', (): void => {
  let client: InMemoryCloudFoundryClient;
  let time: ManualTime;
  let driver: PackageDriver;

  beforeEach((): void => {
    client = new InMemoryCloudFoundryClient();
    time = new ManualTime();
    driver = new PackageDriver(client, time.poller());
  });

  function isReady(current: ResourceHandle<Package>): boolean {
    return current.state === ResourceState.READY;
  }

  it('maps the platform states of an upload', async (): Promise<void> => {
    const created: ResourceHandle<Package> = await driver.create({applicationId: 'app-x', type: 'bits'});
    expect(created.state).to.equal(ResourceState.PENDING);

    const uploading: ResourceHandle<Package> = await driver.upload(created, '/tmp/app.jar');
    expect(uploading.state).to.equal(ResourceState.PROCESSING);
    expect(client.store.uploads).to.deep.equal([{packageId: created.id, path: '/tmp/app.jar'}]);
  });

  it('waits until the package is ready', async (): Promise<void> => {
    const created: ResourceHandle<Package> = await driver.create({applicationId: 'app-x', type: 'bits'});
    const uploading: ResourceHandle<Package> = await driver.upload(created, '/tmp/app.jar');

    const ready: ResourceHandle<Package> = await driver.waitReady(
      uploading,
      isReady,
      BackoffPolicy.fixed(5, Duration.ofMillis(100), Duration.ofSeconds(10)),
    );

    expect(ready.state).to.equal(ResourceState.READY);
    expect(time.sleeps).to.deep.equal([100]);
  });

  it('gives up when the package never becomes ready', async (): Promise<void> => {
    client.store.packageOutcome = 'FAILED';
    const created: ResourceHandle<Package> = await driver.create({applicationId: 'app-x', type: 'bits'});
    const uploading: ResourceHandle<Package> = await driver.upload(created, '/tmp/app.jar');

    const error: PollingExhaustedError = await expectRejection(
      driver.waitReady(uploading, isReady, BackoffPolicy.fixed(3, Duration.ofMillis(100), Duration.ofSeconds(10))),
      PollingExhaustedError,
    );

    expect(error.message).to.equal(`Gave up on package ${created.id} to become ready after 3 attempt(s) in 200ms`);
  });
});
