// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ResourceLifecycleDriver} from './resource-lifecycle-driver.js';
import {type ResourceHandle} from './resource-handle.js';
import {ResourceState} from './resource-state.js';
import {type Poller} from '../../core/retry/poller.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {type CreatePackageRequest, type Package} from '../../integration/cloud-foundry/resources/package/package.js';
import {ResourceType} from '../../integration/cloud-foundry/resources/resource-type.js';

@injectable()
export class PackageDriver extends ResourceLifecycleDriver<Package, CreatePackageRequest> {
  private readonly client: CloudFoundryClient;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.Poller) poller?: Poller,
  ) {
    super(ResourceType.PACKAGE, patchInject(poller, InjectTokens.Poller, PackageDriver.name));
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
  }

  public async upload(handle: ResourceHandle<Package>, path: string): Promise<ResourceHandle<Package>> {
    return this.toHandle(await this.client.packages.upload(handle.id, path));
  }

  protected createResource(request: CreatePackageRequest): Promise<Package> {
    return this.client.packages.create(request);
  }

  protected fetch(id: string): Promise<Package> {
    return this.client.packages.get(id);
  }

  protected idOf(pkg: Package): string {
    return pkg.id;
  }

  protected stateOf(pkg: Package): ResourceState {
    switch (pkg.state) {
      case 'AWAITING_UPLOAD': {
        return ResourceState.PENDING;
      }
      case 'PROCESSING_UPLOAD':
      case 'COPYING': {
        return ResourceState.PROCESSING;
      }
      case 'READY': {
        return ResourceState.READY;
      }
      case 'FAILED':
      case 'EXPIRED': {
        return ResourceState.FAILED;
      }
      default: {
        return ResourceState.UNKNOWN;
      }
    }
  }
}
