// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ResourceLifecycleDriver} from './resource-lifecycle-driver.js';
import {ResourceState} from './resource-state.js';
import {type Poller} from '../../core/retry/poller.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {type Build, type CreateBuildRequest} from '../../integration/cloud-foundry/resources/build/build.js';
import {type Droplet} from '../../integration/cloud-foundry/resources/droplet/droplet.js';
import {ResourceType} from '../../integration/cloud-foundry/resources/resource-type.js';

/**
 * Staging runs. Creating one stages a package; once settled in STAGED it points at the droplet it produced.
 */
@injectable()
export class DropletDriver extends ResourceLifecycleDriver<Build, CreateBuildRequest> {
  private readonly client: CloudFoundryClient;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.Poller) poller?: Poller,
  ) {
    super(ResourceType.BUILD, patchInject(poller, InjectTokens.Poller, DropletDriver.name));
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
  }

  public getDroplet(id: string): Promise<Droplet> {
    return this.client.droplets.get(id);
  }

  protected createResource(request: CreateBuildRequest): Promise<Build> {
    return this.client.builds.create(request);
  }

  protected fetch(id: string): Promise<Build> {
    return this.client.builds.get(id);
  }

  protected idOf(build: Build): string {
    return build.id;
  }

  protected stateOf(build: Build): ResourceState {
    switch (build.state) {
      case 'STAGING': {
        return ResourceState.PENDING;
      }
      case 'STAGED': {
        return ResourceState.STAGED;
      }
      case 'FAILED': {
        return ResourceState.FAILED;
      }
      default: {
        return ResourceState.UNKNOWN;
      }
    }
  }
}
