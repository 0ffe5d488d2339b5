// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ResourceLifecycleDriver} from './resource-lifecycle-driver.js';
import {type ResourceHandle} from './resource-handle.js';
import {ResourceState} from './resource-state.js';
import {type Poller} from '../../core/retry/poller.js';
import {type Page} from '../../core/pagination/page.js';
import {PageDrainer} from '../../core/pagination/page-drainer.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {
  type Application,
  type CreateApplicationRequest,
} from '../../integration/cloud-foundry/resources/application/application.js';
import {type Droplet} from '../../integration/cloud-foundry/resources/droplet/droplet.js';
import {ResourceType} from '../../integration/cloud-foundry/resources/resource-type.js';

export interface ApplicationFilter {
  readonly names?: string[];
}

@injectable()
export class ApplicationDriver extends ResourceLifecycleDriver<Application, CreateApplicationRequest> {
  private readonly client: CloudFoundryClient;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.Poller) poller?: Poller,
  ) {
    super(ResourceType.APPLICATION, patchInject(poller, InjectTokens.Poller, ApplicationDriver.name));
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
  }

  /**
   * Lists the applications of the target space, draining every page.
   */
  public async list(filter: ApplicationFilter = {}): Promise<ResourceHandle<Application>[]> {
    const spaceId: string = await this.client.spaceId();
    const applications: Application[] = await PageDrainer.drain(
      (page: number): Promise<Page<Application>> =>
        this.client.applications.list({names: filter.names, spaceId, page}),
    );
    return applications.map((application: Application): ResourceHandle<Application> => this.toHandle(application));
  }

  public async findByName(name: string): Promise<ResourceHandle<Application> | undefined> {
    const [match] = await this.list({names: [name]});
    return match;
  }

  public delete(id: string): Promise<void> {
    return this.client.applications.delete(id);
  }

  public listDroplets(applicationId: string): Promise<Droplet[]> {
    return PageDrainer.drain(
      (page: number): Promise<Page<Droplet>> => this.client.applications.listDroplets(applicationId, page),
    );
  }

  /**
   * @returns the most recently created droplet in state STAGED, if any
   */
  public async latestStagedDroplet(applicationId: string): Promise<Droplet | undefined> {
    const staged: Droplet[] = (await this.listDroplets(applicationId)).filter(
      (droplet: Droplet): boolean => droplet.state === 'STAGED',
    );
    staged.sort((left: Droplet, right: Droplet): number => right.createdAt.localeCompare(left.createdAt));
    return staged[0];
  }

  protected createResource(request: CreateApplicationRequest): Promise<Application> {
    return this.client.applications.create(request);
  }

  protected fetch(id: string): Promise<Application> {
    return this.client.applications.get(id);
  }

  protected idOf(application: Application): string {
    return application.id;
  }

  protected stateOf(application: Application): ResourceState {
    switch (application.state) {
      case 'STARTED': {
        return ResourceState.RUNNING;
      }
      case 'STOPPED': {
        return ResourceState.READY;
      }
      default: {
        return ResourceState.UNKNOWN;
      }
    }
  }
}
