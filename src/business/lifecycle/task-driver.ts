// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ResourceLifecycleDriver} from './resource-lifecycle-driver.js';
import {type ResourceHandle} from './resource-handle.js';
import {ResourceState} from './resource-state.js';
import {type Poller} from '../../core/retry/poller.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {type CreateTaskRequest, type Task} from '../../integration/cloud-foundry/resources/task/task.js';
import {ResourceType} from '../../integration/cloud-foundry/resources/resource-type.js';

@injectable()
export class TaskDriver extends ResourceLifecycleDriver<Task, CreateTaskRequest> {
  private readonly client: CloudFoundryClient;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.Poller) poller?: Poller,
  ) {
    super(ResourceType.TASK, patchInject(poller, InjectTokens.Poller, TaskDriver.name));
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
  }

  public async cancel(id: string): Promise<ResourceHandle<Task>> {
    return this.toHandle(await this.client.tasks.cancel(id));
  }

  protected createResource(request: CreateTaskRequest): Promise<Task> {
    return this.client.tasks.create(request);
  }

  protected fetch(id: string): Promise<Task> {
    return this.client.tasks.get(id);
  }

  protected idOf(task: Task): string {
    return task.id;
  }

  protected stateOf(task: Task): ResourceState {
    switch (task.state) {
      case 'PENDING': {
        return ResourceState.PENDING;
      }
      case 'RUNNING': {
        return ResourceState.RUNNING;
      }
      case 'SUCCEEDED': {
        return ResourceState.READY;
      }
      case 'CANCELING': {
        return ResourceState.CANCELLED;
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
