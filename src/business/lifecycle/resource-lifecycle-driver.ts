// SPDX-License-Identifier: Apache-2.0

import {type ResourceHandle} from './resource-handle.js';
import {type ResourceState} from './resource-state.js';
import {type Poller} from '../../core/retry/poller.js';
import {type BackoffPolicy} from '../../core/retry/backoff-policy.js';
import {CloudFoundryApiResponse} from '../../integration/cloud-foundry/cloud-foundry-api-response.js';
import {type ResourceType} from '../../integration/cloud-foundry/resources/resource-type.js';

/**
 * Uniform lifecycle operations over one kind of platform resource.
 *
 * @typeParam R - the resource model
 * @typeParam C - the creation request
 */
export abstract class ResourceLifecycleDriver<R, C> {
  protected constructor(
    protected readonly resourceType: ResourceType,
    protected readonly poller: Poller,
  ) {}

  public async create(request: C): Promise<ResourceHandle<R>> {
    return this.toHandle(await this.createResource(request));
  }

  /**
   * @throws {ResourceNotFoundError} when the platform does not know the id
   */
  public async get(id: string): Promise<ResourceHandle<R>> {
    return this.toHandle(await this.fetch(id));
  }

  /**
   * Like {@link get}, but a missing resource resolves to `undefined`. Any other failure propagates.
   */
  public async find(id: string): Promise<ResourceHandle<R> | undefined> {
    try {
      return await this.get(id);
    } catch (error) {
      if (CloudFoundryApiResponse.isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Re-reads the resource until the predicate holds for its handle.
   *
   * @throws {PollingExhaustedError} when the policy runs out first
   */
  public waitReady(
    handle: ResourceHandle<R>,
    predicate: (current: ResourceHandle<R>) => boolean,
    policy: BackoffPolicy,
  ): Promise<ResourceHandle<R>> {
    return this.poller.waitUntil(
      (): Promise<ResourceHandle<R>> => this.get(handle.id),
      predicate,
      policy,
      `${this.resourceType} ${handle.id} to become ready`,
    );
  }

  protected toHandle(resource: R): ResourceHandle<R> {
    return {id: this.idOf(resource), state: this.stateOf(resource), resource};
  }

  protected abstract createResource(request: C): Promise<R>;

  protected abstract fetch(id: string): Promise<R>;

  protected abstract idOf(resource: R): string;

  protected abstract stateOf(resource: R): ResourceState;
}
