// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ResourceLifecycleDriver} from './resource-lifecycle-driver.js';
import {type ResourceHandle} from './resource-handle.js';
import {ResourceState} from './resource-state.js';
import {type Poller} from '../../core/retry/poller.js';
import {type Page} from '../../core/pagination/page.js';
import {PageDrainer} from '../../core/pagination/page-drainer.js';
import {type Duration} from '../../core/time/duration.js';
import {withTimeout} from '../../core/helpers.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {type CreateJobRequest, type Job, type JobSchedule} from '../../integration/cloud-foundry/resources/job/job.js';
import {ResourceType} from '../../integration/cloud-foundry/resources/resource-type.js';
import {ResourceOperation} from '../../integration/cloud-foundry/resources/resource-operation.js';
import {ResourceNotFoundError} from '../../integration/cloud-foundry/errors/resource-not-found-error.js';

/**
 * Jobs of the scheduler service. The service has no lookup by id, so reads scan the space's job pages.
 */
@injectable()
export class JobDriver extends ResourceLifecycleDriver<Job, CreateJobRequest> {
  private readonly client: CloudFoundryClient;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.Poller) poller?: Poller,
  ) {
    super(ResourceType.JOB, patchInject(poller, InjectTokens.Poller, JobDriver.name));
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
  }

  public schedule(handle: ResourceHandle<Job>, expression: string): Promise<JobSchedule> {
    return this.client.jobs.schedule({jobId: handle.id, expression});
  }

  public delete(id: string): Promise<void> {
    return this.client.jobs.delete(id);
  }

  private async listPage(page: number): Promise<Page<Job>> {
    const spaceId: string = await this.client.spaceId();
    return this.client.jobs.list({spaceId, page});
  }

  /**
   * Drains every job page of the space. With a `pageTimeout` each page fetch gets its own deadline.
   */
  public async list(pageTimeout?: Duration): Promise<ResourceHandle<Job>[]> {
    const jobs: Job[] = await PageDrainer.drain(
      (page: number): Promise<Page<Job>> =>
        pageTimeout ? withTimeout(this.listPage(page), pageTimeout, `page ${page} of the jobs`) : this.listPage(page),
    );
    return jobs.map((job: Job): ResourceHandle<Job> => this.toHandle(job));
  }

  /**
   * Scans page by page and stops at the first job with the given name.
   */
  public async findByName(name: string): Promise<ResourceHandle<Job> | undefined> {
    const job: Job | undefined = await PageDrainer.find(
      (page: number): Promise<Page<Job>> => this.listPage(page),
      (candidate: Job): boolean => candidate.name === name,
    );
    return job ? this.toHandle(job) : undefined;
  }

  protected createResource(request: CreateJobRequest): Promise<Job> {
    return this.client.jobs.create(request);
  }

  protected async fetch(id: string): Promise<Job> {
    const job: Job | undefined = await PageDrainer.find(
      (page: number): Promise<Page<Job>> => this.listPage(page),
      (candidate: Job): boolean => candidate.id === id,
    );
    if (!job) {
      throw new ResourceNotFoundError(ResourceOperation.READ, ResourceType.JOB, id);
    }
    return job;
  }

  protected idOf(job: Job): string {
    return job.id;
  }

  protected stateOf(job: Job): ResourceState {
    return job.schedules.length > 0 ? ResourceState.READY : ResourceState.PENDING;
  }
}
