// SPDX-License-Identifier: Apache-2.0

import {type Jobs} from '../../resources/job/jobs.js';
import {
  type CreateJobRequest,
  type Job,
  type JobSchedule,
  type ListJobsRequest,
  type ScheduleJobRequest,
} from '../../resources/job/job.js';
import {type Page} from '../../../../core/pagination/page.js';
import {type CloudFoundryHttp} from '../cloud-foundry-http.js';
import {type RawPage, toPage} from '../raw-page.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';

interface RawJobSchedule {
  guid?: string;
  enabled: boolean;
  expression: string;
  expression_type: 'cron_expression';
}

interface RawJob {
  guid: string;
  name: string;
  app_guid: string;
  command: string;
  job_schedules?: RawJobSchedule[] | null;
}

/**
 * Jobs of the scheduler service. The service lives at its own base url.
 */
export class RestJobs implements Jobs {
  public constructor(private readonly http: CloudFoundryHttp) {}

  public async create(request: CreateJobRequest): Promise<Job> {
    const raw: RawJob = await this.http.postJson<RawJob>(
      'jobs',
      {name: request.name, command: request.command},
      {operation: ResourceOperation.CREATE, type: ResourceType.JOB, name: request.name},
      {app_guid: request.applicationId},
    );
    return RestJobs.toJob(raw);
  }

  public async schedule(request: ScheduleJobRequest): Promise<JobSchedule> {
    const raw: RawJobSchedule = await this.http.postJson<RawJobSchedule>(
      `jobs/${request.jobId}/schedules`,
      {enabled: true, expression: request.expression, expression_type: 'cron_expression'},
      {operation: ResourceOperation.SCHEDULE, type: ResourceType.JOB, name: request.jobId},
    );
    return RestJobs.toSchedule(raw);
  }

  public async delete(id: string): Promise<void> {
    await this.http.delete(`jobs/${id}`, {operation: ResourceOperation.DELETE, type: ResourceType.JOB, name: id});
  }

  public async list(request: ListJobsRequest): Promise<Page<Job>> {
    const raw: RawPage<RawJob> = await this.http.getJson<RawPage<RawJob>>(
      'jobs',
      {operation: ResourceOperation.LIST, type: ResourceType.JOB, name: request.spaceId},
      {space_guid: request.spaceId, page: request.page, detailed: true},
    );
    return toPage(raw, RestJobs.toJob);
  }

  private static toJob(raw: RawJob): Job {
    return {
      id: raw.guid,
      name: raw.name,
      applicationId: raw.app_guid,
      command: raw.command,
      schedules: (raw.job_schedules ?? []).map(RestJobs.toSchedule),
    };
  }

  private static toSchedule(raw: RawJobSchedule): JobSchedule {
    return {
      id: raw.guid,
      expression: raw.expression,
      expressionType: raw.expression_type,
      enabled: raw.enabled,
    };
  }
}
