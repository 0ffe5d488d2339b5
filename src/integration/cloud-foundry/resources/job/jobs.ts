// SPDX-License-Identifier: Apache-2.0

import {type Page} from '../../../../core/pagination/page.js';
import {type CreateJobRequest, type Job, type JobSchedule, type ListJobsRequest, type ScheduleJobRequest} from './job.js';

export interface Jobs {
  create(request: CreateJobRequest): Promise<Job>;

  schedule(request: ScheduleJobRequest): Promise<JobSchedule>;

  delete(id: string): Promise<void>;

  list(request: ListJobsRequest): Promise<Page<Job>>;
}
