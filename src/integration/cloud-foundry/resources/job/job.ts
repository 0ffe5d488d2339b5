// SPDX-License-Identifier: Apache-2.0

export interface JobSchedule {
  readonly id?: string;
  readonly expression: string;
  readonly expressionType: 'cron_expression';
  readonly enabled: boolean;
}

/**
 * A job registered with the scheduler service: a command to run against an application's droplet.
 */
export interface Job {
  readonly id: string;
  readonly name: string;
  readonly applicationId: string;
  readonly command: string;
  readonly schedules: JobSchedule[];
}

export interface CreateJobRequest {
  readonly applicationId: string;
  readonly name: string;
  readonly command: string;
}

export interface ScheduleJobRequest {
  readonly jobId: string;
  readonly expression: string;
}

export interface ListJobsRequest {
  readonly spaceId: string;
  readonly page: number;
}
