// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ScheduleRequest} from './schedule-request.js';
import {type ScheduleInfo} from './schedule-info.js';
import {type ScheduleTaskDefinitionCache} from './schedule-task-definition-cache.js';
import {validateCronExpression} from './cron-expression.js';
import {CreateScheduleError} from './errors/create-schedule-error.js';
import {UnscheduleError} from './errors/unschedule-error.js';
import {SchedulerSslError} from './errors/scheduler-ssl-error.js';
import {EnvironmentDecodeError} from './errors/environment-decode-error.js';
import {type StagedTask, type TaskLauncher} from '../task/task-launcher.js';
import {type ApplicationDriver} from '../lifecycle/application-driver.js';
import {type JobDriver} from '../lifecycle/job-driver.js';
import {type ResourceHandle} from '../lifecycle/resource-handle.js';
import {type AppDeploymentRequest} from '../deployment/app-deployment-request.js';
import {type DeployerProperties} from '../../core/config/deployer-properties.js';
import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import {type Poller} from '../../core/retry/poller.js';
import {BackoffPolicy} from '../../core/retry/backoff-policy.js';
import {withTimeout} from '../../core/helpers.js';
import * as constants from '../../core/constants.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {CloudFoundryApiResponse} from '../../integration/cloud-foundry/cloud-foundry-api-response.js';
import {
  type Application,
  type ApplicationEnvironment,
} from '../../integration/cloud-foundry/resources/application/application.js';
import {type Job} from '../../integration/cloud-foundry/resources/job/job.js';

/**
 * Creates, removes and lists schedules held by the platform's scheduler service. Each schedule runs a task
 * application staged under the schedule's name.
 */
@injectable()
export class AppScheduler {
  private readonly client: CloudFoundryClient;
  private readonly taskLauncher: TaskLauncher;
  private readonly applications: ApplicationDriver;
  private readonly jobs: JobDriver;
  private readonly cache: ScheduleTaskDefinitionCache;
  private readonly poller: Poller;
  private readonly properties: DeployerProperties;
  private readonly logger: DeployerLogger;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.TaskLauncher) taskLauncher?: TaskLauncher,
    @inject(InjectTokens.ApplicationDriver) applications?: ApplicationDriver,
    @inject(InjectTokens.JobDriver) jobs?: JobDriver,
    @inject(InjectTokens.ScheduleTaskDefinitionCache) cache?: ScheduleTaskDefinitionCache,
    @inject(InjectTokens.Poller) poller?: Poller,
    @inject(InjectTokens.DeployerProperties) properties?: DeployerProperties,
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
  ) {
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
    this.taskLauncher = patchInject(taskLauncher, InjectTokens.TaskLauncher, this.constructor.name);
    this.applications = patchInject(applications, InjectTokens.ApplicationDriver, this.constructor.name);
    this.jobs = patchInject(jobs, InjectTokens.JobDriver, this.constructor.name);
    this.cache = patchInject(cache, InjectTokens.ScheduleTaskDefinitionCache, this.constructor.name);
    this.poller = patchInject(poller, InjectTokens.Poller, this.constructor.name);
    this.properties = patchInject(properties, InjectTokens.DeployerProperties, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
  }

  /**
   * Stages the task and registers it with the scheduler. A failure after validation removes whatever job was
   * created and surfaces as {@link CreateScheduleError}.
   *
   * @throws {CronExpressionError} before anything is changed remotely
   */
  public async schedule(request: ScheduleRequest): Promise<void> {
    const expression: string = validateCronExpression(request.schedulerProperties[constants.CRON_EXPRESSION_KEY]);
    const scheduleName: string = request.scheduleName;
    const definitionName: string = request.definition.name;
    this.logger.info(`scheduling ${definitionName} as ${scheduleName} with '${expression}'`);

    this.cache.put(scheduleName, definitionName);
    const attempts: {job?: ResourceHandle<Job>} = {};
    try {
      const staged: StagedTask = await this.taskLauncher.stage(this.stagingRequest(request), scheduleName);
      const {scheduleTimeout, scheduleSslRetryCount, scheduleSslRetryDelay} = this.properties.scheduler;

      await this.poller.retry(
        (attempt: number): Promise<void> => {
          if (attempt > 1) {
            this.logger.warn(`retrying creation of schedule ${scheduleName}, attempt ${attempt}`);
          }
          return withTimeout(
            this.createAndScheduleJob(staged, scheduleName, expression, attempts),
            scheduleTimeout,
            `creation of schedule ${scheduleName}`,
          );
        },
        BackoffPolicy.fixed(
          scheduleSslRetryCount,
          scheduleSslRetryDelay,
          scheduleTimeout.plus(scheduleSslRetryDelay).multipliedBy(scheduleSslRetryCount),
        ),
        (error: unknown): boolean => error instanceof SchedulerSslError,
        `creation of schedule ${scheduleName}`,
      );
    } catch (error) {
      await this.rollback(scheduleName, attempts.job);
      this.cache.remove(scheduleName);
      throw new CreateScheduleError(scheduleName, error);
    }
    this.logger.info(`created schedule ${scheduleName}`);
  }

  /**
   * @throws {UnscheduleError} when no job carries the name, or the deletion fails
   */
  public async unschedule(scheduleName: string): Promise<void> {
    this.cache.remove(scheduleName);

    let job: ResourceHandle<Job> | undefined;
    try {
      job = await withTimeout(
        this.jobs.findByName(scheduleName),
        this.properties.scheduler.unscheduleTimeout,
        `lookup of schedule ${scheduleName}`,
      );
    } catch (error) {
      throw new UnscheduleError(`Failed to unschedule ${scheduleName}`, error, {scheduleName});
    }
    if (!job) {
      throw new UnscheduleError(`schedule ${scheduleName} does not exist.`, undefined, {scheduleName});
    }

    try {
      await withTimeout(
        this.jobs.delete(job.id),
        this.properties.scheduler.unscheduleTimeout,
        `deletion of schedule ${scheduleName}`,
      );
    } catch (error) {
      throw new UnscheduleError(`Failed to unschedule ${scheduleName}`, error, {scheduleName});
    }
    this.logger.info(`removed schedule ${scheduleName}`);
  }

  /**
   * Lists the schedules of the space, optionally only those created from one task definition.
   */
  public async listSchedules(taskDefinitionName?: string): Promise<ScheduleInfo[]> {
    const jobs: Job[] = (await this.jobs.list(this.properties.scheduler.listTimeout)).map(
      (handle: ResourceHandle<Job>): Job => handle.resource,
    );

    const applications: Map<string, Application> = new Map<string, Application>(
      (await this.applications.list()).map((handle: ResourceHandle<Application>): [string, Application] => [
        handle.id,
        handle.resource,
      ]),
    );

    const schedules: ScheduleInfo[] = [];
    for (const job of jobs) {
      const application: Application | undefined = applications.get(job.applicationId);
      if (!application) {
        this.logger.debug(`skipping job ${job.name}: application ${job.applicationId} is not in the space`);
        continue;
      }

      const scheduleProperties: Record<string, string> = {};
      const [schedule] = job.schedules;
      if (schedule) {
        scheduleProperties[constants.CRON_EXPRESSION_KEY] = schedule.expression;
      } else {
        this.logger.warn(`job ${job.name} has no schedule`);
      }

      schedules.push({
        scheduleName: job.name,
        taskDefinitionName: await this.taskDefinitionName(job.name, application),
        scheduleProperties,
      });
    }

    return taskDefinitionName === undefined
      ? schedules
      : schedules.filter((info: ScheduleInfo): boolean => info.taskDefinitionName === taskDefinitionName);
  }

  private stagingRequest(request: ScheduleRequest): AppDeploymentRequest {
    return {
      definition: {
        name: request.definition.name,
        properties: {...request.definition.properties, [constants.TASK_DEFINITION_NAME_KEY]: request.definition.name},
      },
      resource: request.resource,
      deploymentProperties: request.deploymentProperties,
      commandlineArguments: request.commandlineArguments,
    };
  }

  /**
   * One attempt. A job created by an earlier attempt is reused rather than created again.
   */
  private async createAndScheduleJob(
    staged: StagedTask,
    scheduleName: string,
    expression: string,
    attempts: {job?: ResourceHandle<Job>},
  ): Promise<void> {
    try {
      attempts.job ??= await this.jobs.create({
        applicationId: staged.applicationId,
        name: scheduleName,
        command: staged.command,
      });
      await this.jobs.schedule(attempts.job, expression);
    } catch (error) {
      if (CloudFoundryApiResponse.isSslFailure(error)) {
        throw new SchedulerSslError(`TLS failure while creating schedule ${scheduleName}`, error);
      }
      throw error;
    }
  }

  private async rollback(scheduleName: string, job?: ResourceHandle<Job>): Promise<void> {
    try {
      const target: ResourceHandle<Job> | undefined = job ?? (await this.jobs.findByName(scheduleName));
      if (target) {
        await this.jobs.delete(target.id);
        this.logger.debug(`deleted job ${target.id} of failed schedule ${scheduleName}`);
      }
    } catch (error) {
      if (CloudFoundryApiResponse.isNotFound(error)) {
        return;
      }
      this.logger.error(`failed to clean up after schedule ${scheduleName}`, error);
    }
  }

  private async taskDefinitionName(scheduleName: string, application: Application): Promise<string> {
    const cached: string | undefined = this.cache.get(scheduleName);
    if (cached !== undefined) {
      return cached;
    }

    const environment: ApplicationEnvironment = await this.client.applications.getEnvironment(application.id);
    const resolved: string = AppScheduler.decodeDefinitionName(application.name, environment);
    this.cache.put(scheduleName, resolved);
    return resolved;
  }

  /**
   * @throws {EnvironmentDecodeError} when SPRING_APPLICATION_JSON is not a JSON object
   */
  private static decodeDefinitionName(applicationName: string, environment: ApplicationEnvironment): string {
    const json: unknown = environment.userProvided[constants.SPRING_APPLICATION_JSON];
    if (typeof json !== 'string') {
      return applicationName;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw new EnvironmentDecodeError(applicationName, constants.SPRING_APPLICATION_JSON, error);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new EnvironmentDecodeError(applicationName, constants.SPRING_APPLICATION_JSON);
    }

    const name: unknown = Object.entries(parsed).find(
      ([key]: [string, unknown]): boolean => key === constants.TASK_DEFINITION_NAME_KEY,
    )?.[1];
    return typeof name === 'string' && name.length > 0 ? name : applicationName;
  }
}
