// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type TaskStatus, toLaunchState} from './task-status.js';
import {LaunchState} from './launch-state.js';
import {MissingProcessTypeError} from './errors/missing-process-type-error.js';
import {StagingFailedError} from './errors/staging-failed-error.js';
import {type AppDeploymentRequest} from '../deployment/app-deployment-request.js';
import {AsyncOperation} from '../deployment/async-operation.js';
import {
  type DeploymentProperties,
  type DeploymentPropertiesResolver,
} from '../deployment/deployment-properties-resolver.js';
import {type EnvironmentVariablesBuilder} from '../deployment/environment-variables-builder.js';
import {type ApplicationDriver} from '../lifecycle/application-driver.js';
import {type PackageDriver} from '../lifecycle/package-driver.js';
import {type DropletDriver} from '../lifecycle/droplet-driver.js';
import {type TaskDriver} from '../lifecycle/task-driver.js';
import {type ResourceHandle} from '../lifecycle/resource-handle.js';
import {ResourceState} from '../lifecycle/resource-state.js';
import {type DeployerProperties} from '../../core/config/deployer-properties.js';
import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import {BackoffPolicy} from '../../core/retry/backoff-policy.js';
import {Duration} from '../../core/time/duration.js';
import {type Page} from '../../core/pagination/page.js';
import {PageDrainer} from '../../core/pagination/page-drainer.js';
import {withTimeout} from '../../core/helpers.js';
import * as constants from '../../core/constants.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {type Application} from '../../integration/cloud-foundry/resources/application/application.js';
import {type Package} from '../../integration/cloud-foundry/resources/package/package.js';
import {type Build} from '../../integration/cloud-foundry/resources/build/build.js';
import {type Droplet} from '../../integration/cloud-foundry/resources/droplet/droplet.js';
import {type Task} from '../../integration/cloud-foundry/resources/task/task.js';
import {type ServiceBinding, type ServiceInstance} from '../../integration/cloud-foundry/resources/service/service.js';
import {ResourceNotFoundError} from '../../integration/cloud-foundry/errors/resource-not-found-error.js';
import {ResourceOperation} from '../../integration/cloud-foundry/resources/resource-operation.js';
import {ResourceType} from '../../integration/cloud-foundry/resources/resource-type.js';

/**
 * An application ready to run tasks: its id, the droplet to run and the command to run it with.
 */
export interface StagedTask {
  readonly applicationId: string;
  readonly applicationName: string;
  readonly dropletId: string;
  readonly command: string;
  /** mebibytes */
  readonly memory: number;
  /** mebibytes */
  readonly disk: number;
}

export const PACKAGE_READY_POLICY: BackoffPolicy = BackoffPolicy.exponential(
  constants.PACKAGE_READY_MAX_ATTEMPTS,
  Duration.ofSeconds(constants.PACKAGE_READY_INITIAL_DELAY_SECONDS),
  Duration.ofMinutes(constants.READY_MAX_DELAY_MINUTES),
  Duration.ofMinutes(constants.READY_OVERALL_CAP_MINUTES),
);

export const DROPLET_READY_POLICY: BackoffPolicy = BackoffPolicy.exponential(
  constants.DROPLET_READY_MAX_ATTEMPTS,
  Duration.ofSeconds(constants.DROPLET_READY_INITIAL_DELAY_SECONDS),
  Duration.ofMinutes(constants.READY_MAX_DELAY_MINUTES),
  Duration.ofMinutes(constants.READY_OVERALL_CAP_MINUTES),
);

/**
 * Runs one-off tasks. The application hosting a task is staged once and reused by every later launch under the same
 * name; every launch creates a new task.
 */
@injectable()
export class TaskLauncher {
  private readonly client: CloudFoundryClient;
  private readonly applications: ApplicationDriver;
  private readonly packages: PackageDriver;
  private readonly droplets: DropletDriver;
  private readonly tasks: TaskDriver;
  private readonly resolver: DeploymentPropertiesResolver;
  private readonly environmentBuilder: EnvironmentVariablesBuilder;
  private readonly properties: DeployerProperties;
  private readonly logger: DeployerLogger;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.ApplicationDriver) applications?: ApplicationDriver,
    @inject(InjectTokens.PackageDriver) packages?: PackageDriver,
    @inject(InjectTokens.DropletDriver) droplets?: DropletDriver,
    @inject(InjectTokens.TaskDriver) tasks?: TaskDriver,
    @inject(InjectTokens.DeploymentPropertiesResolver) resolver?: DeploymentPropertiesResolver,
    @inject(InjectTokens.EnvironmentVariablesBuilder) environmentBuilder?: EnvironmentVariablesBuilder,
    @inject(InjectTokens.DeployerProperties) properties?: DeployerProperties,
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
  ) {
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
    this.applications = patchInject(applications, InjectTokens.ApplicationDriver, this.constructor.name);
    this.packages = patchInject(packages, InjectTokens.PackageDriver, this.constructor.name);
    this.droplets = patchInject(droplets, InjectTokens.DropletDriver, this.constructor.name);
    this.tasks = patchInject(tasks, InjectTokens.TaskDriver, this.constructor.name);
    this.resolver = patchInject(resolver, InjectTokens.DeploymentPropertiesResolver, this.constructor.name);
    this.environmentBuilder = patchInject(
      environmentBuilder,
      InjectTokens.EnvironmentVariablesBuilder,
      this.constructor.name,
    );
    this.properties = patchInject(properties, InjectTokens.DeployerProperties, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
  }

  /**
   * Stages the application when needed and starts a new task on its latest droplet.
   *
   * @returns the id of the created task
   */
  public async launch(request: AppDeploymentRequest): Promise<string> {
    const staged: StagedTask = await this.stage(request, request.definition.name);
    const task: ResourceHandle<Task> = await this.tasks.create({
      applicationId: staged.applicationId,
      name: request.definition.name,
      command: staged.command,
      dropletId: staged.dropletId,
      memory: staged.memory,
      disk: staged.disk,
    });
    this.logger.info(`launched task ${task.id} of ${staged.applicationName}`);
    return task.id;
  }

  /**
   * Makes sure an application named `applicationName` exists with a staged droplet and its services bound.
   *
   * @throws {StagingFailedError} when staging settles in any state but STAGED
   * @throws {MissingProcessTypeError} when no command can be derived from the droplet
   */
  public async stage(request: AppDeploymentRequest, applicationName: string): Promise<StagedTask> {
    const properties: DeploymentProperties = request.deploymentProperties;
    const memory: number = this.resolver.memory(properties);
    const disk: number = this.resolver.disk(properties);

    let application: ResourceHandle<Application> | undefined = await this.applications.findByName(applicationName);
    let droplet: Droplet | undefined;
    if (application) {
      droplet = await this.applications.latestStagedDroplet(application.id);
      if (droplet) {
        this.logger.debug(`reusing ${applicationName} and its droplet ${droplet.id}`);
      } else {
        this.logger.debug(`${applicationName} exists without a staged droplet, staging it again`);
        droplet = await this.stageDroplet(application, request, memory, disk);
      }
    } else {
      application = await this.createApplication(request, applicationName);
      droplet = await this.stageDroplet(application, request, memory, disk);
    }

    await this.bindServices(application.id, this.resolver.services(properties));

    return {
      applicationId: application.id,
      applicationName,
      dropletId: droplet.id,
      command: this.command(applicationName, droplet, request),
      memory,
      disk,
    };
  }

  public cancel(taskId: string): AsyncOperation {
    this.logger.info(`cancelling task ${taskId}`);
    return new AsyncOperation(`cancellation of task ${taskId}`, this.tasks.cancel(taskId), this.logger);
  }

  /**
   * Reports `unknown` when the task cannot be read within the task status timeout.
   *
   * @throws {UnsupportedStateError} when the task reports a state outside the known set
   */
  public async taskStatus(taskId: string): Promise<TaskStatus> {
    let task: ResourceHandle<Task>;
    try {
      task = await withTimeout(this.tasks.get(taskId), this.properties.taskStatusTimeout, `status of task ${taskId}`);
    } catch (error) {
      this.logger.error(`failed to determine the status of task ${taskId}`, error);
      return {taskId, state: LaunchState.UNKNOWN, attributes: {}};
    }

    const attributes: Record<string, string> = {};
    if (task.resource.failureReason) {
      attributes['failure-reason'] = task.resource.failureReason;
    }
    return {taskId, state: toLaunchState(task.resource.state), attributes};
  }

  /**
   * Deletes the application hosting the tasks launched under the given name. A missing application is not an error.
   */
  public async destroy(applicationName: string): Promise<void> {
    const application: ResourceHandle<Application> | undefined = await this.applications.findByName(applicationName);
    if (!application) {
      this.logger.warn(`cannot destroy ${applicationName}: no such application`);
      return;
    }
    await withTimeout(this.applications.delete(application.id), this.properties.apiTimeout, `deletion of ${applicationName}`);
    this.logger.info(`destroyed ${applicationName}`);
  }

  private async createApplication(
    request: AppDeploymentRequest,
    applicationName: string,
  ): Promise<ResourceHandle<Application>> {
    const properties: DeploymentProperties = request.deploymentProperties;
    const spaceId: string = await this.client.spaceId();
    this.logger.debug(`creating application ${applicationName}`);
    return this.applications.create({
      name: applicationName,
      spaceId,
      lifecycle:
        request.resource.kind === 'docker'
          ? {type: 'docker'}
          : {type: 'buildpack', buildpacks: this.resolver.buildpacks(properties), stack: this.resolver.stack(properties)},
      environmentVariables: this.environmentBuilder.forProperties(
        request.definition.properties,
        this.resolver.useSpringApplicationJson(properties),
      ),
    });
  }

  private async stageDroplet(
    application: ResourceHandle<Application>,
    request: AppDeploymentRequest,
    memory: number,
    disk: number,
  ): Promise<Droplet> {
    const name: string = application.resource.name;
    let pkg: ResourceHandle<Package> = await this.packages.create(
      request.resource.kind === 'docker'
        ? {applicationId: application.id, type: 'docker', image: request.resource.image}
        : {applicationId: application.id, type: 'bits'},
    );
    if (request.resource.kind === 'file') {
      pkg = await this.packages.upload(pkg, request.resource.path);
    }

    pkg = await this.packages.waitReady(
      pkg,
      (current: ResourceHandle<Package>): boolean =>
        current.state === ResourceState.READY || current.state === ResourceState.FAILED,
      PACKAGE_READY_POLICY,
    );
    if (pkg.state !== ResourceState.READY) {
      throw new StagingFailedError(name, `package ${pkg.id} is ${pkg.resource.state}`);
    }

    const started: ResourceHandle<Build> = await this.droplets.create({
      packageId: pkg.id,
      stagingMemory: memory,
      stagingDisk: disk,
    });
    const build: ResourceHandle<Build> = await this.droplets.waitReady(
      started,
      (current: ResourceHandle<Build>): boolean => current.state !== ResourceState.PENDING,
      DROPLET_READY_POLICY,
    );
    if (build.state !== ResourceState.STAGED) {
      throw new StagingFailedError(name, build.resource.error ?? `build ${build.id} is ${build.resource.state}`);
    }
    if (!build.resource.dropletId) {
      throw new StagingFailedError(name, `build ${build.id} produced no droplet`);
    }
    this.logger.debug(`staged ${name} into droplet ${build.resource.dropletId}`);
    return this.droplets.getDroplet(build.resource.dropletId);
  }

  /**
   * Binds the named service instances the application is not bound to yet.
   */
  private async bindServices(applicationId: string, serviceNames: string[]): Promise<void> {
    if (serviceNames.length === 0) {
      return;
    }

    const spaceId: string = await this.client.spaceId();
    const instances: ServiceInstance[] = await PageDrainer.drain(
      (page: number): Promise<Page<ServiceInstance>> =>
        this.client.serviceInstances.list({names: serviceNames, spaceId, page}),
    );
    const bindings: ServiceBinding[] = await PageDrainer.drain(
      (page: number): Promise<Page<ServiceBinding>> => this.client.serviceBindings.list({applicationId, page}),
    );
    const bound: Set<string> = new Set<string>(
      bindings.map((binding: ServiceBinding): string => binding.serviceInstanceId),
    );

    for (const serviceName of serviceNames) {
      const instance: ServiceInstance | undefined = instances.find(
        (candidate: ServiceInstance): boolean => candidate.name === serviceName,
      );
      if (!instance) {
        throw new ResourceNotFoundError(ResourceOperation.READ, ResourceType.SERVICE_INSTANCE, serviceName);
      }
      if (!bound.has(instance.id)) {
        await this.client.serviceBindings.create({applicationId, serviceInstanceId: instance.id});
        this.logger.debug(`bound service ${serviceName} to application ${applicationId}`);
      }
    }
  }

  private command(applicationName: string, droplet: Droplet, request: AppDeploymentRequest): string {
    const explicit: string | undefined = this.resolver.taskCommand(request.deploymentProperties);
    if (explicit) {
      return explicit;
    }

    const web: string | undefined = droplet.processTypes.web;
    if (!web || web.trim().length === 0) {
      throw new MissingProcessTypeError(applicationName, droplet.id);
    }
    return request.commandlineArguments.length > 0 ? `${web} ${request.commandlineArguments.join(' ')}` : web;
  }
}
