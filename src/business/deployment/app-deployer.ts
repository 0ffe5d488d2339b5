// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type AppDeploymentRequest, type AppScaleRequest} from './app-deployment-request.js';
import {AsyncOperation} from './async-operation.js';
import {DeploymentHandle, DeploymentPhase} from './deployment-handle.js';
import {type AppNameGenerator} from './app-name-generator.js';
import {
  type DeploymentProperties,
  type DeploymentPropertiesResolver,
  type HealthCheck,
} from './deployment-properties-resolver.js';
import {type EnvironmentVariablesBuilder} from './environment-variables-builder.js';
import {toMegabytes} from './byte-size.js';
import {AlreadyDeployedError} from './errors/already-deployed-error.js';
import {NotDeployedError} from './errors/not-deployed-error.js';
import {type AppStatus} from '../status/app-status.js';
import {DeploymentState} from '../status/deployment-state.js';
import {type StatusReconciler} from '../status/status-reconciler.js';
import {type DeployerProperties} from '../../core/config/deployer-properties.js';
import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {withTimeout} from '../../core/helpers.js';
import * as constants from '../../core/constants.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {type ApplicationManifest} from '../../integration/cloud-foundry/resources/application/application-manifest.js';

/**
 * Deploys long running applications. Deploy and undeploy return once the request is accepted; the remote work
 * reports through the returned handle.
 */
@injectable()
export class AppDeployer {
  private readonly client: CloudFoundryClient;
  private readonly properties: DeployerProperties;
  private readonly resolver: DeploymentPropertiesResolver;
  private readonly environmentBuilder: EnvironmentVariablesBuilder;
  private readonly nameGenerator: AppNameGenerator;
  private readonly statusReconciler: StatusReconciler;
  private readonly logger: DeployerLogger;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.DeployerProperties) properties?: DeployerProperties,
    @inject(InjectTokens.DeploymentPropertiesResolver) resolver?: DeploymentPropertiesResolver,
    @inject(InjectTokens.EnvironmentVariablesBuilder) environmentBuilder?: EnvironmentVariablesBuilder,
    @inject(InjectTokens.AppNameGenerator) nameGenerator?: AppNameGenerator,
    @inject(InjectTokens.StatusReconciler) statusReconciler?: StatusReconciler,
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
  ) {
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
    this.properties = patchInject(properties, InjectTokens.DeployerProperties, this.constructor.name);
    this.resolver = patchInject(resolver, InjectTokens.DeploymentPropertiesResolver, this.constructor.name);
    this.environmentBuilder = patchInject(
      environmentBuilder,
      InjectTokens.EnvironmentVariablesBuilder,
      this.constructor.name,
    );
    this.nameGenerator = patchInject(nameGenerator, InjectTokens.AppNameGenerator, this.constructor.name);
    this.statusReconciler = patchInject(statusReconciler, InjectTokens.StatusReconciler, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
  }

  /**
   * The platform name for a request: the group, when there is one, prefixes the application name.
   */
  public deploymentId(request: AppDeploymentRequest): string {
    const group: string | undefined = this.resolver.group(request.deploymentProperties);
    const name: string = group ? `${group}-${request.definition.name}` : request.definition.name;
    return this.nameGenerator.generate(name);
  }

  /**
   * Validates the request, refuses ids that are already live and starts the push without waiting for it.
   *
   * @throws {IllegalArgumentError} for invalid sizes, counts or health checks
   * @throws {AlreadyDeployedError} when an application with the id exists in any state but unknown or error
   */
  public async deploy(request: AppDeploymentRequest): Promise<DeploymentHandle> {
    this.resolver.validate(request.deploymentProperties);
    const handle: DeploymentHandle = new DeploymentHandle(this.deploymentId(request), this.logger);
    this.logger.info(`deploying ${request.definition.name} as ${handle.id}`);

    handle.transition(DeploymentPhase.CHECKING_EXISTENCE);
    const status: AppStatus = await this.statusReconciler.status(handle.id);
    if (status.state !== DeploymentState.UNKNOWN && status.state !== DeploymentState.ERROR) {
      handle.transition(DeploymentPhase.ERROR);
      throw new AlreadyDeployedError(handle.id, status.state);
    }
    handle.transition(status.state === DeploymentState.UNKNOWN ? DeploymentPhase.CREATING : DeploymentPhase.REUSING);

    handle.transition(DeploymentPhase.CONFIGURING);
    const manifest: ApplicationManifest = this.manifest(handle.id, request);

    handle.transition(DeploymentPhase.STARTING);
    handle.track(
      withTimeout(
        this.client.applications.push({
          manifest,
          stagingTimeout: this.properties.stagingTimeout,
          startupTimeout: this.properties.startupTimeout,
        }),
        this.properties.apiTimeout,
        `push of ${handle.id}`,
      ),
    );
    return handle;
  }

  /**
   * @throws {NotDeployedError} when no application with the id exists
   */
  public async undeploy(deploymentId: string): Promise<AsyncOperation> {
    const status: AppStatus = await this.statusReconciler.status(deploymentId);
    if (status.state === DeploymentState.UNKNOWN) {
      throw new NotDeployedError(deploymentId);
    }

    this.logger.info(`undeploying ${deploymentId}`);
    return new AsyncOperation(
      `undeployment of ${deploymentId}`,
      withTimeout(
        this.client.applications.deleteByName(deploymentId, true),
        this.properties.apiTimeout,
        `undeployment of ${deploymentId}`,
      ),
      this.logger,
    );
  }

  public status(deploymentId: string): Promise<AppStatus> {
    return this.statusReconciler.status(deploymentId);
  }

  /**
   * Changes the instance count and, optionally, the memory and disk limits of a deployed application.
   *
   * @throws {NotDeployedError} when no application with the id exists
   */
  public async scale(request: AppScaleRequest): Promise<AsyncOperation> {
    if (!Number.isInteger(request.count) || request.count < 0) {
      throw new IllegalArgumentError(`instance count must be a non-negative integer: ${request.count}`);
    }
    const memoryLimit: number | undefined =
      request.memory === undefined ? undefined : toMegabytes(request.memory, constants.MEMORY_PROPERTY_KEY);
    const diskLimit: number | undefined =
      request.disk === undefined ? undefined : toMegabytes(request.disk, constants.DISK_PROPERTY_KEY);

    const status: AppStatus = await this.statusReconciler.status(request.deploymentId);
    if (status.state === DeploymentState.UNKNOWN) {
      throw new NotDeployedError(request.deploymentId);
    }

    this.logger.info(`scaling ${request.deploymentId} to ${request.count} instance(s)`);
    return new AsyncOperation(
      `scaling of ${request.deploymentId}`,
      withTimeout(
        this.client.applications.scale({
          name: request.deploymentId,
          instances: request.count,
          memoryLimit,
          diskLimit,
        }),
        this.properties.apiTimeout,
        `scaling of ${request.deploymentId}`,
      ),
      this.logger,
    );
  }

  private manifest(deploymentId: string, request: AppDeploymentRequest): ApplicationManifest {
    const properties: DeploymentProperties = request.deploymentProperties;
    const healthCheck: HealthCheck = this.resolver.healthCheck(properties);

    return {
      name: deploymentId,
      path: request.resource.kind === 'file' ? request.resource.path : undefined,
      dockerImage: request.resource.kind === 'docker' ? request.resource.image : undefined,
      buildpacks: request.resource.kind === 'file' ? this.resolver.buildpacks(properties) : [],
      stack: this.resolver.stack(properties),
      memory: this.resolver.memory(properties),
      disk: this.resolver.disk(properties),
      instances: this.resolver.instances(properties),
      healthCheckType: healthCheck.type,
      healthCheckHttpEndpoint: healthCheck.httpEndpoint,
      healthCheckTimeout: healthCheck.timeout,
      noRoute: this.resolver.noRoute(properties),
      routes: this.resolver.routes(deploymentId, properties),
      services: this.resolver.services(properties),
      environmentVariables: this.environmentBuilder.forApplication({
        properties: request.definition.properties,
        commandlineArguments: request.commandlineArguments,
        group: this.resolver.group(properties),
        useSpringApplicationJson: this.resolver.useSpringApplicationJson(properties),
      }),
    };
  }
}
