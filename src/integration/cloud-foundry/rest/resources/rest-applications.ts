// SPDX-License-Identifier: Apache-2.0

import {StatusCodes} from 'http-status-codes';
import {type Applications} from '../../resources/application/applications.js';
import {
  type Application,
  type ApplicationDetail,
  type ApplicationEnvironment,
  type CreateApplicationRequest,
  type InstanceDetail,
  type ListApplicationsRequest,
  type ScaleApplicationRequest,
} from '../../resources/application/application.js';
import {type ApplicationManifest, type PushManifestRequest} from '../../resources/application/application-manifest.js';
import {type Droplet} from '../../resources/droplet/droplet.js';
import {type Page} from '../../../../core/pagination/page.js';
import {PageDrainer} from '../../../../core/pagination/page-drainer.js';
import {type Poller} from '../../../../core/retry/poller.js';
import {BackoffPolicy} from '../../../../core/retry/backoff-policy.js';
import {Duration} from '../../../../core/time/duration.js';
import * as constants from '../../../../core/constants.js';
import {type CloudFoundryHttp, type RequestContext} from '../cloud-foundry-http.js';
import {type PlatformJobTracker} from '../platform-job-tracker.js';
import {type RawPage, type RawRelationship, toPage} from '../raw-page.js';
import {type RawDroplet, toDroplet} from './rest-droplets.js';
import {type Packages} from '../../resources/package/packages.js';
import {type Builds} from '../../resources/build/builds.js';
import {toManifestYaml} from '../manifest-writer.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';
import {ResourceNotFoundError} from '../../errors/resource-not-found-error.js';
import {CloudFoundryApiError} from '../../errors/cloud-foundry-api-error.js';
import {type Package} from '../../resources/package/package.js';
import {type Build} from '../../resources/build/build.js';

interface RawApplication {
  guid: string;
  name: string;
  state: string;
  relationships: {space: RawRelationship};
}

interface RawProcess {
  guid: string;
  instances: number;
  memory_in_mb: number;
  disk_in_mb: number;
}

interface RawProcessStats {
  index: number;
  state: string;
  uptime?: number;
  usage?: {cpu?: number; mem?: number; disk?: number; time?: string};
  mem_quota?: number | null;
  disk_quota?: number | null;
}

interface RawRoute {
  guid: string;
  url: string;
}

interface RawEnvironment {
  environment_variables?: Record<string, unknown>;
}

export type SpaceIdSupplier = () => Promise<string>;

/**
 * Application operations against the v3 API. Pushing follows the same sequence the cf CLI runs: apply the manifest,
 * upload and stage a package, point the application at the new droplet and restart it.
 */
export class RestApplications implements Applications {
  public constructor(
    private readonly http: CloudFoundryHttp,
    private readonly spaceId: SpaceIdSupplier,
    private readonly packages: Packages,
    private readonly builds: Builds,
    private readonly poller: Poller,
    private readonly jobTracker: PlatformJobTracker,
    private readonly jobTimeout: Duration,
  ) {}

  public async create(request: CreateApplicationRequest): Promise<Application> {
    const lifecycle: Record<string, unknown> =
      request.lifecycle.type === 'docker'
        ? {type: 'docker', data: {}}
        : {type: 'buildpack', data: {buildpacks: request.lifecycle.buildpacks, stack: request.lifecycle.stack}};

    const raw: RawApplication = await this.http.postJson<RawApplication>(
      'v3/apps',
      {
        name: request.name,
        relationships: {space: {data: {guid: request.spaceId}}},
        lifecycle,
        environment_variables: request.environmentVariables ?? {},
      },
      this.context(ResourceOperation.CREATE, request.name),
    );
    return RestApplications.toApplication(raw);
  }

  public async get(id: string): Promise<Application> {
    const raw: RawApplication = await this.http.getJson<RawApplication>(
      `v3/apps/${id}`,
      this.context(ResourceOperation.READ, id),
    );
    return RestApplications.toApplication(raw);
  }

  public async list(request: ListApplicationsRequest): Promise<Page<Application>> {
    const raw: RawPage<RawApplication> = await this.http.getJson<RawPage<RawApplication>>(
      'v3/apps',
      this.context(ResourceOperation.LIST, request.names?.join(',') ?? '*'),
      {names: request.names?.join(','), space_guids: request.spaceId, page: request.page},
    );
    return toPage(raw, RestApplications.toApplication);
  }

  public async delete(id: string): Promise<void> {
    const context: RequestContext = this.context(ResourceOperation.DELETE, id);
    const location: string | undefined = await this.http.delete(`v3/apps/${id}`, context);
    if (location) {
      await this.jobTracker.awaitCompletion(location, this.jobTimeout, context);
    }
  }

  public async getDetail(name: string): Promise<ApplicationDetail> {
    const application: Application = await this.findByName(name, ResourceOperation.READ);
    const context: RequestContext = this.context(ResourceOperation.READ, name);

    const [process, stats, routes] = await Promise.all([
      this.http.getJson<RawProcess>(`v3/apps/${application.id}/processes/web`, context),
      this.http.getJson<{resources: RawProcessStats[]}>(`v3/apps/${application.id}/processes/web/stats`, context),
      this.http.getJson<RawPage<RawRoute>>(`v3/apps/${application.id}/routes`, context),
    ]);

    const instanceDetails: InstanceDetail[] = stats.resources.map(
      (stat: RawProcessStats): InstanceDetail => ({
        index: stat.index,
        state: stat.state,
        cpu: stat.usage?.cpu,
        memoryUsage: stat.usage?.mem,
        memoryQuota: stat.mem_quota ?? undefined,
        diskUsage: stat.usage?.disk,
        diskQuota: stat.disk_quota ?? undefined,
        since: stat.usage?.time,
      }),
    );

    return {
      id: application.id,
      name: application.name,
      requestedState: application.state,
      instances: process.instances,
      runningInstances: instanceDetails.filter((detail: InstanceDetail): boolean => detail.state === 'RUNNING')
        .length,
      memoryLimit: process.memory_in_mb,
      diskQuota: process.disk_in_mb,
      urls: routes.resources.map((route: RawRoute): string => route.url),
      instanceDetails,
    };
  }

  public async push(request: PushManifestRequest): Promise<void> {
    const manifest: ApplicationManifest = request.manifest;
    const spaceId: string = await this.spaceId();
    const context: RequestContext = this.context(ResourceOperation.UPDATE, manifest.name);

    const response: {statusCode: number; headers: {location?: string}} = await this.http.postBody(
      `v3/spaces/${spaceId}/actions/apply_manifest`,
      toManifestYaml(manifest),
      context,
      'application/x-yaml',
    );
    if (response.statusCode === StatusCodes.ACCEPTED && response.headers.location) {
      await this.jobTracker.awaitCompletion(response.headers.location, request.stagingTimeout, context);
    }

    const application: Application = await this.findByName(manifest.name, ResourceOperation.UPDATE);
    const created: Package = await this.packages.create(
      manifest.dockerImage
        ? {applicationId: application.id, type: 'docker', image: manifest.dockerImage}
        : {applicationId: application.id, type: 'bits'},
    );
    if (manifest.path) {
      await this.packages.upload(created.id, manifest.path);
    }

    const pkg: Package = await this.poller.waitUntil(
      (): Promise<Package> => this.packages.get(created.id),
      (current: Package): boolean => current.state === 'READY' || current.state === 'FAILED',
      BackoffPolicy.exponential(
        constants.PACKAGE_READY_MAX_ATTEMPTS,
        Duration.ofSeconds(constants.PACKAGE_READY_INITIAL_DELAY_SECONDS),
        Duration.ofMinutes(constants.READY_MAX_DELAY_MINUTES),
        request.stagingTimeout,
      ),
      `package of '${manifest.name}' to become ready`,
    );
    if (pkg.state !== 'READY') {
      throw new CloudFoundryApiError(`package of '${manifest.name}' ended in state ${pkg.state}`);
    }

    const started: Build = await this.builds.create({
      packageId: pkg.id,
      stagingMemory: manifest.memory,
      stagingDisk: manifest.disk,
    });
    const build: Build = await this.poller.waitUntil(
      (): Promise<Build> => this.builds.get(started.id),
      (current: Build): boolean => current.state !== 'STAGING',
      BackoffPolicy.exponential(
        constants.DROPLET_READY_MAX_ATTEMPTS,
        Duration.ofSeconds(constants.DROPLET_READY_INITIAL_DELAY_SECONDS),
        Duration.ofMinutes(constants.READY_MAX_DELAY_MINUTES),
        request.stagingTimeout,
      ),
      `staging of '${manifest.name}'`,
    );
    if (build.state !== 'STAGED' || !build.dropletId) {
      throw new CloudFoundryApiError(`staging of '${manifest.name}' failed: ${build.error ?? build.state}`);
    }

    await this.http.patchJson<unknown>(
      `v3/apps/${application.id}/relationships/current_droplet`,
      {data: {guid: build.dropletId}},
      context,
    );
    await this.http.postJson<RawApplication>(`v3/apps/${application.id}/actions/restart`, undefined, context);

    if (manifest.instances > 0) {
      await this.poller.waitUntil(
        (): Promise<{resources: RawProcessStats[]}> =>
          this.http.getJson<{resources: RawProcessStats[]}>(`v3/apps/${application.id}/processes/web/stats`, context),
        (stats: {resources: RawProcessStats[]}): boolean =>
          stats.resources.some((stat: RawProcessStats): boolean => stat.state === 'RUNNING'),
        BackoffPolicy.exponential(
          constants.STARTUP_MAX_ATTEMPTS,
          Duration.ofSeconds(1),
          Duration.ofSeconds(15),
          request.startupTimeout,
        ),
        `start of '${manifest.name}'`,
      );
    }
  }

  public async deleteByName(name: string, deleteRoutes: boolean): Promise<void> {
    const application: Application = await this.findByName(name, ResourceOperation.DELETE);

    if (deleteRoutes) {
      const routes: RawRoute[] = await PageDrainer.drain(
        async (page: number): Promise<Page<RawRoute>> =>
          toPage(
            await this.http.getJson<RawPage<RawRoute>>(
              `v3/apps/${application.id}/routes`,
              this.context(ResourceOperation.LIST, name),
              {page},
            ),
            (route: RawRoute): RawRoute => route,
          ),
      );
      for (const route of routes) {
        const context: RequestContext = {operation: ResourceOperation.DELETE, type: ResourceType.ROUTE, name: route.url};
        const location: string | undefined = await this.http.delete(`v3/routes/${route.guid}`, context);
        if (location) {
          await this.jobTracker.awaitCompletion(location, this.jobTimeout, context);
        }
      }
    }

    await this.delete(application.id);
  }

  public async listDroplets(applicationId: string, page: number): Promise<Page<Droplet>> {
    const raw: RawPage<RawDroplet> = await this.http.getJson<RawPage<RawDroplet>>(
      `v3/apps/${applicationId}/droplets`,
      {operation: ResourceOperation.LIST, type: ResourceType.DROPLET, name: applicationId},
      {page},
    );
    return toPage(raw, toDroplet);
  }

  public async getEnvironment(applicationId: string): Promise<ApplicationEnvironment> {
    const raw: RawEnvironment = await this.http.getJson<RawEnvironment>(
      `v3/apps/${applicationId}/env`,
      this.context(ResourceOperation.READ, applicationId),
    );
    return {userProvided: raw.environment_variables ?? {}};
  }

  public async scale(request: ScaleApplicationRequest): Promise<void> {
    const application: Application = await this.findByName(request.name, ResourceOperation.UPDATE);
    const body: Record<string, number> = {instances: request.instances};
    if (request.memoryLimit !== undefined) {
      body.memory_in_mb = request.memoryLimit;
    }
    if (request.diskLimit !== undefined) {
      body.disk_in_mb = request.diskLimit;
    }
    await this.http.postJson<RawProcess>(
      `v3/apps/${application.id}/processes/web/actions/scale`,
      body,
      this.context(ResourceOperation.UPDATE, request.name),
    );
  }

  private async findByName(name: string, operation: ResourceOperation): Promise<Application> {
    const spaceId: string = await this.spaceId();
    const page: Page<Application> = await this.list({names: [name], spaceId, page: 1});
    const application: Application | undefined = page.resources[0];
    if (!application) {
      throw new ResourceNotFoundError(operation, ResourceType.APPLICATION, name);
    }
    return application;
  }

  private context(operation: ResourceOperation, name: string): RequestContext {
    return {operation, type: ResourceType.APPLICATION, name};
  }

  private static toApplication(raw: RawApplication): Application {
    return {
      id: raw.guid,
      name: raw.name,
      state: raw.state,
      spaceId: raw.relationships.space.data?.guid ?? '',
    };
  }
}
