// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type CloudFoundryClient} from '../cloud-foundry-client.js';
import {type Applications} from '../resources/application/applications.js';
import {type Packages} from '../resources/package/packages.js';
import {type Builds} from '../resources/build/builds.js';
import {type Droplets} from '../resources/droplet/droplets.js';
import {type Tasks} from '../resources/task/tasks.js';
import {type ServiceInstances} from '../resources/service/service-instances.js';
import {type ServiceBindings} from '../resources/service/service-bindings.js';
import {type Jobs} from '../resources/job/jobs.js';
import {type Spaces} from '../resources/space/spaces.js';
import {type Space} from '../resources/space/space.js';
import {type Page} from '../../../core/pagination/page.js';
import {type DeployerProperties} from '../../../core/config/deployer-properties.js';
import {type DeployerLogger} from '../../../core/logging/deployer-logger.js';
import {type Poller} from '../../../core/retry/poller.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {CloudFoundryHttp} from './cloud-foundry-http.js';
import {PlatformJobTracker} from './platform-job-tracker.js';
import {RestApplications} from './resources/rest-applications.js';
import {RestPackages} from './resources/rest-packages.js';
import {RestBuilds} from './resources/rest-builds.js';
import {RestDroplets} from './resources/rest-droplets.js';
import {RestTasks} from './resources/rest-tasks.js';
import {RestServiceInstances} from './resources/rest-service-instances.js';
import {RestServiceBindings} from './resources/rest-service-bindings.js';
import {RestJobs} from './resources/rest-jobs.js';
import {RestSpaces} from './resources/rest-spaces.js';
import {ResourceNotFoundError} from '../errors/resource-not-found-error.js';
import {ResourceOperation} from '../resources/resource-operation.js';
import {ResourceType} from '../resources/resource-type.js';

/**
 * {@link CloudFoundryClient} speaking the v3 platform API and the scheduler service's REST API.
 */
@injectable()
export class RestCloudFoundryClient implements CloudFoundryClient {
  public readonly applications: Applications;
  public readonly packages: Packages;
  public readonly builds: Builds;
  public readonly droplets: Droplets;
  public readonly tasks: Tasks;
  public readonly serviceInstances: ServiceInstances;
  public readonly serviceBindings: ServiceBindings;
  public readonly jobs: Jobs;
  public readonly spaces: Spaces;

  private readonly properties: DeployerProperties;
  private readonly logger: DeployerLogger;
  private spaceLookup?: Promise<string>;

  public constructor(
    @inject(InjectTokens.DeployerProperties) properties?: DeployerProperties,
    @inject(InjectTokens.Poller) poller?: Poller,
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
  ) {
    this.properties = patchInject(properties, InjectTokens.DeployerProperties, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
    const resolvedPoller: Poller = patchInject(poller, InjectTokens.Poller, this.constructor.name);

    const platform: CloudFoundryHttp = CloudFoundryHttp.create({
      baseUrl: this.properties.connection.url,
      accessToken: this.properties.connection.accessToken,
      skipSslValidation: this.properties.connection.skipSslValidation,
      requestTimeout: this.properties.connection.requestTimeout,
    });
    const jobTracker: PlatformJobTracker = new PlatformJobTracker(platform, resolvedPoller);

    this.packages = new RestPackages(platform);
    this.builds = new RestBuilds(platform);
    this.droplets = new RestDroplets(platform);
    this.tasks = new RestTasks(platform);
    this.serviceInstances = new RestServiceInstances(platform);
    this.serviceBindings = new RestServiceBindings(platform, jobTracker, this.properties.apiTimeout);
    this.spaces = new RestSpaces(platform);
    this.applications = new RestApplications(
      platform,
      (): Promise<string> => this.spaceId(),
      this.packages,
      this.builds,
      resolvedPoller,
      jobTracker,
      this.properties.apiTimeout,
    );
    this.jobs = new RestJobs(
      CloudFoundryHttp.create({
        baseUrl: this.properties.scheduler.url || this.properties.connection.url,
        accessToken: this.properties.connection.accessToken,
        skipSslValidation: this.properties.connection.skipSslValidation,
        requestTimeout: this.properties.connection.requestTimeout,
      }),
    );
  }

  /**
   * Resolves the configured space once. A failed lookup is not remembered.
   */
  public spaceId(): Promise<string> {
    if (!this.spaceLookup) {
      this.spaceLookup = this.lookupSpace().catch((error: unknown): never => {
        this.spaceLookup = undefined;
        throw error;
      });
    }
    return this.spaceLookup;
  }

  private async lookupSpace(): Promise<string> {
    const {organization, space} = this.properties.connection;
    const page: Page<Space> = await this.spaces.list({names: [space], organizationName: organization, page: 1});
    const found: Space | undefined = page.resources[0];
    if (!found) {
      throw new ResourceNotFoundError(ResourceOperation.READ, ResourceType.SPACE, `${organization}/${space}`);
    }
    this.logger.debug(`resolved space ${organization}/${space} to ${found.id}`);
    return found.id;
  }
}
