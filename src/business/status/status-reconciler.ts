// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {AppStatus, type AppStatusBuilder} from './app-status.js';
import {AppInstanceStatus} from './app-instance-status.js';
import {DeploymentState} from './deployment-state.js';
import {type DeployerProperties} from '../../core/config/deployer-properties.js';
import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import {type Poller} from '../../core/retry/poller.js';
import {BackoffPolicy} from '../../core/retry/backoff-policy.js';
import {withTimeout} from '../../core/helpers.js';
import {type Duration} from '../../core/time/duration.js';
import * as constants from '../../core/constants.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type CloudFoundryClient} from '../../integration/cloud-foundry/cloud-foundry-client.js';
import {CloudFoundryApiResponse} from '../../integration/cloud-foundry/cloud-foundry-api-response.js';
import {type ApplicationDetail} from '../../integration/cloud-foundry/resources/application/application.js';

/**
 * Compares what was requested for a deployment with what the platform observes and condenses it into an
 * {@link AppStatus}.
 */
@injectable()
export class StatusReconciler {
  private readonly client: CloudFoundryClient;
  private readonly poller: Poller;
  private readonly properties: DeployerProperties;
  private readonly logger: DeployerLogger;

  public constructor(
    @inject(InjectTokens.CloudFoundryClient) client?: CloudFoundryClient,
    @inject(InjectTokens.Poller) poller?: Poller,
    @inject(InjectTokens.DeployerProperties) properties?: DeployerProperties,
    @inject(InjectTokens.DeployerLogger) logger?: DeployerLogger,
  ) {
    this.client = patchInject(client, InjectTokens.CloudFoundryClient, this.constructor.name);
    this.poller = patchInject(poller, InjectTokens.Poller, this.constructor.name);
    this.properties = patchInject(properties, InjectTokens.DeployerProperties, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.DeployerLogger, this.constructor.name);
  }

  /**
   * Never throws for a missing application or an unreachable platform: the first yields a status without
   * instances, the second a status in state error once the status timeout is spent.
   *
   * @throws {UnsupportedStateError} when an instance reports a state outside the known set
   */
  public async status(deploymentId: string): Promise<AppStatus> {
    let detail: ApplicationDetail;
    try {
      detail = await this.fetchDetail(deploymentId);
    } catch (error) {
      if (CloudFoundryApiResponse.isNotFound(error)) {
        this.logger.debug(`application ${deploymentId} does not exist`);
        return AppStatus.of(deploymentId).build();
      }
      this.logger.error(`failed to determine the status of ${deploymentId}`, error);
      return AppStatus.of(deploymentId).withGeneralState(DeploymentState.ERROR).build();
    }

    return this.toStatus(deploymentId, detail);
  }

  private fetchDetail(deploymentId: string): Promise<ApplicationDetail> {
    const timeout: Duration = this.properties.statusTimeout;
    const description: string = `status of ${deploymentId}`;
    return withTimeout(
      this.poller.retry(
        (attempt: number): Promise<ApplicationDetail> => {
          if (attempt > 1) {
            this.logger.debug(`retrying ${description}, attempt ${attempt}`);
          }
          return this.client.applications.getDetail(deploymentId);
        },
        BackoffPolicy.exponential(
          constants.STATUS_RETRY_MAX_ATTEMPTS,
          timeout.dividedBy(20),
          timeout.dividedBy(5),
          timeout,
        ),
        (error: unknown): boolean => !CloudFoundryApiResponse.isNotFound(error),
        description,
      ),
      timeout,
      description,
    );
  }

  private toStatus(deploymentId: string, detail: ApplicationDetail): AppStatus {
    const builder: AppStatusBuilder = AppStatus.of(deploymentId);
    const observed: Set<number> = new Set<number>();

    for (const instance of detail.instanceDetails) {
      builder.with(new AppInstanceStatus(detail, instance.index, instance));
      observed.add(instance.index);
    }
    for (let index: number = 0; index < detail.instances; index++) {
      if (!observed.has(index)) {
        builder.with(new AppInstanceStatus(detail, index));
      }
    }

    return builder.build();
  }
}
