// SPDX-License-Identifier: Apache-2.0

import {DeploymentState} from './deployment-state.js';
import {type AppInstanceStatus} from './app-instance-status.js';

/**
 * Aggregate status of a deployment, built fresh for every query.
 */
export class AppStatus {
  private constructor(
    public readonly deploymentId: string,
    public readonly instances: readonly AppInstanceStatus[],
    private readonly generalState?: DeploymentState,
  ) {}

  public static of(deploymentId: string): AppStatusBuilder {
    return new AppStatusBuilder(deploymentId);
  }

  public get state(): DeploymentState {
    if (this.generalState) {
      return this.generalState;
    }
    if (this.instances.length === 0) {
      return DeploymentState.UNKNOWN;
    }

    const states: Set<DeploymentState> = new Set<DeploymentState>(
      this.instances.map((instance: AppInstanceStatus): DeploymentState => instance.state),
    );
    if (states.size === 1) {
      const [only] = states;
      return only;
    }
    if (states.has(DeploymentState.ERROR)) {
      return DeploymentState.ERROR;
    }
    if (states.has(DeploymentState.DEPLOYING)) {
      return DeploymentState.DEPLOYING;
    }
    if (states.has(DeploymentState.DEPLOYED) || states.has(DeploymentState.PARTIAL)) {
      return DeploymentState.PARTIAL;
    }
    if (states.has(DeploymentState.FAILED)) {
      return DeploymentState.FAILED;
    }
    return DeploymentState.PARTIAL;
  }

  public toString(): string {
    return `AppStatus[${this.deploymentId} : ${this.state}]`;
  }

  public static build(
    deploymentId: string,
    instances: AppInstanceStatus[],
    generalState?: DeploymentState,
  ): AppStatus {
    const ordered: AppInstanceStatus[] = [...instances].sort(
      (left: AppInstanceStatus, right: AppInstanceStatus): number => left.index - right.index,
    );
    return new AppStatus(deploymentId, Object.freeze(ordered), generalState);
  }
}

export class AppStatusBuilder {
  private readonly instances: AppInstanceStatus[] = [];
  private explicitState?: DeploymentState;

  public constructor(private readonly deploymentId: string) {}

  public with(instance: AppInstanceStatus): this {
    this.instances.push(instance);
    return this;
  }

  /**
   * Sets a state that overrides the one aggregated from the instances.
   */
  public withGeneralState(state: DeploymentState): this {
    this.explicitState = state;
    return this;
  }

  public build(): AppStatus {
    return AppStatus.build(this.deploymentId, this.instances, this.explicitState);
  }
}
