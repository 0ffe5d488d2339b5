// SPDX-License-Identifier: Apache-2.0

export interface Application {
  readonly id: string;
  readonly name: string;
  /** STARTED or STOPPED as reported by the platform */
  readonly state: string;
  readonly spaceId: string;
}

export type ApplicationLifecycle =
  | {readonly type: 'buildpack'; readonly buildpacks: string[]; readonly stack?: string}
  | {readonly type: 'docker'};

export interface CreateApplicationRequest {
  readonly name: string;
  readonly spaceId: string;
  readonly lifecycle: ApplicationLifecycle;
  readonly environmentVariables?: Record<string, string>;
}

export interface ListApplicationsRequest {
  readonly names?: string[];
  readonly spaceId?: string;
  readonly page: number;
}

/**
 * Observed state of one replica. The usage figures are absent while an instance is not running.
 */
export interface InstanceDetail {
  readonly index: number;
  readonly state: string;
  readonly cpu?: number;
  readonly memoryUsage?: number;
  readonly memoryQuota?: number;
  readonly diskUsage?: number;
  readonly diskQuota?: number;
  readonly since?: string;
}

export interface ApplicationDetail {
  readonly id: string;
  readonly name: string;
  readonly requestedState: string;
  /** expected replica count */
  readonly instances: number;
  readonly runningInstances: number;
  readonly memoryLimit: number;
  readonly diskQuota: number;
  readonly urls: string[];
  readonly instanceDetails: InstanceDetail[];
}

export interface ApplicationEnvironment {
  /** variables set by the user, as opposed to the ones the platform injects */
  readonly userProvided: Record<string, unknown>;
}

export interface ScaleApplicationRequest {
  readonly name: string;
  readonly instances: number;
  readonly memoryLimit?: number;
  readonly diskLimit?: number;
}
