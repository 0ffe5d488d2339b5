// SPDX-License-Identifier: Apache-2.0

import {type Duration} from '../../../../core/time/duration.js';

export type HealthCheckType = 'port' | 'process' | 'http';

/**
 * Declarative description of an application. Exactly one of `path` and `dockerImage` is set.
 */
export interface ApplicationManifest {
  readonly name: string;
  readonly path?: string;
  readonly dockerImage?: string;
  readonly buildpacks: string[];
  readonly stack?: string;
  /** mebibytes */
  readonly memory: number;
  /** mebibytes */
  readonly disk: number;
  readonly instances: number;
  readonly healthCheckType: HealthCheckType;
  readonly healthCheckHttpEndpoint?: string;
  /** seconds */
  readonly healthCheckTimeout?: number;
  readonly noRoute: boolean;
  readonly routes: string[];
  readonly services: string[];
  readonly environmentVariables: Record<string, string>;
}

export interface PushManifestRequest {
  readonly manifest: ApplicationManifest;
  readonly stagingTimeout: Duration;
  readonly startupTimeout: Duration;
}
