// SPDX-License-Identifier: Apache-2.0

/**
 * The artifact to run: a file with the application's bits, or a container image.
 */
export type DeploymentResource =
  | {readonly kind: 'file'; readonly path: string}
  | {readonly kind: 'docker'; readonly image: string};

export interface AppDefinition {
  readonly name: string;
  /** properties handed to the application itself */
  readonly properties: Readonly<Record<string, string>>;
}

export interface AppDeploymentRequest {
  readonly definition: AppDefinition;
  readonly resource: DeploymentResource;
  /** platform settings for this request, overriding the deployer defaults */
  readonly deploymentProperties: Readonly<Record<string, string>>;
  readonly commandlineArguments: readonly string[];
}

export interface AppScaleRequest {
  readonly deploymentId: string;
  readonly count: number;
  /** optional new memory limit, e.g. `2g` */
  readonly memory?: string;
  /** optional new disk limit, e.g. `2g` */
  readonly disk?: string;
}

export function fileResource(path: string): DeploymentResource {
  return {kind: 'file', path};
}

export function dockerResource(image: string): DeploymentResource {
  return {kind: 'docker', image};
}
