// SPDX-License-Identifier: Apache-2.0

import {type Applications} from './resources/application/applications.js';
import {type Packages} from './resources/package/packages.js';
import {type Builds} from './resources/build/builds.js';
import {type Droplets} from './resources/droplet/droplets.js';
import {type Tasks} from './resources/task/tasks.js';
import {type ServiceInstances} from './resources/service/service-instances.js';
import {type ServiceBindings} from './resources/service/service-bindings.js';
import {type Jobs} from './resources/job/jobs.js';
import {type Spaces} from './resources/space/spaces.js';

/**
 * The remote platform as seen by the deployer. Each property groups the operations for one resource kind.
 *
 * Every list operation is page based with 1-indexed pages.
 */
export interface CloudFoundryClient {
  readonly applications: Applications;
  readonly packages: Packages;
  readonly builds: Builds;
  readonly droplets: Droplets;
  readonly tasks: Tasks;
  readonly serviceInstances: ServiceInstances;
  readonly serviceBindings: ServiceBindings;
  readonly jobs: Jobs;
  readonly spaces: Spaces;

  /**
   * Id of the space this client deploys into, looked up by the configured organization and space names.
   */
  spaceId(): Promise<string>;
}
