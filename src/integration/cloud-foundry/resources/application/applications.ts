// SPDX-License-Identifier: Apache-2.0

import {type Page} from '../../../../core/pagination/page.js';
import {type Droplet} from '../droplet/droplet.js';
import {
  type Application,
  type ApplicationDetail,
  type ApplicationEnvironment,
  type CreateApplicationRequest,
  type ListApplicationsRequest,
  type ScaleApplicationRequest,
} from './application.js';
import {type PushManifestRequest} from './application-manifest.js';

/**
 * Application operations. Lookups of a missing application reject with a ResourceNotFoundError.
 */
export interface Applications {
  create(request: CreateApplicationRequest): Promise<Application>;

  get(id: string): Promise<Application>;

  list(request: ListApplicationsRequest): Promise<Page<Application>>;

  delete(id: string): Promise<void>;

  /**
   * Fetches the application by name together with its routes and per instance state.
   */
  getDetail(name: string): Promise<ApplicationDetail>;

  /**
   * Creates or updates the application described by the manifest, uploads and stages its bits and starts it.
   */
  push(request: PushManifestRequest): Promise<void>;

  deleteByName(name: string, deleteRoutes: boolean): Promise<void>;

  listDroplets(applicationId: string, page: number): Promise<Page<Droplet>>;

  getEnvironment(applicationId: string): Promise<ApplicationEnvironment>;

  scale(request: ScaleApplicationRequest): Promise<void>;
}
