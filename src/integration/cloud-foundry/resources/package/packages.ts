// SPDX-License-Identifier: Apache-2.0

import {type CreatePackageRequest, type Package} from './package.js';

export interface Packages {
  create(request: CreatePackageRequest): Promise<Package>;

  get(id: string): Promise<Package>;

  /**
   * Uploads the bits found at the given file path into the package.
   */
  upload(id: string, path: string): Promise<Package>;
}
