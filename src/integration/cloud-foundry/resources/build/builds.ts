// SPDX-License-Identifier: Apache-2.0

import {type Build, type CreateBuildRequest} from './build.js';

export interface Builds {
  create(request: CreateBuildRequest): Promise<Build>;

  get(id: string): Promise<Build>;
}
