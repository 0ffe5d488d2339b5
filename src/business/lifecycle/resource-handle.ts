// SPDX-License-Identifier: Apache-2.0

import {type ResourceState} from './resource-state.js';

export interface ResourceHandle<R> {
  readonly id: string;
  readonly state: ResourceState;
  /** the resource as last read from the platform */
  readonly resource: R;
}
