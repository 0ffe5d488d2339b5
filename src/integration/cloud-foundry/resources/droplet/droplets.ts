// SPDX-License-Identifier: Apache-2.0

import {type Droplet} from './droplet.js';

export interface Droplets {
  get(id: string): Promise<Droplet>;
}
