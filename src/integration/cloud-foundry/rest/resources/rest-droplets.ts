// SPDX-License-Identifier: Apache-2.0

import {type Droplets} from '../../resources/droplet/droplets.js';
import {type Droplet} from '../../resources/droplet/droplet.js';
import {type CloudFoundryHttp} from '../cloud-foundry-http.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';

export interface RawDroplet {
  guid: string;
  state: string;
  process_types: Record<string, string> | null;
  created_at: string;
}

export function toDroplet(raw: RawDroplet): Droplet {
  return {
    id: raw.guid,
    state: raw.state,
    processTypes: raw.process_types ?? {},
    createdAt: raw.created_at,
  };
}

export class RestDroplets implements Droplets {
  public constructor(private readonly http: CloudFoundryHttp) {}

  public async get(id: string): Promise<Droplet> {
    const raw: RawDroplet = await this.http.getJson<RawDroplet>(`v3/droplets/${id}`, {
      operation: ResourceOperation.READ,
      type: ResourceType.DROPLET,
      name: id,
    });
    return toDroplet(raw);
  }
}
