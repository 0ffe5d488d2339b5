// SPDX-License-Identifier: Apache-2.0

import {type Builds} from '../../resources/build/builds.js';
import {type Build, type CreateBuildRequest} from '../../resources/build/build.js';
import {type CloudFoundryHttp} from '../cloud-foundry-http.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';

interface RawBuild {
  guid: string;
  state: string;
  error: string | null;
  package: {guid: string};
  droplet: {guid: string} | null;
}

export class RestBuilds implements Builds {
  public constructor(private readonly http: CloudFoundryHttp) {}

  public async create(request: CreateBuildRequest): Promise<Build> {
    const raw: RawBuild = await this.http.postJson<RawBuild>(
      'v3/builds',
      {
        package: {guid: request.packageId},
        staging_memory_in_mb: request.stagingMemory,
        staging_disk_in_mb: request.stagingDisk,
      },
      {operation: ResourceOperation.CREATE, type: ResourceType.BUILD, name: request.packageId},
    );
    return RestBuilds.toBuild(raw);
  }

  public async get(id: string): Promise<Build> {
    const raw: RawBuild = await this.http.getJson<RawBuild>(`v3/builds/${id}`, {
      operation: ResourceOperation.READ,
      type: ResourceType.BUILD,
      name: id,
    });
    return RestBuilds.toBuild(raw);
  }

  private static toBuild(raw: RawBuild): Build {
    return {
      id: raw.guid,
      state: raw.state,
      packageId: raw.package.guid,
      dropletId: raw.droplet?.guid,
      error: raw.error ?? undefined,
    };
  }
}
