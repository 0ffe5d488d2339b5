// SPDX-License-Identifier: Apache-2.0

import {type Spaces} from '../../resources/space/spaces.js';
import {type ListSpacesRequest, type Space} from '../../resources/space/space.js';
import {type Page} from '../../../../core/pagination/page.js';
import {type CloudFoundryHttp} from '../cloud-foundry-http.js';
import {type RawPage, type RawRelationship, toPage} from '../raw-page.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';
import {ResourceNotFoundError} from '../../errors/resource-not-found-error.js';

interface RawOrganization {
  guid: string;
  name: string;
}

interface RawSpace {
  guid: string;
  name: string;
  relationships: {organization: RawRelationship};
}

export class RestSpaces implements Spaces {
  public constructor(private readonly http: CloudFoundryHttp) {}

  public async list(request: ListSpacesRequest): Promise<Page<Space>> {
    let organizationId: string | undefined;
    if (request.organizationName) {
      organizationId = await this.organizationId(request.organizationName);
    }

    const raw: RawPage<RawSpace> = await this.http.getJson<RawPage<RawSpace>>(
      'v3/spaces',
      {operation: ResourceOperation.LIST, type: ResourceType.SPACE, name: request.names?.join(',') ?? '*'},
      {names: request.names?.join(','), organization_guids: organizationId, page: request.page},
    );

    return toPage(
      raw,
      (space: RawSpace): Space => ({
        id: space.guid,
        name: space.name,
        organizationId: space.relationships.organization.data?.guid ?? '',
      }),
    );
  }

  private async organizationId(name: string): Promise<string> {
    const raw: RawPage<RawOrganization> = await this.http.getJson<RawPage<RawOrganization>>(
      'v3/organizations',
      {operation: ResourceOperation.READ, type: ResourceType.ORGANIZATION, name},
      {names: name},
    );

    const organization: RawOrganization | undefined = raw.resources[0];
    if (!organization) {
      throw new ResourceNotFoundError(ResourceOperation.READ, ResourceType.ORGANIZATION, name);
    }
    return organization.guid;
  }
}
