// SPDX-License-Identifier: Apache-2.0

import {type ServiceInstances} from '../../resources/service/service-instances.js';
import {type ListServiceInstancesRequest, type ServiceInstance} from '../../resources/service/service.js';
import {type Page} from '../../../../core/pagination/page.js';
import {type CloudFoundryHttp} from '../cloud-foundry-http.js';
import {type RawPage, toPage} from '../raw-page.js';
import {ResourceOperation} from '../../resources/resource-operation.js';
import {ResourceType} from '../../resources/resource-type.js';

interface RawServiceInstance {
  guid: string;
  name: string;
}

export class RestServiceInstances implements ServiceInstances {
  public constructor(private readonly http: CloudFoundryHttp) {}

  public async list(request: ListServiceInstancesRequest): Promise<Page<ServiceInstance>> {
    const raw: RawPage<RawServiceInstance> = await this.http.getJson<RawPage<RawServiceInstance>>(
      'v3/service_instances',
      {operation: ResourceOperation.LIST, type: ResourceType.SERVICE_INSTANCE, name: request.names?.join(',') ?? '*'},
      {names: request.names?.join(','), space_guids: request.spaceId, page: request.page},
    );
    return toPage(raw, (instance: RawServiceInstance): ServiceInstance => ({id: instance.guid, name: instance.name}));
  }
}
