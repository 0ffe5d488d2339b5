// SPDX-License-Identifier: Apache-2.0

import {type Page} from '../../../../core/pagination/page.js';
import {type ListServiceInstancesRequest, type ServiceInstance} from './service.js';

export interface ServiceInstances {
  list(request: ListServiceInstancesRequest): Promise<Page<ServiceInstance>>;
}
