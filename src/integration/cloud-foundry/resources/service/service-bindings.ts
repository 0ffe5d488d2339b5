// SPDX-License-Identifier: Apache-2.0

import {type Page} from '../../../../core/pagination/page.js';
import {
  type CreateServiceBindingRequest,
  type ListServiceBindingsRequest,
  type ServiceBinding,
} from './service.js';

export interface ServiceBindings {
  create(request: CreateServiceBindingRequest): Promise<ServiceBinding>;

  delete(id: string): Promise<void>;

  list(request: ListServiceBindingsRequest): Promise<Page<ServiceBinding>>;
}
