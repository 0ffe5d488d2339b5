// SPDX-License-Identifier: Apache-2.0

import {type Page} from '../../../../core/pagination/page.js';
import {type ListSpacesRequest, type Space} from './space.js';

export interface Spaces {
  list(request: ListSpacesRequest): Promise<Page<Space>>;
}
