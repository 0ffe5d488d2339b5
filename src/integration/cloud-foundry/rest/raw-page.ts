// SPDX-License-Identifier: Apache-2.0

import {type Page} from '../../../core/pagination/page.js';

export interface RawRelationship {
  data: {guid: string} | null;
}

export interface RawPage<R> {
  pagination: {total_results: number; total_pages: number};
  resources: R[];
}

export function toPage<R, T>(raw: RawPage<R>, map: (resource: R) => T): Page<T> {
  return {
    resources: raw.resources.map(map),
    totalPages: raw.pagination.total_pages,
    totalResults: raw.pagination.total_results,
  };
}
