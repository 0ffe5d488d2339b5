// SPDX-License-Identifier: Apache-2.0

/**
 * One page of a paginated listing. Page numbers start at 1.
 */
export interface Page<T> {
  readonly resources: T[];
  readonly totalPages: number;
  readonly totalResults: number;
}

export type PageFetcher<T> = (page: number) => Promise<Page<T>>;
