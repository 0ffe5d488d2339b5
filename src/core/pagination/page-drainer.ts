// SPDX-License-Identifier: Apache-2.0

import {type Page, type PageFetcher} from './page.js';

export class PageDrainer {
  private constructor() {}

  /**
   * Yields the resources of every page in order, starting at page 1 and stopping after the last page the most
   * recent response reports. Consumers may stop early.
   */
  public static async *pages<T>(fetch: PageFetcher<T>): AsyncGenerator<T[], void, undefined> {
    let page: number = 1;
    let totalPages: number = 1;
    do {
      const current: Page<T> = await fetch(page);
      totalPages = Math.max(current.totalPages, 1);
      yield current.resources;
      page += 1;
    } while (page <= totalPages);
  }

  /**
   * Collects the union of every page before returning.
   */
  public static async drain<T>(fetch: PageFetcher<T>): Promise<T[]> {
    const all: T[] = [];
    for await (const resources of PageDrainer.pages(fetch)) {
      all.push(...resources);
    }
    return all;
  }

  /**
   * Returns the first resource matching the predicate, fetching no more pages than needed.
   */
  public static async find<T>(fetch: PageFetcher<T>, predicate: (resource: T) => boolean): Promise<T | undefined> {
    for await (const resources of PageDrainer.pages(fetch)) {
      const match: T | undefined = resources.find(predicate);
      if (match !== undefined) {
        return match;
      }
    }
    return undefined;
  }
}
