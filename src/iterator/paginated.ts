/**
 * Paginated mode: query and scan pages followed through their cursor.
 */

import type { PageResponse } from '../transport/transport.js';
import type { Item } from '../types/item.js';
import type { KeyValues } from '../types/key.js';
import type { ItemSource } from './result-iterator.js';

/**
 * Fetches one page starting at `cursor`, returning at most `limit` items.
 */
export type PageFetcher = (cursor: KeyValues | undefined, limit: number | undefined) => Promise<PageResponse>;

/**
 * Item source that yields every item of every page.
 *
 * With a limit, iteration stops as soon as it is reached, without another
 * round trip; each continuation asks only for the items still missing.
 */
export function paginatedSource(fetchPage: PageFetcher, limit?: number): ItemSource {
  return async function* () {
    let cursor: KeyValues | undefined;
    let found = 0;

    for (;;) {
      const page = await fetchPage(cursor, limit === undefined ? undefined : limit - found);

      for (const item of page.items) {
        yield item;
        found++;
        if (limit !== undefined && found >= limit) {
          return;
        }
      }

      if (page.cursor === undefined) {
        return;
      }
      cursor = page.cursor;
    }
  };
}

/**
 * Item source for a single point get: zero or one item.
 */
export function singleSource(fetch: () => Promise<Item | undefined>): ItemSource {
  return async function* () {
    const item = await fetch();
    if (item !== undefined) {
      yield item;
    }
  };
}
