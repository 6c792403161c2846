/**
 * Page-number driven iteration over remote listings
 *
 * An empty page is the only end-of-listing signal. Providers are never asked
 * for a total count or a "has more" flag.
 */

import { LookupTable, Page } from './types';

export const DEFAULT_PAGE_SIZE = 100;

export type PageFetcher<T> = (page: number, perPage: number) => Promise<T[]>;

export interface PaginateOptions {
  perPage?: number;
  startPage?: number;
}

/**
 * Request pages N, N+1, ... until one comes back empty
 */
export async function* paginate<T>(
  fetchPage: PageFetcher<T>,
  options: PaginateOptions = {}
): AsyncGenerator<Page<T>, void, undefined> {
  const perPage = options.perPage ?? DEFAULT_PAGE_SIZE;

  for (let page = options.startPage ?? 1; ; page++) {
    const items = await fetchPage(page, perPage);
    if (items.length === 0) {
      return;
    }
    yield { number: page, items };
  }
}

/**
 * Collect every item of a paged sequence
 */
export async function drain<T>(pages: AsyncIterable<Page<T>>): Promise<T[]> {
  const items: T[] = [];
  for await (const page of pages) {
    items.push(...page.items);
  }
  return items;
}

/**
 * Key items by identity field; a later duplicate replaces an earlier one
 */
export function buildLookupTable<T>(items: Iterable<T>, keyOf: (item: T) => string): LookupTable<T> {
  const table: LookupTable<T> = new Map();
  for (const item of items) {
    table.set(keyOf(item), item);
  }
  return table;
}
