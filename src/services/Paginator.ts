import { logDebug } from '../utils/logger';

export const SAVED_TRACKS_PAGE_LIMIT = 50;

export type PageFetcher<T> = (offset: number, limit: number) => Promise<ReadonlyArray<T>>;

/**
 * Requests pages of `pageSize` at offsets 0, pageSize, 2*pageSize, ...
 * until a page comes back empty, and returns every item in request order.
 *
 * An empty page is always taken as the end of the collection, even if the
 * service returned it by mistake. Errors from `fetchPage` abort the whole
 * fetch.
 */
export async function fetchAll<T>(fetchPage: PageFetcher<T>, pageSize: number): Promise<T[]> {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const all: T[] = [];
  let offset = 0;
  let pages = 0;

  while (true) {
    const items = await fetchPage(offset, pageSize);
    if (items.length === 0) break;
    all.push(...items);
    pages += 1;
    offset += pageSize;
  }

  logDebug('paginator_exhausted', { pages, items: all.length, pageSize });
  return all;
}
