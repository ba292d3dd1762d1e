import { UpstreamError } from "./errors";

export interface Page<T> {
  items: T[];
  nextPage: number | null;
}

export type PageFetcher<T> = (page: number) => Promise<Page<T>>;

/**
 * Walks a paginated endpoint one page at a time. A page is only requested once
 * the consumer has drained the previous one; a rejected fetch ends the walk.
 */
export async function* paginate<T>(fetchPage: PageFetcher<T>, firstPage = 1): AsyncGenerator<T, void, undefined> {
  let page: number | null = firstPage;
  const seen = new Set<number>();

  while (page !== null) {
    if (seen.has(page)) {
      throw new UpstreamError(`Pagination loop detected at page ${page}`);
    }
    seen.add(page);

    const result = await fetchPage(page);
    if (result.items.length === 0) {
      return;
    }
    yield* result.items;
    page = result.nextPage;
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
