import type { CursorPagingResponse, PagingResponse } from "./types";

export interface OffsetCursor {
  kind: "offset";
  offset: number;
}

export interface AfterCursor {
  kind: "after";
  after: string | null;
}

export type PageCursor = OffsetCursor | AfterCursor;

/** One fetched page and the cursor of the page after it, or `null` when the listing is exhausted. */
export interface Page<T, C extends PageCursor> {
  items: T[];
  next: C | null;
}

export const FIRST_OFFSET_PAGE: OffsetCursor = { kind: "offset", offset: 0 };
export const FIRST_AFTER_PAGE: AfterCursor = { kind: "after", after: null };

export function nextOffsetCursor<T>(
  cursor: OffsetCursor,
  limit: number,
  response: PagingResponse<T>
): OffsetCursor | null {
  if (response.next === null || response.items.length === 0) {
    return null;
  }

  return { kind: "offset", offset: cursor.offset + limit };
}

export function nextAfterCursor<T>(response: CursorPagingResponse<T>): AfterCursor | null {
  const after = response.cursors?.after ?? null;
  if (response.next === null || after === null || response.items.length === 0) {
    return null;
  }

  return { kind: "after", after };
}

export async function collectPages<T, C extends PageCursor>(
  start: C,
  fetchPage: (cursor: C) => Promise<Page<T, C>>
): Promise<T[]> {
  const results: T[] = [];
  let cursor: C | null = start;

  while (cursor !== null) {
    const page: Page<T, C> = await fetchPage(cursor);
    results.push(...page.items);
    cursor = page.next;
  }

  return results;
}
