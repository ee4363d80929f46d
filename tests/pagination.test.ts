import { describe, expect, it } from "vitest";
import {
  collectPages,
  FIRST_OFFSET_PAGE,
  nextAfterCursor,
  nextOffsetCursor,
  type OffsetCursor
} from "../src/pagination";

function pagingResponse(items: string[], next: string | null) {
  return { items, limit: 2, offset: 0, total: 10, next };
}

describe("nextOffsetCursor", () => {
  it("advances by the page size while the provider reports more", () => {
    expect(nextOffsetCursor({ kind: "offset", offset: 4 }, 2, pagingResponse(["a", "b"], "more"))).toEqual({
      kind: "offset",
      offset: 6
    });
  });

  it("ends when the provider reports no next page", () => {
    expect(nextOffsetCursor({ kind: "offset", offset: 4 }, 2, pagingResponse(["a"], null))).toBeNull();
  });

  it("ends on an empty page even if a next link is present", () => {
    expect(nextOffsetCursor({ kind: "offset", offset: 4 }, 2, pagingResponse([], "more"))).toBeNull();
  });
});

describe("nextAfterCursor", () => {
  it("continues after the provider cursor", () => {
    expect(nextAfterCursor({ items: ["x"], limit: 1, next: "more", cursors: { after: "x" } })).toEqual({
      kind: "after",
      after: "x"
    });
  });

  it("ends without a next page or cursor", () => {
    expect(nextAfterCursor({ items: ["x"], limit: 1, next: null, cursors: { after: "x" } })).toBeNull();
    expect(nextAfterCursor({ items: ["x"], limit: 1, next: "more", cursors: null })).toBeNull();
  });
});

describe("collectPages", () => {
  it("requests each page once and stops when there is no next cursor", async () => {
    const requested: number[] = [];
    const pages = [["a", "b"], ["c", "d"], ["e"]];

    const items = await collectPages(FIRST_OFFSET_PAGE, async (cursor: OffsetCursor) => {
      requested.push(cursor.offset);
      const index = cursor.offset / 2;
      const next: OffsetCursor | null = index < pages.length - 1 ? { kind: "offset", offset: cursor.offset + 2 } : null;
      return { items: pages[index], next };
    });

    expect(items).toEqual(["a", "b", "c", "d", "e"]);
    expect(requested).toEqual([0, 2, 4]);
  });

  it("fetches only the first page of an empty listing", async () => {
    let fetchCount = 0;

    const items = await collectPages(FIRST_OFFSET_PAGE, async () => {
      fetchCount += 1;
      return { items: [], next: null };
    });

    expect(items).toEqual([]);
    expect(fetchCount).toBe(1);
  });
});
