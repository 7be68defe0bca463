/**
 * Unit tests for pagination utilities
 */

import { describe, it, expect } from "vitest";

import {
  encodeCursor,
  decodeCursor,
  compareCursor,
  parseLimit,
  validateCursor,
  createPaginationMeta,
  type CursorPayload,
} from "../../../src/utils/pagination.js";

describe("Pagination Utils", () => {
  describe("encodeCursor", () => {
    it("should encode payload to base64url string", () => {
      const payload: CursorPayload = {
        sortValue: "2026-03-01T08:00:00.000Z",
        id: "bill-1",
      };
      const encoded = encodeCursor(payload);

      expect(encoded).toBe(
        Buffer.from(
          '{"sortValue":"2026-03-01T08:00:00.000Z","id":"bill-1"}'
        ).toString("base64url")
      );
      expect(encoded).not.toMatch(/[+/=]/);
    });

    it("should ignore extra properties on the payload", () => {
      const payload = { sortValue: 5, id: "a", extra: true };

      expect(encodeCursor(payload)).toBe(encodeCursor({ sortValue: 5, id: "a" }));
    });
  });

  describe("decodeCursor", () => {
    it("should decode valid cursor back to payload", () => {
      const payload: CursorPayload = { sortValue: 10, id: "pay_1" };

      expect(decodeCursor(encodeCursor(payload))).toEqual(payload);
    });

    it("should return null for invalid JSON", () => {
      expect(decodeCursor(Buffer.from("not json").toString("base64url"))).toBeNull();
    });

    it("should return null for empty string", () => {
      expect(decodeCursor("")).toBeNull();
    });

    it("should return null for a payload of the wrong shape", () => {
      const cursor = Buffer.from(JSON.stringify({ sortValue: "x", id: 1 })).toString(
        "base64url"
      );

      expect(decodeCursor(cursor)).toBeNull();
    });
  });

  describe("compareCursor", () => {
    it("should order by sort value first", () => {
      expect(
        compareCursor(
          { sortValue: "2026-03-01T08:00:00.000Z", id: "z" },
          { sortValue: "2026-03-01T08:01:00.000Z", id: "a" }
        )
      ).toBe(-1);
    });

    it("should break ties on id", () => {
      const at = "2026-03-01T08:00:00.000Z";

      expect(compareCursor({ sortValue: at, id: "b" }, { sortValue: at, id: "a" })).toBe(1);
      expect(compareCursor({ sortValue: at, id: "a" }, { sortValue: at, id: "a" })).toBe(0);
    });
  });

  describe("parseLimit", () => {
    it("should return default limit when value is undefined", () => {
      expect(parseLimit(undefined)).toBe(50);
      expect(parseLimit(undefined, 25, 100)).toBe(25);
    });

    it("should parse string limit correctly", () => {
      expect(parseLimit("30")).toBe(30);
    });

    it("should cap limit at maxLimit", () => {
      expect(parseLimit(500, 50, 100)).toBe(100);
    });

    it("should return default for values below one", () => {
      expect(parseLimit("not-a-number", 50, 100)).toBe(50);
      expect(parseLimit(0, 50, 100)).toBe(50);
      expect(parseLimit(-10, 50, 100)).toBe(50);
    });
  });

  describe("validateCursor", () => {
    it("should return null for a missing cursor", () => {
      expect(validateCursor(undefined)).toBeNull();
      expect(validateCursor("")).toBeNull();
    });

    it("should return the payload for a correct cursor", () => {
      const payload: CursorPayload = { sortValue: 200, id: "rec-9" };

      expect(validateCursor(encodeCursor(payload))).toEqual(payload);
    });
  });

  describe("createPaginationMeta", () => {
    const items = [{ id: "a" }, { id: "b" }];

    it("should return null cursor when hasMore is false", () => {
      expect(createPaginationMeta(items, 2, (i) => ({ sortValue: 0, id: i.id }), false)).toEqual({
        cursor: null,
        hasMore: false,
        limit: 2,
        total: undefined,
      });
    });

    it("should create cursor from last item when hasMore is true", () => {
      const meta = createPaginationMeta(
        items,
        2,
        (i) => ({ sortValue: 2, id: i.id }),
        true,
        7
      );

      expect(meta.cursor).toBe(encodeCursor({ sortValue: 2, id: "b" }));
      expect(meta.total).toBe(7);
    });

    it("should return null cursor for empty items array", () => {
      const meta = createPaginationMeta<{ id: string }>(
        [],
        10,
        (i) => ({ sortValue: 0, id: i.id }),
        true
      );

      expect(meta.cursor).toBeNull();
    });
  });
});
