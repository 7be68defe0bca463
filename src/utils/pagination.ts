/**
 * Cursor-based pagination utilities
 *
 * Cursors are opaque base64url tokens over a (sortValue, id) pair. The same
 * encoding serves API listings and rail sync positions.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const CursorPayloadSchema = Type.Object({
  sortValue: Type.Union([Type.String(), Type.Number()]),
  id: Type.String(),
});

export interface CursorPayload {
  sortValue: string | number;
  id: string;
}

export interface PaginationMeta {
  cursor: string | null;
  hasMore: boolean;
  limit: number;
  total?: number;
}

export interface PaginationOptions {
  cursor?: string;
  limit: number;
}

export interface PaginatedResult<T> {
  items: T[];
  pagination: PaginationMeta;
}

/**
 * Encode cursor payload to base64url string
 */
export function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(
    JSON.stringify({ sortValue: payload.sortValue, id: payload.id })
  ).toString("base64url");
}

/**
 * Decode base64url cursor string to payload; null for anything malformed
 */
export function decodeCursor(cursor: string): CursorPayload | null {
  let parsed: unknown;
  try {
    const decoded = Buffer.from(cursor, "base64url").toString("utf-8");
    parsed = JSON.parse(decoded);
  } catch {
    return null;
  }
  return Value.Check(CursorPayloadSchema, parsed) ? parsed : null;
}

/**
 * Order two (sortValue, id) positions; negative when `a` comes first
 */
export function compareCursor(a: CursorPayload, b: CursorPayload): number {
  if (a.sortValue !== b.sortValue) {
    return a.sortValue < b.sortValue ? -1 : 1;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

/**
 * Create pagination meta from results
 */
export function createPaginationMeta<T>(
  items: T[],
  limit: number,
  toCursor: (item: T) => CursorPayload,
  hasMore: boolean,
  total?: number
): PaginationMeta {
  const lastItem = items.at(-1);
  const cursor =
    hasMore && lastItem !== undefined
      ? encodeCursor(toCursor(lastItem))
      : null;

  return {
    cursor,
    hasMore,
    limit,
    total,
  };
}

/**
 * Parse limit from query parameter with bounds
 */
export function parseLimit(
  value: string | number | undefined,
  defaultLimit = 50,
  maxLimit = 100
): number {
  if (value === undefined) {
    return defaultLimit;
  }

  const parsed = typeof value === "string" ? parseInt(value, 10) : value;

  if (isNaN(parsed) || parsed < 1) {
    return defaultLimit;
  }

  return Math.min(parsed, maxLimit);
}

/**
 * Validate cursor and extract payload
 */
export function validateCursor(
  cursor: string | undefined
): CursorPayload | null {
  if (cursor === undefined || cursor === "") {
    return null;
  }
  return decodeCursor(cursor);
}
