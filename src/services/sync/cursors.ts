/**
 * SyncCursorStore - incremental position and state per sync key
 *
 * One row per (tenant, rail, entity type). The cursor token is opaque here;
 * only the rail that issued it can interpret it.
 */

import { isRailName, type SyncCursor, type SyncKey } from "../../types/index.js";
import { PersistenceError } from "./errors.js";

import type { MachineState } from "./state-machine.js";
import type { Database, SyncCursorRow } from "../../db/types.js";
import type { Kysely } from "kysely";

// ============================================================================
// Helper Functions
// ============================================================================

function rowToCursor(row: SyncCursorRow): SyncCursor {
  if (!isRailName(row.rail)) {
    throw new PersistenceError(`Unknown rail "${row.rail}" in sync_cursors`);
  }
  return {
    tenantId: row.tenant_id,
    rail: row.rail,
    entityType: row.entity_type,
    cursorToken: row.cursor_token,
    state: row.state,
    consecutiveFailures: Number(row.consecutive_failures),
    nextAttemptAt: row.next_attempt_at,
    lastRunAt: row.last_run_at,
    lastSuccessAt: row.last_success_at,
    lastError: row.last_error,
    lastErrorCode: row.last_error_code,
  };
}

export function emptyCursor(key: SyncKey): SyncCursor {
  return {
    ...key,
    cursorToken: null,
    state: "idle",
    consecutiveFailures: 0,
    nextAttemptAt: null,
    lastRunAt: null,
    lastSuccessAt: null,
    lastError: null,
    lastErrorCode: null,
  };
}

// ============================================================================
// Cursor Store
// ============================================================================

export class SyncCursorStore {
  constructor(
    private db: Kysely<Database>,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Current cursor for a key; a never-synced key reads as idle with no token
   */
  async get(key: SyncKey): Promise<SyncCursor> {
    const row = await this.db
      .selectFrom("sync_cursors")
      .selectAll()
      .where("tenant_id", "=", key.tenantId)
      .where("rail", "=", key.rail)
      .where("entity_type", "=", key.entityType)
      .executeTakeFirst();

    return row === undefined ? emptyCursor(key) : rowToCursor(row);
  }

  async listForTenant(tenantId: string): Promise<SyncCursor[]> {
    const rows = await this.db
      .selectFrom("sync_cursors")
      .selectAll()
      .where("tenant_id", "=", tenantId)
      .orderBy("rail", "asc")
      .orderBy("entity_type", "asc")
      .execute();

    return rows.map(rowToCursor);
  }

  /**
   * Persist a full cursor row (insert or overwrite)
   */
  async save(cursor: SyncCursor): Promise<void> {
    const now = this.now().toISOString();
    const values = {
      cursor_token: cursor.cursorToken,
      state: cursor.state,
      consecutive_failures: cursor.consecutiveFailures,
      next_attempt_at: cursor.nextAttemptAt,
      last_run_at: cursor.lastRunAt,
      last_success_at: cursor.lastSuccessAt,
      last_error: cursor.lastError,
      last_error_code: cursor.lastErrorCode,
      updated_at: now,
    };

    await this.db
      .insertInto("sync_cursors")
      .values({
        tenant_id: cursor.tenantId,
        rail: cursor.rail,
        entity_type: cursor.entityType,
        ...values,
      })
      .onConflict((oc) =>
        oc.columns(["tenant_id", "rail", "entity_type"]).doUpdateSet(values)
      )
      .execute();
  }

  /**
   * Move the incremental position after a committed record
   */
  async advance(key: SyncKey, cursorToken: string | null): Promise<void> {
    const cursor = await this.get(key);
    await this.save({ ...cursor, cursorToken });
  }

  /**
   * Apply a state machine result to the stored row, keeping its position
   */
  async applyState(
    key: SyncKey,
    next: MachineState,
    error: { message: string; code: string } | null = null
  ): Promise<SyncCursor> {
    const cursor = await this.get(key);
    const updated: SyncCursor = {
      ...cursor,
      state: next.state,
      consecutiveFailures: next.consecutiveFailures,
      nextAttemptAt: next.nextAttemptAt,
      ...(error === null
        ? {}
        : { lastError: error.message, lastErrorCode: error.code }),
    };
    await this.save(updated);
    return updated;
  }

  /**
   * Forget the incremental position so the next run starts from scratch
   */
  async reset(key: SyncKey): Promise<void> {
    await this.advance(key, null);
  }
}
