/**
 * SyncRunStore - per-run metrics
 */

import { randomUUID } from "node:crypto";

import type {
  Database,
  SyncRunRow,
  SyncRunStatus,
  SyncTrigger,
} from "../../db/types.js";
import type { EntityType, SyncKey } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface RunCounters {
  fetched: number;
  created: number;
  updated: number;
  synced: number;
  deleted: number;
  unchanged: number;
  skipped: number;
  logPending: number;
}

export interface RunFinish {
  status: Exclude<SyncRunStatus, "running">;
  counters: RunCounters;
  cursorAfter: string | null;
  errorCode?: string | null;
  errorMessage?: string | null;
}

export interface RunFilters {
  status?: SyncRunStatus;
  rail?: string;
  entityType?: EntityType;
  limit?: number;
  offset?: number;
}

export function emptyCounters(): RunCounters {
  return {
    fetched: 0,
    created: 0,
    updated: 0,
    synced: 0,
    deleted: 0,
    unchanged: 0,
    skipped: 0,
    logPending: 0,
  };
}

// ============================================================================
// SyncRunStore
// ============================================================================

export class SyncRunStore {
  constructor(
    private db: Kysely<Database>,
    private now: () => Date = () => new Date()
  ) {}

  async start(
    key: SyncKey,
    trigger: SyncTrigger,
    cursorBefore: string | null
  ): Promise<string> {
    const runId = randomUUID();
    await this.db
      .insertInto("sync_runs")
      .values({
        run_id: runId,
        tenant_id: key.tenantId,
        rail: key.rail,
        entity_type: key.entityType,
        trigger,
        status: "running",
        cursor_before: cursorBefore,
        started_at: this.now().toISOString(),
      })
      .execute();
    return runId;
  }

  async finish(runId: string, finish: RunFinish): Promise<void> {
    const { counters } = finish;
    await this.db
      .updateTable("sync_runs")
      .set({
        status: finish.status,
        fetched: counters.fetched,
        created: counters.created,
        updated: counters.updated,
        synced: counters.synced,
        deleted: counters.deleted,
        unchanged: counters.unchanged,
        skipped: counters.skipped,
        log_pending: counters.logPending,
        cursor_after: finish.cursorAfter,
        error_code: finish.errorCode ?? null,
        // Internal only; never returned to tenants
        error_message: finish.errorMessage?.substring(0, 1000) ?? null,
        finished_at: this.now().toISOString(),
      })
      .where("run_id", "=", runId)
      .execute();
  }

  async get(runId: string): Promise<SyncRunRow | null> {
    const row = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("run_id", "=", runId)
      .executeTakeFirst();
    return row ?? null;
  }

  /**
   * Runs for a tenant, newest first
   */
  async list(tenantId: string, filters: RunFilters = {}): Promise<SyncRunRow[]> {
    let query = this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("tenant_id", "=", tenantId);

    if (filters.status !== undefined) {
      query = query.where("status", "=", filters.status);
    }
    if (filters.rail !== undefined) {
      query = query.where("rail", "=", filters.rail);
    }
    if (filters.entityType !== undefined) {
      query = query.where("entity_type", "=", filters.entityType);
    }

    return await query
      .orderBy("started_at", "desc")
      .limit(filters.limit ?? 50)
      .offset(filters.offset ?? 0)
      .execute();
  }

  /**
   * Close runs left "running" by a crashed or timed-out process
   */
  async abandonStale(olderThan: Date): Promise<number> {
    const result = await this.db
      .updateTable("sync_runs")
      .set({
        status: "failed_retryable",
        error_code: "TIMEOUT",
        finished_at: this.now().toISOString(),
      })
      .where("status", "=", "running")
      .where("started_at", "<", olderThan.toISOString())
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }
}
