/**
 * TransactionLogStore - append-only change history
 *
 * Every mirror mutation, whatever its origin, is recorded here with a full
 * snapshot, a field diff and provenance. Entries are never updated or
 * deleted; the fold of an entity's history reproduces its mirror row.
 */

import { createHash, randomUUID } from "node:crypto";

import type { Kysely } from "kysely";

import { dbLogger } from "../../logger.js";
import { DuplicateLogEntryError, PersistenceError } from "../sync/errors.js";
import {
  FieldDiffSchema,
  MirrorSnapshotSchema,
  applyDiff,
  parseJson,
  snapshotsEqual,
} from "./snapshot.js";

import type { Database, TransactionLogRow } from "../../db/types.js";
import type {
  ChangeSource,
  EntityType,
  FieldDiff,
  MirrorSnapshot,
  OperationKind,
  TransactionLogEntry,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface AppendLogInput {
  tenantId: string;
  entityType: EntityType;
  entityId: string;
  operationKind: OperationKind;
  source: ChangeSource;
  snapshot: MirrorSnapshot;
  diff: FieldDiff;
  actorId: string | null;
  occurredAt: string;
}

export interface LogListOptions {
  entityType?: EntityType;
  since?: string;
  limit?: number;
}

export interface ChainBreak {
  sequence: number;
  reason: string;
}

// ============================================================================
// Pure Helpers
// ============================================================================

/**
 * SHA-256 over entity id, source, occurrence time and operation kind
 */
export function computeIdempotencyKey(
  entityId: string,
  source: ChangeSource,
  occurredAt: string,
  operationKind: OperationKind
): string {
  return createHash("sha256")
    .update([entityId, source, occurredAt, operationKind].join("|"))
    .digest("hex");
}

/**
 * Fold an ordered history into the entity's current snapshot.
 *
 * Each entry carries a full snapshot, so the fold is the last one; null
 * for an empty history.
 */
export function replayHistory(
  entries: readonly TransactionLogEntry[]
): MirrorSnapshot | null {
  return entries.reduce<MirrorSnapshot | null>(
    (_state, entry) => entry.fullSnapshot,
    null
  );
}

/**
 * Check that each entry's diff turns the previous snapshot into its own
 */
export function checkDiffChain(
  entries: readonly TransactionLogEntry[]
): ChainBreak[] {
  const breaks: ChainBreak[] = [];
  let previous: MirrorSnapshot | null = null;

  for (const entry of entries) {
    if (previous === null) {
      if (entry.operationKind !== "created") {
        breaks.push({
          sequence: entry.sequence,
          reason: `history starts with "${entry.operationKind}"`,
        });
      }
    } else {
      const expected = applyDiff(previous, entry.diff);
      if (!snapshotsEqual(expected, entry.fullSnapshot)) {
        breaks.push({
          sequence: entry.sequence,
          reason: "diff does not reproduce snapshot",
        });
      }
    }
    previous = entry.fullSnapshot;
  }

  return breaks;
}

function rowToEntry(row: TransactionLogRow): TransactionLogEntry {
  const source = row.source;
  if (source !== "quickbooks" && source !== "billpay" && source !== "user") {
    throw new PersistenceError(`Unknown log source "${source}"`);
  }
  return {
    logId: row.log_id,
    tenantId: row.tenant_id,
    entityType: row.entity_type,
    entityId: row.entity_id,
    sequence: Number(row.sequence),
    operationKind: row.operation_kind,
    source,
    fullSnapshot: parseJson(MirrorSnapshotSchema, row.full_snapshot, "snapshot"),
    diff: parseJson(FieldDiffSchema, row.diff, "diff"),
    actorId: row.actor_id,
    occurredAt: row.occurred_at,
    idempotencyKey: row.idempotency_key,
    recordedAt: row.recorded_at,
  };
}

// ============================================================================
// TransactionLogStore
// ============================================================================

export class TransactionLogStore {
  constructor(
    private db: Kysely<Database>,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Append one change record and return its log id.
   *
   * Rejects a repeated idempotency key with DuplicateLogEntryError. The
   * stored occurred_at never goes backwards for an entity, so ordering by
   * (occurred_at, sequence) always matches append order.
   */
  async append(input: AppendLogInput): Promise<string> {
    const idempotencyKey = computeIdempotencyKey(
      input.entityId,
      input.source,
      input.occurredAt,
      input.operationKind
    );

    const existing = await this.findByKey(idempotencyKey);
    if (existing !== undefined) {
      throw new DuplicateLogEntryError(idempotencyKey, existing);
    }

    const last = await this.db
      .selectFrom("transaction_log")
      .select(["sequence", "occurred_at"])
      .where("entity_id", "=", input.entityId)
      .orderBy("sequence", "desc")
      .limit(1)
      .executeTakeFirst();

    const sequence = last === undefined ? 1 : Number(last.sequence) + 1;
    const occurredAt =
      last !== undefined && last.occurred_at > input.occurredAt
        ? last.occurred_at
        : input.occurredAt;

    const logId = randomUUID();

    try {
      await this.db
        .insertInto("transaction_log")
        .values({
          log_id: logId,
          tenant_id: input.tenantId,
          entity_type: input.entityType,
          entity_id: input.entityId,
          sequence,
          operation_kind: input.operationKind,
          source: input.source,
          full_snapshot: JSON.stringify(input.snapshot),
          diff: JSON.stringify(input.diff),
          actor_id: input.actorId,
          occurred_at: occurredAt,
          idempotency_key: idempotencyKey,
          recorded_at: this.now().toISOString(),
        })
        .execute();
    } catch (error) {
      // A concurrent writer may have won the unique key
      const raced = await this.findByKey(idempotencyKey);
      if (raced !== undefined) {
        throw new DuplicateLogEntryError(idempotencyKey, raced);
      }
      throw new PersistenceError("Failed to append transaction log entry", {
        cause: error,
      });
    }

    dbLogger.debug(
      {
        tenantId: input.tenantId,
        entityId: input.entityId,
        sequence,
        operation: input.operationKind,
        source: input.source,
      },
      "Transaction log entry appended"
    );

    return logId;
  }

  /**
   * Full history of one entity, oldest first
   */
  async history(
    tenantId: string,
    entityId: string
  ): Promise<TransactionLogEntry[]> {
    const rows = await this.db
      .selectFrom("transaction_log")
      .selectAll()
      .where("tenant_id", "=", tenantId)
      .where("entity_id", "=", entityId)
      .orderBy("occurred_at", "asc")
      .orderBy("sequence", "asc")
      .execute();

    return rows.map(rowToEntry);
  }

  async latest(
    tenantId: string,
    entityId: string
  ): Promise<TransactionLogEntry | null> {
    const row = await this.db
      .selectFrom("transaction_log")
      .selectAll()
      .where("tenant_id", "=", tenantId)
      .where("entity_id", "=", entityId)
      .orderBy("sequence", "desc")
      .limit(1)
      .executeTakeFirst();

    return row === undefined ? null : rowToEntry(row);
  }

  /**
   * Recent entries for a tenant, newest first
   */
  async listForTenant(
    tenantId: string,
    options: LogListOptions = {}
  ): Promise<TransactionLogEntry[]> {
    let query = this.db
      .selectFrom("transaction_log")
      .selectAll()
      .where("tenant_id", "=", tenantId);

    if (options.entityType !== undefined) {
      query = query.where("entity_type", "=", options.entityType);
    }
    if (options.since !== undefined) {
      query = query.where("occurred_at", ">=", options.since);
    }

    const rows = await query
      .orderBy("recorded_at", "desc")
      .orderBy("sequence", "desc")
      .limit(options.limit ?? 100)
      .execute();

    return rows.map(rowToEntry);
  }

  async count(tenantId: string, entityId: string): Promise<number> {
    const result = await this.db
      .selectFrom("transaction_log")
      .select((eb) => eb.fn.countAll<number | string>().as("count"))
      .where("tenant_id", "=", tenantId)
      .where("entity_id", "=", entityId)
      .executeTakeFirst();

    return Number(result?.count ?? 0);
  }

  private async findByKey(idempotencyKey: string): Promise<string | undefined> {
    const row = await this.db
      .selectFrom("transaction_log")
      .select("log_id")
      .where("idempotency_key", "=", idempotencyKey)
      .executeTakeFirst();
    return row?.log_id;
  }
}
