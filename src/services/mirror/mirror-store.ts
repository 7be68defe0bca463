/**
 * MirrorStore - tenant-scoped current state per entity type
 *
 * Every mutation is paired with a TransactionLogStore append: the mirror
 * row is written first (flagged log_pending), then the log entry, then the
 * flag is cleared. A failed append leaves the flag set for reconciliation;
 * a log entry is never written for a mirror change that did not land.
 *
 * Writes for one tenant and entity type run one at a time, so log entries
 * for an entity are appended in the order its mirror row changed.
 */

import { randomUUID } from "node:crypto";

import { dbLogger } from "../../logger.js";
import { MIRROR_TABLES, type Database } from "../../db/types.js";
import { DELETED_STATUS } from "../../types/index.js";
import {
  DuplicateLogEntryError,
  PersistenceError,
  isSyncError,
} from "../sync/errors.js";
import {
  classifyChange,
  diffSnapshots,
  normalizeEntity,
  rowToRecord,
  serializeAttributes,
  snapshotsEqual,
  toSnapshot,
  type ChangeKind,
} from "./snapshot.js";
import {
  checkDiffChain,
  replayHistory,
  type ChainBreak,
  type TransactionLogStore,
} from "./transaction-log.js";

import type { Kysely } from "kysely";
import type {
  CanonicalEntity,
  ChangeSource,
  EntityType,
  MirrorRecord,
  MirrorSnapshot,
  OperationKind,
  TransactionLogEntry,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface Provenance {
  source: ChangeSource;
  /** When the change happened at its origin (rail update time, user action) */
  occurredAt: string;
  actorId?: string | null;
}

export interface MirrorWriteResult {
  record: MirrorRecord;
  change: ChangeKind;
  logId: string | null;
  logPending: boolean;
}

export interface UpsertOptions {
  /** Target a known mirror row instead of matching on external id */
  entityId?: string;
}

export interface MirrorQueryFilter {
  statuses?: string[];
  dueBefore?: string;
  dueAfter?: string;
  counterpartyId?: string;
  minAmount?: number;
  maxAmount?: number;
  logPending?: boolean;
  includeDeleted?: boolean;
  limit?: number;
  offset?: number;
}

export interface LocalChange {
  entityId?: string;
  entity: CanonicalEntity;
}

export interface VerifyMismatch {
  entityId: string;
  externalId: string | null;
  reason: string;
  chainBreaks: ChainBreak[];
}

export interface VerifyReport {
  checked: number;
  mismatches: VerifyMismatch[];
}

export class RecordNotFoundError extends Error {
  constructor(
    readonly entityType: EntityType,
    readonly entityId: string
  ) {
    super(`No ${entityType} with id ${entityId}`);
    this.name = "RecordNotFoundError";
  }
}

const RAIL_SOURCES: readonly ChangeSource[] = ["quickbooks", "billpay"];

/**
 * `candidate`, or one millisecond past the entity's last entry when that is
 * not earlier. Local timestamps feed the idempotency key and must not repeat.
 */
export function occurredAfter(
  candidate: string,
  latest: TransactionLogEntry | null
): string {
  if (latest === null || latest.occurredAt < candidate) {
    return candidate;
  }
  return new Date(Date.parse(latest.occurredAt) + 1).toISOString();
}

// ============================================================================
// MirrorStore
// ============================================================================

export class MirrorStore {
  private readonly writeQueues = new Map<string, Promise<void>>();

  constructor(
    private db: Kysely<Database>,
    private log: TransactionLogStore,
    private now: () => Date = () => new Date()
  ) {}

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async get(
    tenantId: string,
    entityType: EntityType,
    externalId: string
  ): Promise<MirrorRecord | null> {
    const row = await this.db
      .selectFrom(MIRROR_TABLES[entityType])
      .selectAll()
      .where("tenant_id", "=", tenantId)
      .where("external_id", "=", externalId)
      .executeTakeFirst();

    return row === undefined ? null : rowToRecord(row, entityType);
  }

  async getById(
    tenantId: string,
    entityType: EntityType,
    entityId: string
  ): Promise<MirrorRecord | null> {
    const row = await this.db
      .selectFrom(MIRROR_TABLES[entityType])
      .selectAll()
      .where("tenant_id", "=", tenantId)
      .where("id", "=", entityId)
      .executeTakeFirst();

    return row === undefined ? null : rowToRecord(row, entityType);
  }

  /**
   * Filtered listing, ordered by due date (nulls last) then id
   */
  async query(
    tenantId: string,
    entityType: EntityType,
    filter: MirrorQueryFilter = {}
  ): Promise<MirrorRecord[]> {
    let query = this.db
      .selectFrom(MIRROR_TABLES[entityType])
      .selectAll()
      .where("tenant_id", "=", tenantId);

    if (filter.statuses !== undefined && filter.statuses.length > 0) {
      query = query.where("status", "in", filter.statuses);
    } else if (filter.includeDeleted !== true) {
      query = query.where("status", "!=", DELETED_STATUS);
    }
    if (filter.dueBefore !== undefined) {
      query = query.where("due_date", "<", filter.dueBefore);
    }
    if (filter.dueAfter !== undefined) {
      query = query.where("due_date", ">=", filter.dueAfter);
    }
    if (filter.counterpartyId !== undefined) {
      query = query.where("counterparty_id", "=", filter.counterpartyId);
    }
    if (filter.minAmount !== undefined) {
      query = query.where("amount", ">=", filter.minAmount);
    }
    if (filter.maxAmount !== undefined) {
      query = query.where("amount", "<=", filter.maxAmount);
    }
    if (filter.logPending !== undefined) {
      query = query.where("log_pending", "=", filter.logPending ? 1 : 0);
    }

    const rows = await query
      .orderBy((eb) =>
        eb.case().when("due_date", "is", null).then(1).else(0).end()
      )
      .orderBy("due_date", "asc")
      .orderBy("id", "asc")
      .limit(filter.limit ?? 500)
      .offset(filter.offset ?? 0)
      .execute();

    return rows.map((row) => rowToRecord(row, entityType));
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /**
   * Last-write-wins upsert on (tenant, entity type, external id)
   */
  async upsert(
    tenantId: string,
    entity: CanonicalEntity,
    provenance: Provenance,
    options: UpsertOptions = {}
  ): Promise<MirrorWriteResult> {
    return await this.exclusive(tenantId, entity.entityType, () =>
      this.write(tenantId, entity, provenance, options)
    );
  }

  private async write(
    tenantId: string,
    entity: CanonicalEntity,
    provenance: Provenance,
    options: UpsertOptions
  ): Promise<MirrorWriteResult> {
    const { entityType } = entity;
    const normalized = normalizeEntity(entity);

    let existing = await this.findExisting(
      tenantId,
      normalized,
      options.entityId
    );

    if (existing?.logPending === true) {
      // Close the audit gap before layering a new change on top
      await this.reconcileRecord(existing);
      existing = await this.getById(tenantId, entityType, existing.id);
    }

    const nowIso = this.now().toISOString();
    const fromRail = RAIL_SOURCES.includes(provenance.source);

    const next: MirrorSnapshot = {
      ...normalized,
      externalId: normalized.externalId ?? existing?.externalId ?? null,
      id: existing?.id ?? randomUUID(),
      tenantId,
      syncSource: provenance.source,
    };

    if (existing === null) {
      return await this.writeAndLog(next, null, "created", provenance, {
        isNew: true,
        lastSyncedAt: fromRail ? nowIso : null,
        createdAt: nowIso,
        nowIso,
      });
    }

    const before = toSnapshot(existing);
    const change = classifyChange(before, next, DELETED_STATUS);

    if (change === "unchanged") {
      if (!fromRail) {
        return { record: existing, change, logId: null, logPending: false };
      }
      await this.touchSynced(entityType, existing.id, nowIso);
      return {
        record: { ...existing, lastSyncedAt: nowIso },
        change,
        logId: null,
        logPending: false,
      };
    }

    return await this.writeAndLog(next, before, change, provenance, {
      isNew: false,
      lastSyncedAt: fromRail ? nowIso : existing.lastSyncedAt,
      createdAt: existing.createdAt,
      nowIso,
    });
  }

  /**
   * Record a user-originated change (source "user")
   */
  async applyLocalChange(
    tenantId: string,
    change: LocalChange,
    actorId: string
  ): Promise<MirrorWriteResult> {
    const { entityType } = change.entity;
    return await this.exclusive(tenantId, entityType, async () => {
      if (change.entityId !== undefined) {
        const existing = await this.getById(
          tenantId,
          entityType,
          change.entityId
        );
        if (existing === null) {
          throw new RecordNotFoundError(entityType, change.entityId);
        }
      }

      return await this.write(
        tenantId,
        change.entity,
        {
          source: "user",
          occurredAt: this.now().toISOString(),
          actorId,
        },
        { entityId: change.entityId }
      );
    });
  }

  /**
   * Soft delete; rows are never removed
   */
  async markDeleted(
    tenantId: string,
    entityType: EntityType,
    entityId: string,
    provenance: Provenance
  ): Promise<MirrorWriteResult> {
    return await this.exclusive(tenantId, entityType, async () => {
      const existing = await this.getById(tenantId, entityType, entityId);
      if (existing === null) {
        throw new RecordNotFoundError(entityType, entityId);
      }

      return await this.write(
        tenantId,
        {
          entityType,
          externalId: existing.externalId,
          amount: existing.amount,
          dueDate: existing.dueDate,
          status: DELETED_STATUS,
          counterpartyId: existing.counterpartyId,
          counterpartyName: existing.counterpartyName,
          attributes: existing.attributes,
          sourceVersion: existing.sourceVersion,
        },
        provenance,
        { entityId }
      );
    });
  }

  // --------------------------------------------------------------------------
  // Reconciliation
  // --------------------------------------------------------------------------

  /**
   * Append the missing log entries for every log_pending row of a type.
   * Returns the number of rows settled.
   */
  async reconcilePending(
    tenantId: string,
    entityType: EntityType
  ): Promise<number> {
    const settled = await this.exclusive(tenantId, entityType, async () => {
      const pending = await this.query(tenantId, entityType, {
        logPending: true,
        includeDeleted: true,
        limit: Number.MAX_SAFE_INTEGER,
      });
      for (const record of pending) {
        await this.reconcileRecord(record);
      }
      return pending.length;
    });

    if (settled > 0) {
      dbLogger.info(
        { tenantId, entityType, settled },
        "Reconciled log_pending mirror rows"
      );
    }
    return settled;
  }

  /**
   * Replay oracle: fold each row's history and compare with the mirror
   */
  async verify(tenantId: string, entityType: EntityType): Promise<VerifyReport> {
    const records = await this.query(tenantId, entityType, {
      includeDeleted: true,
      limit: Number.MAX_SAFE_INTEGER,
    });

    const mismatches: VerifyMismatch[] = [];
    for (const record of records) {
      const history = await this.log.history(tenantId, record.id);
      const replayed = replayHistory(history);
      const chainBreaks = checkDiffChain(history);

      let reason: string | null = null;
      if (replayed === null) {
        reason = "no history";
      } else if (!snapshotsEqual(replayed, toSnapshot(record))) {
        reason = record.logPending
          ? "log pending: history behind mirror"
          : "replayed state differs from mirror";
      } else if (chainBreaks.length > 0) {
        reason = "diff chain broken";
      }

      if (reason !== null) {
        mismatches.push({
          entityId: record.id,
          externalId: record.externalId,
          reason,
          chainBreaks,
        });
      }
    }

    return { checked: records.length, mismatches };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /**
   * Run `work` after every earlier write queued for the same tenant and
   * entity type has settled
   */
  private async exclusive<T>(
    tenantId: string,
    entityType: EntityType,
    work: () => Promise<T>
  ): Promise<T> {
    const key = `${tenantId}:${entityType}`;
    const previous = this.writeQueues.get(key) ?? Promise.resolve();
    const current = previous.then(work);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.writeQueues.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.writeQueues.get(key) === tail) {
        this.writeQueues.delete(key);
      }
    }
  }

  private async findExisting(
    tenantId: string,
    entity: CanonicalEntity,
    entityId: string | undefined
  ): Promise<MirrorRecord | null> {
    if (entityId !== undefined) {
      return await this.getById(tenantId, entity.entityType, entityId);
    }
    if (entity.externalId !== null) {
      return await this.get(tenantId, entity.entityType, entity.externalId);
    }
    return null;
  }

  private async writeRow(
    snapshot: MirrorSnapshot,
    meta: { isNew: boolean; lastSyncedAt: string | null; nowIso: string }
  ): Promise<void> {
    const table = MIRROR_TABLES[snapshot.entityType];
    const values = {
      external_id: snapshot.externalId,
      status: snapshot.status,
      amount: snapshot.amount,
      due_date: snapshot.dueDate,
      counterparty_id: snapshot.counterpartyId,
      counterparty_name: snapshot.counterpartyName,
      attributes: serializeAttributes(snapshot.attributes),
      source_version: snapshot.sourceVersion,
      sync_source: snapshot.syncSource,
      last_synced_at: meta.lastSyncedAt,
      log_pending: 1,
      updated_at: meta.nowIso,
    };

    try {
      if (meta.isNew) {
        await this.db
          .insertInto(table)
          .values({
            id: snapshot.id,
            tenant_id: snapshot.tenantId,
            created_at: meta.nowIso,
            ...values,
          })
          .execute();
      } else {
        await this.db
          .updateTable(table)
          .set(values)
          .where("tenant_id", "=", snapshot.tenantId)
          .where("id", "=", snapshot.id)
          .execute();
      }
    } catch (error) {
      throw new PersistenceError(
        `Failed to write ${snapshot.entityType} ${snapshot.id} to mirror`,
        { cause: error }
      );
    }
  }

  private async touchSynced(
    entityType: EntityType,
    entityId: string,
    nowIso: string
  ): Promise<void> {
    try {
      await this.db
        .updateTable(MIRROR_TABLES[entityType])
        .set({ last_synced_at: nowIso })
        .where("id", "=", entityId)
        .execute();
    } catch (error) {
      throw new PersistenceError(`Failed to touch ${entityType} ${entityId}`, {
        cause: error,
      });
    }
  }

  private async writeAndLog(
    next: MirrorSnapshot,
    before: MirrorSnapshot | null,
    operation: OperationKind,
    provenance: Provenance,
    meta: {
      isNew: boolean;
      lastSyncedAt: string | null;
      createdAt: string;
      nowIso: string;
    }
  ): Promise<MirrorWriteResult> {
    await this.writeRow(next, meta);

    const record: MirrorRecord = {
      ...next,
      lastSyncedAt: meta.lastSyncedAt,
      logPending: true,
      createdAt: meta.createdAt,
      updatedAt: meta.nowIso,
    };

    return await this.appendAndSettle(record, before, operation, provenance);
  }

  /**
   * Append the log entry for a freshly written row and clear its flag.
   * Anything short of a confirmed entry leaves the row log_pending.
   */
  private async appendAndSettle(
    record: MirrorRecord,
    before: MirrorSnapshot | null,
    operation: OperationKind,
    provenance: Provenance
  ): Promise<MirrorWriteResult> {
    const snapshot = toSnapshot(record);
    let logId: string;

    try {
      const occurredAt =
        provenance.source === "user"
          ? occurredAfter(
              provenance.occurredAt,
              await this.log.latest(record.tenantId, record.id)
            )
          : provenance.occurredAt;

      logId = await this.log.append({
        tenantId: record.tenantId,
        entityType: record.entityType,
        entityId: record.id,
        operationKind: operation,
        source: provenance.source,
        snapshot,
        diff: diffSnapshots(before, snapshot),
        actorId: provenance.actorId ?? null,
        occurredAt,
      });
    } catch (error) {
      const settledId = await this.resolveDuplicate(error, record);
      if (settledId === null) {
        dbLogger.warn(
          {
            tenantId: record.tenantId,
            entityType: record.entityType,
            entityId: record.id,
            code: isSyncError(error) ? error.code : undefined,
          },
          "Log append failed; mirror row left log_pending"
        );
        return { record, change: operation, logId: null, logPending: true };
      }
      logId = settledId;
    }

    const cleared = await this.clearPending(record);
    return {
      record: { ...record, logPending: !cleared },
      change: operation,
      logId,
      logPending: !cleared,
    };
  }

  /**
   * A duplicate key counts as logged only when the stored entry already
   * holds this exact state.
   */
  private async resolveDuplicate(
    error: unknown,
    record: MirrorRecord
  ): Promise<string | null> {
    if (!(error instanceof DuplicateLogEntryError)) {
      return null;
    }
    const latest = await this.log.latest(record.tenantId, record.id);
    if (latest !== null && snapshotsEqual(latest.fullSnapshot, record)) {
      return latest.logId;
    }
    return null;
  }

  /**
   * Clear the flag only while the row is still the version `record` holds;
   * a newer write owns its own flag.
   */
  private async clearPending(record: MirrorRecord): Promise<boolean> {
    try {
      const result = await this.db
        .updateTable(MIRROR_TABLES[record.entityType])
        .set({ log_pending: 0 })
        .where("id", "=", record.id)
        .where("updated_at", "=", record.updatedAt)
        .executeTakeFirst();
      return Number(result.numUpdatedRows) > 0;
    } catch (error) {
      dbLogger.warn(
        { entityId: record.id, error },
        "Could not clear log_pending flag"
      );
      return false;
    }
  }

  /**
   * Bring one row's history level with the mirror. The catch-up entry is
   * attributed to the row's sync source at reconciliation time.
   */
  private async reconcileRecord(record: MirrorRecord): Promise<void> {
    const latest = await this.log.latest(record.tenantId, record.id);
    const previous = latest?.fullSnapshot ?? null;
    const current = toSnapshot(record);

    if (previous === null || !snapshotsEqual(previous, current)) {
      const change = classifyChange(previous, current, DELETED_STATUS);
      const operation: OperationKind =
        change === "unchanged" ? "synced" : change;

      try {
        await this.log.append({
          tenantId: record.tenantId,
          entityType: record.entityType,
          entityId: record.id,
          operationKind: operation,
          source: record.syncSource,
          snapshot: current,
          diff: diffSnapshots(previous, current),
          actorId: null,
          occurredAt: occurredAfter(this.now().toISOString(), latest),
        });
      } catch (error) {
        if (!(error instanceof DuplicateLogEntryError)) {
          throw error;
        }
        const stored = await this.log.latest(record.tenantId, record.id);
        if (stored === null || !snapshotsEqual(stored.fullSnapshot, current)) {
          throw new PersistenceError(
            `Log entry collision while reconciling ${record.id}`,
            { cause: error }
          );
        }
      }
    }

    if (!(await this.clearPending(record))) {
      throw new PersistenceError(
        `Failed to clear log_pending for ${record.id}`
      );
    }
  }
}
