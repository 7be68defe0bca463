import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  MirrorStore,
  RecordNotFoundError,
} from "../../../../src/services/mirror/mirror-store.js";
import {
  TransactionLogStore,
  type AppendLogInput,
} from "../../../../src/services/mirror/transaction-log.js";
import { PersistenceError } from "../../../../src/services/sync/errors.js";
import { createDateClock, createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/types.js";
import type { CanonicalEntity } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

/** Log store whose next append fails, as if the log table were unreachable */
class FlakyLogStore extends TransactionLogStore {
  failNext = false;
  /** The next append waits on this gate, calling `onHold` once it does */
  holdNext: Promise<void> | null = null;
  onHold: () => void = () => undefined;

  override async append(input: AppendLogInput): Promise<string> {
    if (this.failNext) {
      this.failNext = false;
      throw new PersistenceError("log unavailable");
    }
    if (this.holdNext !== null) {
      const gate = this.holdNext;
      this.holdNext = null;
      this.onHold();
      await gate;
    }
    return await super.append(input);
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function bill(overrides: Partial<CanonicalEntity> = {}): CanonicalEntity {
  return {
    entityType: "bill",
    externalId: "qb-1",
    amount: 500,
    dueDate: "2026-03-20",
    status: "open",
    counterpartyId: "vendor-1",
    counterpartyName: "Acme Supplies",
    attributes: {},
    sourceVersion: "1",
    ...overrides,
  };
}

describe("MirrorStore", () => {
  let db: Kysely<Database>;
  let clock: ReturnType<typeof createDateClock>;
  let log: FlakyLogStore;
  let mirror: MirrorStore;

  beforeEach(async () => {
    db = await createTestDb();
    clock = createDateClock();
    log = new FlakyLogStore(db, clock.now);
    mirror = new MirrorStore(db, log, clock.now);
  });

  afterEach(async () => {
    await db.destroy();
  });

  const fromQuickbooks = (occurredAt: string) => ({
    source: "quickbooks" as const,
    occurredAt,
  });

  // ============================================================================
  // upsert
  // ============================================================================

  describe("upsert", () => {
    it("should create a record and log it", async () => {
      const result = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );

      expect(result.change).toBe("created");
      expect(result.logPending).toBe(false);
      expect(result.logId).not.toBeNull();
      expect(result.record).toMatchObject({
        tenantId: "tenant-1",
        externalId: "qb-1",
        amount: 500,
        syncSource: "quickbooks",
        lastSyncedAt: "2026-03-02T09:00:00.000Z",
        logPending: false,
      });

      const history = await log.history("tenant-1", result.record.id);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        operationKind: "created",
        source: "quickbooks",
        occurredAt: "2026-03-01T08:00:00.000Z",
      });
    });

    it("should log an amount change as an update with its diff", async () => {
      const created = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );
      const updated = await mirror.upsert(
        "tenant-1",
        bill({ amount: 550, sourceVersion: "2" }),
        fromQuickbooks("2026-03-01T10:00:00.000Z")
      );

      expect(updated.change).toBe("updated");
      expect(updated.record.id).toBe(created.record.id);
      expect(updated.record.amount).toBe(550);

      const history = await log.history("tenant-1", created.record.id);
      expect(history.map((e) => e.operationKind)).toEqual(["created", "updated"]);
      expect(history[1]?.diff).toEqual({
        amount: { from: 500, to: 550 },
        sourceVersion: { from: "1", to: "2" },
      });
    });

    it("should only touch the sync time for an unchanged rail record", async () => {
      const created = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );
      clock.advance(60_000);

      const again = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );

      expect(again.change).toBe("unchanged");
      expect(again.logId).toBeNull();
      expect(await log.count("tenant-1", created.record.id)).toBe(1);

      const stored = await mirror.get("tenant-1", "bill", "qb-1");
      expect(stored?.lastSyncedAt).toBe("2026-03-02T09:01:00.000Z");
    });

    it("should classify a version-only change as synced", async () => {
      await mirror.upsert("tenant-1", bill(), fromQuickbooks("2026-03-01T08:00:00.000Z"));

      const result = await mirror.upsert(
        "tenant-1",
        bill({ sourceVersion: "2" }),
        fromQuickbooks("2026-03-01T09:00:00.000Z")
      );

      expect(result.change).toBe("synced");
    });

    it("should keep records of different tenants apart", async () => {
      await mirror.upsert("tenant-1", bill(), fromQuickbooks("2026-03-01T08:00:00.000Z"));
      await mirror.upsert(
        "tenant-2",
        bill({ amount: 10 }),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );

      expect((await mirror.get("tenant-1", "bill", "qb-1"))?.amount).toBe(500);
      expect((await mirror.get("tenant-2", "bill", "qb-1"))?.amount).toBe(10);
    });

    it("should leave the row log_pending when the log append fails", async () => {
      log.failNext = true;

      const result = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );

      expect(result).toMatchObject({
        change: "created",
        logId: null,
        logPending: true,
      });
      const stored = await mirror.get("tenant-1", "bill", "qb-1");
      expect(stored?.logPending).toBe(true);
      expect(await log.count("tenant-1", result.record.id)).toBe(0);
    });

    it("should settle a pending row before layering the next change", async () => {
      log.failNext = true;
      const first = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );

      const second = await mirror.upsert(
        "tenant-1",
        bill({ amount: 550, sourceVersion: "2" }),
        fromQuickbooks("2026-03-01T10:00:00.000Z")
      );

      expect(second.logPending).toBe(false);
      const history = await log.history("tenant-1", first.record.id);
      expect(history.map((e) => [e.operationKind, e.fullSnapshot.amount])).toEqual([
        ["created", 500],
        ["updated", 550],
      ]);
    });
  });

  // ============================================================================
  // Local changes
  // ============================================================================

  describe("applyLocalChange", () => {
    it("should record a user change with its actor and no sync time", async () => {
      const result = await mirror.applyLocalChange(
        "tenant-1",
        { entity: bill({ externalId: null, sourceVersion: null }) },
        "user-1"
      );

      expect(result.change).toBe("created");
      expect(result.record.syncSource).toBe("user");
      expect(result.record.lastSyncedAt).toBeNull();

      const [entry] = await log.history("tenant-1", result.record.id);
      expect(entry).toMatchObject({
        source: "user",
        actorId: "user-1",
        occurredAt: "2026-03-02T09:00:00.000Z",
      });
    });

    it("should edit an existing record by id", async () => {
      const created = await mirror.applyLocalChange(
        "tenant-1",
        { entity: bill({ externalId: null }) },
        "user-1"
      );
      clock.advance(1000);

      const edited = await mirror.applyLocalChange(
        "tenant-1",
        {
          entityId: created.record.id,
          entity: bill({ externalId: null, dueDate: "2026-04-01" }),
        },
        "user-2"
      );

      expect(edited.change).toBe("updated");
      expect(edited.record.id).toBe(created.record.id);
      const history = await log.history("tenant-1", created.record.id);
      expect(history.map((e) => e.actorId)).toEqual(["user-1", "user-2"]);
    });

    it("should return a user no-op without logging", async () => {
      const created = await mirror.applyLocalChange(
        "tenant-1",
        { entity: bill({ externalId: null }) },
        "user-1"
      );
      clock.advance(1000);

      const again = await mirror.applyLocalChange(
        "tenant-1",
        { entityId: created.record.id, entity: bill({ externalId: null }) },
        "user-1"
      );

      expect(again.change).toBe("unchanged");
      expect(await log.count("tenant-1", created.record.id)).toBe(1);
    });

    it("should log a user edit made during a rail write after it", async () => {
      const created = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );
      const release = deferred();
      const held = deferred();
      log.holdNext = release.promise;
      log.onHold = held.resolve;

      const railWrite = mirror.upsert(
        "tenant-1",
        bill({ amount: 550, sourceVersion: "2" }),
        fromQuickbooks("2026-03-01T10:00:00.000Z")
      );
      await held.promise;
      const userWrite = mirror.applyLocalChange(
        "tenant-1",
        { entityId: created.record.id, entity: bill({ amount: 600, sourceVersion: "2" }) },
        "user-1"
      );
      release.resolve();
      const [rail, user] = await Promise.all([railWrite, userWrite]);

      expect(rail.logPending).toBe(false);
      expect(user.logPending).toBe(false);
      const history = await log.history("tenant-1", created.record.id);
      expect(history.map((e) => [e.source, e.fullSnapshot.amount])).toEqual([
        ["quickbooks", 500],
        ["quickbooks", 550],
        ["user", 600],
      ]);
      const stored = await mirror.getById("tenant-1", "bill", created.record.id);
      expect(stored).toMatchObject({ amount: 600, logPending: false });
      expect((await mirror.verify("tenant-1", "bill")).mismatches).toEqual([]);
    });

    it("should log every edit made within the same millisecond", async () => {
      const created = await mirror.applyLocalChange(
        "tenant-1",
        { entity: bill({ externalId: null }) },
        "user-1"
      );
      const second = await mirror.applyLocalChange(
        "tenant-1",
        { entityId: created.record.id, entity: bill({ externalId: null, amount: 510 }) },
        "user-1"
      );
      const third = await mirror.applyLocalChange(
        "tenant-1",
        { entityId: created.record.id, entity: bill({ externalId: null, amount: 520 }) },
        "user-1"
      );

      expect([created.logPending, second.logPending, third.logPending]).toEqual([
        false,
        false,
        false,
      ]);
      const history = await log.history("tenant-1", created.record.id);
      expect(history.map((e) => [e.occurredAt, e.fullSnapshot.amount])).toEqual([
        ["2026-03-02T09:00:00.000Z", 500],
        ["2026-03-02T09:00:00.001Z", 510],
        ["2026-03-02T09:00:00.002Z", 520],
      ]);
      expect(await mirror.reconcilePending("tenant-1", "bill")).toBe(0);
    });

    it("should reject an edit of a record that does not exist", async () => {
      await expect(
        mirror.applyLocalChange(
          "tenant-1",
          { entityId: "missing", entity: bill() },
          "user-1"
        )
      ).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  describe("markDeleted", () => {
    it("should soft-delete and hide the record from default queries", async () => {
      const created = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );
      clock.advance(1000);

      const deleted = await mirror.markDeleted("tenant-1", "bill", created.record.id, {
        source: "user",
        occurredAt: clock.iso(),
        actorId: "user-1",
      });

      expect(deleted.change).toBe("deleted");
      expect(await mirror.query("tenant-1", "bill")).toEqual([]);
      const all = await mirror.query("tenant-1", "bill", { includeDeleted: true });
      expect(all.map((r) => r.status)).toEqual(["deleted"]);
    });
  });

  // ============================================================================
  // Queries
  // ============================================================================

  describe("query", () => {
    beforeEach(async () => {
      const occurred = fromQuickbooks("2026-03-01T08:00:00.000Z");
      await mirror.upsert("tenant-1", bill({ externalId: "a", dueDate: "2026-03-25", amount: 50 }), occurred);
      await mirror.upsert("tenant-1", bill({ externalId: "b", dueDate: null, amount: 75 }), occurred);
      await mirror.upsert("tenant-1", bill({ externalId: "c", dueDate: "2026-03-10", status: "paid" }), occurred);
      await mirror.upsert(
        "tenant-1",
        bill({ externalId: "d", dueDate: "2026-03-15", counterpartyId: "vendor-2" }),
        occurred
      );
    });

    it("should order by due date with undated records last", async () => {
      const rows = await mirror.query("tenant-1", "bill");
      expect(rows.map((r) => r.externalId)).toEqual(["c", "d", "a", "b"]);
    });

    it("should filter by status, due date, counterparty and amount", async () => {
      const byStatus = await mirror.query("tenant-1", "bill", { statuses: ["paid"] });
      const dueSoon = await mirror.query("tenant-1", "bill", { dueBefore: "2026-03-20" });
      const byVendor = await mirror.query("tenant-1", "bill", { counterpartyId: "vendor-2" });
      const cheap = await mirror.query("tenant-1", "bill", { maxAmount: 100 });

      expect(byStatus.map((r) => r.externalId)).toEqual(["c"]);
      expect(dueSoon.map((r) => r.externalId)).toEqual(["c", "d"]);
      expect(byVendor.map((r) => r.externalId)).toEqual(["d"]);
      expect(cheap.map((r) => r.externalId)).toEqual(["a", "b"]);
    });

    it("should page with limit and offset", async () => {
      const page = await mirror.query("tenant-1", "bill", { limit: 2, offset: 1 });
      expect(page.map((r) => r.externalId)).toEqual(["d", "a"]);
    });
  });

  // ============================================================================
  // Verification
  // ============================================================================

  describe("verify", () => {
    it("should report no mismatches when history matches the mirror", async () => {
      await mirror.upsert("tenant-1", bill(), fromQuickbooks("2026-03-01T08:00:00.000Z"));
      await mirror.upsert(
        "tenant-1",
        bill({ amount: 550, sourceVersion: "2" }),
        fromQuickbooks("2026-03-01T10:00:00.000Z")
      );

      expect(await mirror.verify("tenant-1", "bill")).toEqual({
        checked: 1,
        mismatches: [],
      });
    });

    it("should report a row changed behind the log's back", async () => {
      const created = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );
      await db
        .updateTable("mirror_bills")
        .set({ amount: 999 })
        .where("id", "=", created.record.id)
        .execute();

      const report = await mirror.verify("tenant-1", "bill");

      expect(report.mismatches).toEqual([
        {
          entityId: created.record.id,
          externalId: "qb-1",
          reason: "replayed state differs from mirror",
          chainBreaks: [],
        },
      ]);
    });
  });

  describe("reconcilePending", () => {
    it("should append the missing entry and clear the flag", async () => {
      const created = await mirror.upsert(
        "tenant-1",
        bill(),
        fromQuickbooks("2026-03-01T08:00:00.000Z")
      );
      await db
        .updateTable("mirror_bills")
        .set({ amount: 700, log_pending: 1 })
        .where("id", "=", created.record.id)
        .execute();
      clock.advance(5000);

      expect(await mirror.reconcilePending("tenant-1", "bill")).toBe(1);

      const history = await log.history("tenant-1", created.record.id);
      expect(history).toHaveLength(2);
      expect(history[1]).toMatchObject({
        operationKind: "updated",
        source: "quickbooks",
        actorId: null,
        occurredAt: "2026-03-02T09:00:05.000Z",
        diff: { amount: { from: 500, to: 700 } },
      });
      expect((await mirror.getById("tenant-1", "bill", created.record.id))?.logPending).toBe(false);
      expect((await mirror.verify("tenant-1", "bill")).mismatches).toEqual([]);
    });

    it("should settle every pending row in one pass", async () => {
      const occurred = fromQuickbooks("2026-03-01T08:00:00.000Z");
      for (let i = 0; i < 501; i++) {
        await mirror.upsert("tenant-1", bill({ externalId: `qb-${i}` }), occurred);
      }
      await db
        .updateTable("mirror_bills")
        .set({ amount: 700, log_pending: 1 })
        .where("tenant_id", "=", "tenant-1")
        .execute();

      expect(await mirror.reconcilePending("tenant-1", "bill")).toBe(501);
      expect(
        await mirror.query("tenant-1", "bill", {
          logPending: true,
          limit: Number.MAX_SAFE_INTEGER,
        })
      ).toEqual([]);
    }, 30_000);

    it("should return zero when nothing is pending", async () => {
      expect(await mirror.reconcilePending("tenant-1", "bill")).toBe(0);
    });
  });
});
