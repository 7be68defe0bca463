import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { SyncCursorStore, emptyCursor } from "../../../../src/services/sync/cursors.js";
import { EntityPolicy } from "../../../../src/services/sync/policy.js";
import { SyncRunStore, emptyCounters } from "../../../../src/services/sync/runs.js";
import { createDateClock, createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/types.js";
import type { SyncKey } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

const KEY: SyncKey = { tenantId: "tenant-1", rail: "quickbooks", entityType: "bill" };

describe("sync bookkeeping", () => {
  let db: Kysely<Database>;
  let clock: ReturnType<typeof createDateClock>;

  beforeEach(async () => {
    db = await createTestDb();
    clock = createDateClock();
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe("SyncCursorStore", () => {
    it("should read a never-synced key as idle with no token", async () => {
      const cursors = new SyncCursorStore(db, clock.now);
      expect(await cursors.get(KEY)).toEqual(emptyCursor(KEY));
    });

    it("should advance the token without touching state", async () => {
      const cursors = new SyncCursorStore(db, clock.now);
      await cursors.save({ ...emptyCursor(KEY), state: "running" });

      await cursors.advance(KEY, "token-1");

      const cursor = await cursors.get(KEY);
      expect(cursor.cursorToken).toBe("token-1");
      expect(cursor.state).toBe("running");
    });

    it("should apply a machine state and reset the position", async () => {
      const cursors = new SyncCursorStore(db, clock.now);
      await cursors.advance(KEY, "token-1");

      const updated = await cursors.applyState(KEY, {
        state: "failed_retryable",
        consecutiveFailures: 2,
        nextAttemptAt: "2026-03-02T09:02:00.000Z",
      });
      await cursors.reset(KEY);

      expect(updated.cursorToken).toBe("token-1");
      expect(await cursors.get(KEY)).toMatchObject({
        cursorToken: null,
        state: "failed_retryable",
        consecutiveFailures: 2,
        nextAttemptAt: "2026-03-02T09:02:00.000Z",
      });
    });

    it("should list a tenant's keys by rail then entity type", async () => {
      const cursors = new SyncCursorStore(db, clock.now);
      await cursors.save(emptyCursor({ ...KEY, entityType: "vendor" }));
      await cursors.save(emptyCursor(KEY));
      await cursors.save(emptyCursor({ ...KEY, tenantId: "tenant-2" }));

      const listed = await cursors.listForTenant("tenant-1");
      expect(listed.map((c) => c.entityType)).toEqual(["bill", "vendor"]);
    });
  });

  describe("EntityPolicy", () => {
    const policy = new EntityPolicy();
    const now = new Date("2026-03-02T09:00:00.000Z");

    it("should treat a bill synced within five minutes as fresh", () => {
      expect(policy.isFresh("bill", "2026-03-02T08:55:00.000Z", now)).toBe(true);
      expect(policy.isFresh("bill", "2026-03-02T08:54:59.000Z", now)).toBe(false);
    });

    it("should never treat an unsynced key as fresh", () => {
      expect(policy.isFresh("vendor", null, now)).toBe(false);
      expect(policy.isStale("vendor", null, now)).toBe(true);
    });

    it("should mark balances stale after ten minutes", () => {
      expect(policy.isStale("balance", "2026-03-02T08:50:00.000Z", now)).toBe(false);
      expect(policy.isStale("balance", "2026-03-02T08:49:59.000Z", now)).toBe(true);
    });
  });

  describe("SyncRunStore", () => {
    it("should record a run from start to finish", async () => {
      const runs = new SyncRunStore(db, clock.now);
      const runId = await runs.start(KEY, "manual", null);
      clock.advance(2000);

      await runs.finish(runId, {
        status: "succeeded",
        counters: { ...emptyCounters(), fetched: 3, created: 2, unchanged: 1 },
        cursorAfter: "token-3",
      });

      expect(await runs.get(runId)).toMatchObject({
        status: "succeeded",
        trigger: "manual",
        fetched: 3,
        created: 2,
        unchanged: 1,
        cursor_before: null,
        cursor_after: "token-3",
        started_at: "2026-03-02T09:00:00.000Z",
        finished_at: "2026-03-02T09:00:02.000Z",
      });
    });

    it("should list newest first with filters", async () => {
      const runs = new SyncRunStore(db, clock.now);
      const older = await runs.start(KEY, "schedule", null);
      clock.advance(1000);
      const newer = await runs.start({ ...KEY, entityType: "vendor" }, "webhook", null);

      const all = await runs.list("tenant-1");
      const vendors = await runs.list("tenant-1", { entityType: "vendor" });

      expect(all.map((r) => r.run_id)).toEqual([newer, older]);
      expect(vendors.map((r) => r.run_id)).toEqual([newer]);
    });

    it("should close runs left running past the cutoff", async () => {
      const runs = new SyncRunStore(db, clock.now);
      const stale = await runs.start(KEY, "schedule", null);
      clock.advance(10_000);
      await runs.start({ ...KEY, entityType: "vendor" }, "schedule", null);

      expect(await runs.abandonStale(new Date("2026-03-02T09:00:05.000Z"))).toBe(1);
      expect(await runs.get(stale)).toMatchObject({
        status: "failed_retryable",
        error_code: "TIMEOUT",
      });
    });
  });
});
