import { describe, it, expect, afterEach, vi } from "vitest";

import { SYNC_DEFAULTS, type Database } from "../../../../src/db/types.js";
import { createServices, type Services } from "../../../../src/services/index.js";
import { MirrorStore } from "../../../../src/services/mirror/mirror-store.js";
import { RailRegistry } from "../../../../src/services/rails/registry.js";
import { emptyCursor } from "../../../../src/services/sync/cursors.js";
import {
  FatalSyncError,
  PersistenceError,
  TransientSyncError,
} from "../../../../src/services/sync/errors.js";
import {
  SyncOrchestrator,
  type SyncOrchestratorOptions,
} from "../../../../src/services/sync/orchestrator.js";
import { EntityPolicy } from "../../../../src/services/sync/policy.js";
import { createDateClock, createTestDb, testConfig } from "../../../helpers/db.js";
import { StubLedgerRail, nth, stubBills, stubCursor } from "../../../helpers/rails.js";

import type {
  Provenance,
  MirrorWriteResult,
  UpsertOptions,
} from "../../../../src/services/mirror/mirror-store.js";
import type { TokenGrant } from "../../../../src/services/rails/types.js";
import type { CanonicalEntity, SyncKey } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

const TENANT = "tenant-1";
const KEY: SyncKey = { tenantId: TENANT, rail: "quickbooks", entityType: "bill" };

/** Mirror whose Nth upsert fails as if the database went away */
class FailingMirrorStore extends MirrorStore {
  calls = 0;
  failOn = 0;

  override async upsert(
    tenantId: string,
    entity: CanonicalEntity,
    provenance: Provenance,
    options?: UpsertOptions
  ): Promise<MirrorWriteResult> {
    this.calls++;
    if (this.calls === this.failOn) {
      throw new PersistenceError("database unavailable");
    }
    return await super.upsert(tenantId, entity, provenance, options);
  }
}

interface Harness {
  clock: ReturnType<typeof createDateClock>;
  rail: StubLedgerRail;
  services: Services;
  mirror: MirrorStore;
  orchestrator: SyncOrchestrator;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SyncOrchestrator", () => {
  const opened: Kysely<Database>[] = [];

  afterEach(async () => {
    await Promise.all(opened.splice(0).map((db) => db.destroy()));
  });

  async function setup(
    options: {
      orchestrator?: Partial<SyncOrchestratorOptions>;
      mirror?: (services: Services) => MirrorStore;
    } = {}
  ): Promise<Harness> {
    const db = await createTestDb();
    opened.push(db);
    const clock = createDateClock();
    const rail = new StubLedgerRail();
    const services = createServices(db, testConfig(), {
      rails: new RailRegistry([rail]),
      now: clock.now,
    });
    await services.credentials.save({
      tenantId: TENANT,
      rail: "quickbooks",
      accessToken: "test-token",
      accountId: "realm-1",
    });

    const mirror = options.mirror?.(services) ?? services.mirror;
    const orchestrator = new SyncOrchestrator(
      {
        cursors: services.cursors,
        leases: services.leases,
        runs: services.runs,
        mirror,
        credentials: services.credentials,
        rails: services.rails,
        client: services.client,
        policy: new EntityPolicy(),
        now: clock.now,
      },
      {
        pageSize: 2,
        maxPagesPerRun: 50,
        maxTaskDurationMs: 60_000,
        retry: { ...SYNC_DEFAULTS.retry },
        ...options.orchestrator,
      }
    );
    return { clock, rail, services, mirror, orchestrator };
  }

  // ============================================================================
  // Happy path
  // ============================================================================

  describe("incremental sync", () => {
    it("should page through the rail and mirror every record", async () => {
      const { rail, services, orchestrator, clock } = await setup();
      const bills = stubBills(5);
      rail.records = bills;

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({
        outcome: "completed",
        counters: { fetched: 5, created: 5, updated: 0, unchanged: 0, skipped: 0 },
        cursor: stubCursor(nth(bills, 4)),
      });
      expect(rail.fetchCalls).toBe(3);

      const cursor = await services.cursors.get(KEY);
      expect(cursor).toMatchObject({
        state: "succeeded",
        consecutiveFailures: 0,
        lastSuccessAt: clock.iso(),
      });
      expect(await services.mirror.query(TENANT, "bill")).toHaveLength(5);

      if (result.outcome !== "completed") return;
      expect(await services.runs.get(result.runId)).toMatchObject({
        status: "succeeded",
        trigger: "manual",
        fetched: 5,
        created: 5,
      });
    });

    it("should record a changed amount as an update with two history entries", async () => {
      const { rail, services, orchestrator, clock } = await setup();
      rail.records = stubBills(5);
      await orchestrator.trigger(TENANT, "quickbooks", "bill");

      rail.records = stubBills(5).map((bill) =>
        bill.id === "bill-5"
          ? { ...bill, amount: 550, updatedAt: "2026-03-01T09:00:00.000Z" }
          : bill
      );
      clock.advance(60_000);
      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({
        outcome: "completed",
        counters: { fetched: 1, updated: 1, created: 0 },
      });

      const record = await services.mirror.get(TENANT, "bill", "bill-5");
      expect(record?.amount).toBe(550);
      const history = await services.log.history(TENANT, record?.id ?? "");
      expect(history).toHaveLength(2);
      expect(history[1]?.diff).toEqual({
        amount: { from: 500, to: 550 },
        sourceVersion: {
          from: "2026-03-01T08:04:00.000Z",
          to: "2026-03-01T09:00:00.000Z",
        },
      });
    });

    it("should fetch nothing when the cursor is already at the end", async () => {
      const { rail, orchestrator } = await setup();
      rail.records = stubBills(3);
      await orchestrator.trigger(TENANT, "quickbooks", "bill");

      const again = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(again).toMatchObject({
        outcome: "completed",
        counters: { fetched: 0, created: 0 },
        cursor: stubCursor(nth(stubBills(3), 2)),
      });
    });

    it("should be idempotent when replayed from the start", async () => {
      const { rail, services, orchestrator } = await setup();
      rail.records = stubBills(3);
      await orchestrator.trigger(TENANT, "quickbooks", "bill");

      await services.cursors.reset(KEY);
      const replay = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(replay).toMatchObject({
        outcome: "completed",
        counters: { fetched: 3, created: 0, updated: 0, unchanged: 3 },
      });
      for (const record of await services.mirror.query(TENANT, "bill")) {
        expect(await services.log.count(TENANT, record.id)).toBe(1);
      }
      expect((await services.mirror.verify(TENANT, "bill")).mismatches).toEqual([]);
    });

    it("should skip unmappable records and move past them", async () => {
      const { rail, services, orchestrator } = await setup();
      const bills = stubBills(3).map((bill) =>
        bill.id === "bill-2" ? { ...bill, broken: true } : bill
      );
      rail.records = bills;

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({
        outcome: "completed",
        counters: { fetched: 3, created: 2, skipped: 1 },
        cursor: stubCursor(nth(bills, 2)),
      });
      expect(await services.mirror.get(TENANT, "bill", "bill-2")).toBeNull();
    });

    it("should sync every entity type the rail carries", async () => {
      const { rail, orchestrator } = await setup();
      rail.records = stubBills(1);

      const results = await orchestrator.triggerAll(TENANT, "quickbooks");

      expect([...results.keys()]).toEqual(["bill", "vendor"]);
      expect([...results.values()].map((r) => r.outcome)).toEqual([
        "completed",
        "completed",
      ]);
    });
  });

  // ============================================================================
  // Skips
  // ============================================================================

  describe("skips", () => {
    it("should skip entity types the rail does not carry", async () => {
      const { orchestrator } = await setup();
      expect(await orchestrator.trigger(TENANT, "quickbooks", "invoice")).toEqual({
        outcome: "skipped",
        reason: "unsupported",
      });
    });

    it("should skip tenants without a credential", async () => {
      const { orchestrator } = await setup();
      expect(await orchestrator.trigger("tenant-2", "quickbooks", "bill")).toEqual({
        outcome: "skipped",
        reason: "no_credential",
      });
    });

    it("should skip a key whose lease is held by a run in flight", async () => {
      const { rail, orchestrator } = await setup();
      rail.records = stubBills(2);
      const fetching = deferred();
      const gate = deferred();
      rail.beforeFetch = async (call) => {
        if (call === 1) {
          fetching.resolve();
          await gate.promise;
        }
      };

      const first = orchestrator.trigger(TENANT, "quickbooks", "bill");
      await fetching.promise;
      const second = await orchestrator.trigger(TENANT, "quickbooks", "bill");
      gate.resolve();

      expect(second).toEqual({ outcome: "skipped", reason: "lease_held" });
      expect((await first).outcome).toBe("completed");
      expect(rail.fetchCalls).toBe(1);
    });

    it("should let scheduled runs skip fresh data unless forced", async () => {
      const { rail, orchestrator, clock } = await setup();
      rail.records = stubBills(1);
      await orchestrator.trigger(TENANT, "quickbooks", "bill");
      clock.advance(60_000);

      expect(
        await orchestrator.trigger(TENANT, "quickbooks", "bill", { source: "schedule" })
      ).toEqual({ outcome: "skipped", reason: "fresh" });
      expect(
        (
          await orchestrator.trigger(TENANT, "quickbooks", "bill", {
            source: "schedule",
            force: true,
          })
        ).outcome
      ).toBe("completed");

      clock.advance(5 * 60_000 + 1);
      expect(
        (await orchestrator.trigger(TENANT, "quickbooks", "bill", { source: "schedule" }))
          .outcome
      ).toBe("completed");
    });
  });

  // ============================================================================
  // Failures
  // ============================================================================

  describe("failures", () => {
    it("should keep committed records and resume after a mid-run failure", async () => {
      const { rail, services, orchestrator, clock, mirror } = await setup({
        mirror: (s) => {
          const failing = new FailingMirrorStore(s.db, s.log, s.now);
          failing.failOn = 6;
          return failing;
        },
      });
      const bills = stubBills(8);
      rail.records = bills;

      const failed = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(failed).toMatchObject({
        outcome: "failed",
        errorCode: "PERSISTENCE",
        retryable: true,
        nextAttemptAt: "2026-03-02T09:01:00.000Z",
        counters: { fetched: 6, created: 5 },
      });
      expect(await mirror.query(TENANT, "bill")).toHaveLength(5);
      expect(await services.cursors.get(KEY)).toMatchObject({
        state: "failed_retryable",
        consecutiveFailures: 1,
        cursorToken: stubCursor(nth(bills, 4)),
        lastErrorCode: "PERSISTENCE",
      });

      expect(await orchestrator.trigger(TENANT, "quickbooks", "bill")).toEqual({
        outcome: "skipped",
        reason: "backoff",
      });

      clock.advance(60_000);
      const resumed = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(resumed).toMatchObject({
        outcome: "completed",
        counters: { fetched: 3, created: 3 },
      });
      const records = await mirror.query(TENANT, "bill");
      expect(records).toHaveLength(8);
      for (const record of records) {
        expect(await services.log.count(TENANT, record.id)).toBe(1);
      }
      expect(await services.cursors.get(KEY)).toMatchObject({
        state: "succeeded",
        consecutiveFailures: 0,
        cursorToken: stubCursor(nth(bills, 7)),
      });

      const clean = await setup();
      clean.rail.records = stubBills(8);
      const full = await clean.orchestrator.trigger(TENANT, "quickbooks", "bill");
      expect(full).toMatchObject({ outcome: "completed", counters: { fetched: 8, created: 8 } });
      expect((await services.cursors.get(KEY)).cursorToken).toBe(
        (await clean.services.cursors.get(KEY)).cursorToken
      );
    });

    it("should mark the credential on an auth failure and stop syncing", async () => {
      const { rail, services, orchestrator } = await setup();
      rail.failures = [new FatalSyncError("Unauthorized", "auth", 401)];

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({
        outcome: "failed",
        errorCode: "FATAL_AUTH",
        retryable: false,
        nextAttemptAt: null,
      });
      expect((await services.credentials.get(TENANT, "quickbooks"))?.status).toBe(
        "needs_reconnection"
      );
      expect(await orchestrator.trigger(TENANT, "quickbooks", "bill")).toEqual({
        outcome: "skipped",
        reason: "needs_reconnection",
      });

      const health = await orchestrator.health(TENANT);
      expect(health.health).toBe("needs_attention");
      expect(health.connections).toEqual([
        {
          rail: "quickbooks",
          status: "needs_reconnection",
          message: "The connection to this provider needs to be re-authorized.",
        },
      ]);
    });

    it("should turn repeated transient failures fatal until resolved", async () => {
      const { rail, services, orchestrator } = await setup({
        orchestrator: {
          retry: { ...SYNC_DEFAULTS.retry, maxConsecutiveFailures: 2 },
        },
      });
      rail.records = stubBills(1);
      rail.failures = [
        new TransientSyncError("Service unavailable", 503),
        new TransientSyncError("Service unavailable", 503),
      ];

      const first = await orchestrator.trigger(TENANT, "quickbooks", "bill");
      const second = await orchestrator.trigger(TENANT, "quickbooks", "bill", {
        force: true,
      });

      expect(first).toMatchObject({ outcome: "failed", errorCode: "TRANSIENT", retryable: true });
      expect(second).toMatchObject({ outcome: "failed", retryable: false });
      expect(
        await orchestrator.trigger(TENANT, "quickbooks", "bill", { force: true })
      ).toEqual({ outcome: "skipped", reason: "failed_fatal" });

      expect(await orchestrator.resolve(TENANT, "quickbooks")).toBe(1);
      expect(await services.cursors.get(KEY)).toMatchObject({
        state: "idle",
        consecutiveFailures: 0,
      });
      expect((await orchestrator.trigger(TENANT, "quickbooks", "bill")).outcome).toBe(
        "completed"
      );
    });

    it("should recover a key left running by a lost run", async () => {
      const { rail, services, orchestrator } = await setup();
      rail.records = stubBills(1);
      await services.cursors.save({ ...emptyCursor(KEY), state: "running" });

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result.outcome).toBe("completed");
      expect(await services.cursors.get(KEY)).toMatchObject({
        state: "succeeded",
        consecutiveFailures: 0,
      });
    });

    it("should fail a recovered key that had no retries left", async () => {
      const { rail, services, orchestrator } = await setup();
      rail.records = stubBills(1);
      await services.cursors.save({
        ...emptyCursor(KEY),
        state: "running",
        consecutiveFailures: 4,
      });

      expect(await orchestrator.trigger(TENANT, "quickbooks", "bill")).toEqual({
        outcome: "skipped",
        reason: "failed_fatal",
      });
      expect(await services.cursors.get(KEY)).toMatchObject({
        state: "failed_fatal",
        consecutiveFailures: 5,
        nextAttemptAt: null,
        lastErrorCode: "INTERRUPTED",
      });
      expect(rail.fetchCalls).toBe(0);
      expect(await services.leases.get(KEY)).toBeNull();

      expect(await orchestrator.trigger(TENANT, "quickbooks", "bill")).toEqual({
        outcome: "skipped",
        reason: "failed_fatal",
      });
      expect((await orchestrator.health(TENANT)).health).toBe("needs_attention");
    });

    it("should abort a run that outlives the task duration", async () => {
      const { rail, services, orchestrator } = await setup({
        orchestrator: { maxTaskDurationMs: 5 },
      });
      rail.records = stubBills(1);
      rail.beforeFetch = () =>
        new Promise<void>((resolve) => {
          setTimeout(resolve, 50);
        });

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({
        outcome: "failed",
        errorCode: "TIMEOUT",
        retryable: true,
      });
      expect(await services.leases.get(KEY)).toBeNull();
      expect((await services.cursors.get(KEY)).state).toBe("failed_retryable");
    });
  });

  // ============================================================================
  // Remote deletions
  // ============================================================================

  describe("remote deletions", () => {
    it("should mirror deletions the rail reports after an incremental run", async () => {
      const { rail, services, orchestrator, clock, mirror } = await setup();
      const bills = stubBills(3);
      rail.records = bills;
      await orchestrator.trigger(TENANT, "quickbooks", "bill");
      expect(rail.deletionRequests.map((r) => r.cursor)).toEqual([null]);

      rail.deletions = [{ externalId: "bill-2", occurredAt: "2026-03-02T08:30:00.000Z" }];
      clock.advance(60_000);
      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({
        outcome: "completed",
        counters: { fetched: 0, deleted: 1 },
      });
      expect(rail.deletionRequests[1]?.cursor).toBe(stubCursor(nth(bills, 2)));
      expect((await mirror.query(TENANT, "bill")).map((r) => r.externalId).sort()).toEqual([
        "bill-1",
        "bill-3",
      ]);
      const deleted = await mirror.get(TENANT, "bill", "bill-2");
      expect(deleted?.status).toBe("deleted");
      const history = await services.log.history(TENANT, deleted?.id ?? "");
      expect(history.at(-1)).toMatchObject({
        operationKind: "deleted",
        source: "quickbooks",
        occurredAt: "2026-03-02T08:30:00.000Z",
      });

      const again = await orchestrator.trigger(TENANT, "quickbooks", "bill");
      expect(again).toMatchObject({ outcome: "completed", counters: { deleted: 0 } });
    });

    it("should ignore deletions of entities never mirrored", async () => {
      const { orchestrator } = await setup();

      expect(
        await orchestrator.applyRemoteDeletion(TENANT, "quickbooks", "bill", {
          externalId: "bill-9",
          occurredAt: null,
        })
      ).toBeNull();
    });
  });

  // ============================================================================
  // Token refresh
  // ============================================================================

  describe("token refresh", () => {
    const grant: TokenGrant = {
      accessToken: "test-token-2",
      refreshToken: "test-refresh-2",
      expiresInSeconds: 3600,
    };

    async function refreshable(expiresAt: string | null) {
      const harness = await setup();
      await harness.services.credentials.save({
        tenantId: TENANT,
        rail: "quickbooks",
        accessToken: "test-token",
        refreshToken: "test-refresh",
        accountId: "realm-1",
        expiresAt,
      });
      harness.rail.records = stubBills(1);
      return harness;
    }

    it("should refresh a token that expires within the buffer before fetching", async () => {
      const { rail, services, orchestrator } = await refreshable("2026-03-02T09:02:00.000Z");
      const refresh = vi.fn(() => Promise.resolve(grant));
      rail.refreshCredential = refresh;

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result.outcome).toBe("completed");
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(rail.fetchTokens).toEqual(["test-token-2"]);
      expect(await services.credentials.get(TENANT, "quickbooks")).toMatchObject({
        accessToken: "test-token-2",
        refreshToken: "test-refresh-2",
        expiresAt: "2026-03-02T10:00:00.000Z",
        status: "active",
      });
    });

    it("should refresh once and retry when the rail rejects the token", async () => {
      const { rail, services, orchestrator } = await refreshable(null);
      const refresh = vi.fn(() => Promise.resolve(grant));
      rail.refreshCredential = refresh;
      rail.failures = [new FatalSyncError("Unauthorized", "auth", 401)];

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({ outcome: "completed", counters: { created: 1 } });
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(rail.fetchTokens).toEqual(["test-token", "test-token-2"]);
      expect((await services.credentials.get(TENANT, "quickbooks"))?.status).toBe("active");
    });

    it("should ask for reconnection when the refresh is refused", async () => {
      const { rail, services, orchestrator } = await refreshable("2026-03-02T09:02:00.000Z");
      rail.refreshCredential = () =>
        Promise.reject(new FatalSyncError("invalid_grant", "auth", 400));

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({
        outcome: "failed",
        errorCode: "FATAL_AUTH",
        retryable: false,
      });
      expect(rail.fetchCalls).toBe(0);
      expect((await services.credentials.get(TENANT, "quickbooks"))?.status).toBe(
        "needs_reconnection"
      );
      expect(await services.credentials.list(TENANT)).toMatchObject([
        { statusReason: "Token refresh failed: invalid_grant" },
      ]);
    });

    it("should ask for reconnection when a refreshed token is rejected too", async () => {
      const { rail, services, orchestrator } = await refreshable(null);
      const refresh = vi.fn(() => Promise.resolve(grant));
      rail.refreshCredential = refresh;
      rail.failures = [
        new FatalSyncError("Unauthorized", "auth", 401),
        new FatalSyncError("Unauthorized", "auth", 401),
      ];

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(result).toMatchObject({ outcome: "failed", errorCode: "FATAL_AUTH" });
      expect(refresh).toHaveBeenCalledTimes(1);
      expect((await services.credentials.get(TENANT, "quickbooks"))?.status).toBe(
        "needs_reconnection"
      );
    });
  });

  // ============================================================================
  // Cancellation
  // ============================================================================

  describe("cancellation", () => {
    it("should stop at the last committed record and return the key to idle", async () => {
      const { rail, services, orchestrator } = await setup();
      const bills = stubBills(4);
      rail.records = bills;
      let cancelled = 0;
      rail.beforeFetch = (call) => {
        if (call === 2) {
          cancelled = orchestrator.cancelTenant(TENANT);
        }
      };

      const result = await orchestrator.trigger(TENANT, "quickbooks", "bill");

      expect(cancelled).toBe(1);
      expect(result).toMatchObject({
        outcome: "cancelled",
        counters: { fetched: 2, created: 2 },
      });
      expect(await services.cursors.get(KEY)).toMatchObject({
        state: "idle",
        consecutiveFailures: 0,
        cursorToken: stubCursor(nth(bills, 1)),
      });
      expect(orchestrator.activeRunCount()).toBe(0);

      if (result.outcome !== "cancelled") return;
      expect(await services.runs.get(result.runId)).toMatchObject({
        status: "cancelled",
        error_code: "CANCELLED",
      });
    });

    it("should report nothing to cancel for an idle tenant", async () => {
      const { orchestrator } = await setup();
      expect(orchestrator.cancelTenant(TENANT)).toBe(0);
      expect(orchestrator.cancelAll()).toBe(0);
    });
  });

  // ============================================================================
  // Health
  // ============================================================================

  describe("health", () => {
    it("should report fresh keys as ok and degrade once stale", async () => {
      const { rail, orchestrator, clock } = await setup();
      rail.records = stubBills(1);
      await orchestrator.trigger(TENANT, "quickbooks", "bill");

      const healthy = await orchestrator.health(TENANT);
      expect(healthy).toEqual({
        tenantId: TENANT,
        health: "ok",
        connections: [{ rail: "quickbooks", status: "active", message: null }],
        keys: [
          {
            rail: "quickbooks",
            entityType: "bill",
            state: "succeeded",
            health: "ok",
            lastSuccessfulSyncAt: "2026-03-02T09:00:00.000Z",
            nextAttemptAt: null,
            stale: false,
            message: null,
          },
        ],
      });

      clock.advance(2 * 60 * 60_000);
      const stale = await orchestrator.health(TENANT);
      expect(stale.health).toBe("degraded");
      expect(stale.keys[0]).toMatchObject({ stale: true, health: "degraded" });
    });
  });
});
