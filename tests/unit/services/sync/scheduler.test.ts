import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createServices, type Services } from "../../../../src/services/index.js";
import { RailRegistry } from "../../../../src/services/rails/registry.js";
import { createDateClock, createTestDb, testConfig } from "../../../helpers/db.js";
import { StubLedgerRail, stubBills } from "../../../helpers/rails.js";

import type { Database } from "../../../../src/db/types.js";
import type { Kysely } from "kysely";

describe("background triggers", () => {
  let db: Kysely<Database>;
  let clock: ReturnType<typeof createDateClock>;
  let rail: StubLedgerRail;
  let services: Services;

  beforeEach(async () => {
    db = await createTestDb();
    clock = createDateClock();
    rail = new StubLedgerRail();
    rail.records = stubBills(2);
    services = createServices(db, testConfig({ SYNC_PAGE_SIZE: "10" }), {
      rails: new RailRegistry([rail]),
      now: clock.now,
    });
    await services.credentials.save({
      tenantId: "tenant-1",
      rail: "quickbooks",
      accessToken: "test-token",
      accountId: "realm-1",
    });
  });

  afterEach(async () => {
    await services.scheduler.stop();
    await db.destroy();
  });

  describe("SyncScheduler", () => {
    it("should trigger every entity type of every connected tenant", async () => {
      const summary = await services.scheduler.tick();

      expect(summary).toEqual({
        triggered: 2,
        completed: 2,
        failed: 0,
        skipped: 0,
        cancelled: 0,
        errors: 0,
      });
      expect(await services.mirror.query("tenant-1", "bill")).toHaveLength(2);
      expect(await services.mirror.query("tenant-1", "vendor")).toHaveLength(2);
    });

    it("should leave fresh keys alone on the next tick", async () => {
      await services.scheduler.tick();
      clock.advance(60_000);

      const summary = await services.scheduler.tick();

      expect(summary.triggered).toBe(2);
      expect(summary.skipped).toBe(2);
      expect(rail.fetchCalls).toBe(2);
    });

    it("should record scheduled runs with their trigger", async () => {
      await services.scheduler.tick();

      const runs = await services.runs.list("tenant-1");
      expect(runs.map((r) => r.trigger)).toEqual(["schedule", "schedule"]);
    });

    it("should skip tenants whose credential needs reconnection", async () => {
      await services.credentials.markNeedsReconnection(
        "tenant-1",
        "quickbooks",
        "revoked"
      );

      expect((await services.scheduler.tick()).triggered).toBe(0);
    });
  });

  describe("WebhookDispatcher", () => {
    it("should sync the notified entity types for a known account", async () => {
      services.webhooks.enqueue("quickbooks", [
        { accountId: "realm-1", entityTypes: ["bill"] },
        { accountId: "realm-unknown", entityTypes: ["vendor"] },
      ]);
      expect(services.webhooks.pending).toBe(1);

      await services.webhooks.drain();

      expect(services.webhooks.pending).toBe(0);
      const runs = await services.runs.list("tenant-1");
      expect(runs.map((r) => [r.entity_type, r.trigger])).toEqual([
        ["bill", "webhook"],
      ]);
      expect(await services.mirror.query("tenant-1", "vendor")).toEqual([]);
    });
  });
});
