import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  MirrorStore,
  RecordNotFoundError,
} from "../../../../src/services/mirror/mirror-store.js";
import { TransactionLogStore } from "../../../../src/services/mirror/transaction-log.js";
import {
  ApprovalOrchestrator,
  NotPayableError,
  payabilityProblems,
} from "../../../../src/services/views/approvals.js";
import { createDateClock, createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/types.js";
import type { CanonicalEntity } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

function bill(externalId: string, overrides: Partial<CanonicalEntity> = {}): CanonicalEntity {
  return {
    entityType: "bill",
    externalId,
    amount: 500,
    dueDate: "2026-03-20",
    status: "open",
    counterpartyId: "vendor-1",
    counterpartyName: "Acme Supplies",
    attributes: { categoryHint: "Office Supplies", payable: true },
    sourceVersion: "1",
    ...overrides,
  };
}

describe("ApprovalOrchestrator", () => {
  let db: Kysely<Database>;
  let mirror: MirrorStore;
  let clock: ReturnType<typeof createDateClock>;
  let approvals: ApprovalOrchestrator;
  const ids = new Map<string, string>();

  function idOf(externalId: string): string {
    const id = ids.get(externalId);
    if (id === undefined) {
      throw new Error(`no record for ${externalId}`);
    }
    return id;
  }

  beforeEach(async () => {
    db = await createTestDb();
    clock = createDateClock();
    mirror = new MirrorStore(db, new TransactionLogStore(db, clock.now), clock.now);
    approvals = new ApprovalOrchestrator(db, mirror, clock.now);

    const provenance = { source: "quickbooks" as const, occurredAt: "2026-03-01T08:00:00.000Z" };
    for (const entity of [
      bill("qb-1"),
      bill("qb-2", { attributes: { payable: false } }),
      bill("qb-5", { amount: 250, dueDate: "2026-03-25" }),
    ]) {
      const result = await mirror.upsert("tenant-1", entity, provenance);
      ids.set(entity.externalId ?? "", result.record.id);
    }
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should list payable bills as pending until decided", async () => {
    const view = await approvals.getView("tenant-1");

    expect(view.pending.map((i) => i.externalId)).toEqual(["qb-1", "qb-5"]);
    expect(view.pending[0]).toMatchObject({
      amount: 500,
      counterpartyId: "vendor-1",
      categoryHint: "Office Supplies",
      decision: "pending",
      decidedBy: null,
    });
    expect(view.totals).toEqual({ pending: 750, approved: 0, rejected: 0 });
  });

  it("should persist a decision and move the bill between lists", async () => {
    clock.advance(60_000);
    const item = await approvals.decide("tenant-1", {
      entityId: idOf("qb-1"),
      decision: "approved",
      actorId: "user-1",
      note: "ok",
    });

    expect(item).toMatchObject({
      decision: "approved",
      decidedBy: "user-1",
      decidedAt: "2026-03-02T09:01:00.000Z",
      note: "ok",
    });

    const view = await approvals.getView("tenant-1");
    expect(view.approved.map((i) => i.externalId)).toEqual(["qb-1"]);
    expect(view.pending.map((i) => i.externalId)).toEqual(["qb-5"]);
    expect(view.totals).toEqual({ pending: 250, approved: 500, rejected: 0 });
  });

  it("should let a later decision overwrite an earlier one", async () => {
    await approvals.decide("tenant-1", {
      entityId: idOf("qb-5"),
      decision: "approved",
      actorId: "user-1",
    });
    await approvals.decide("tenant-1", {
      entityId: idOf("qb-5"),
      decision: "rejected",
      actorId: "user-2",
      note: "duplicate",
    });

    const view = await approvals.getView("tenant-1");
    expect(view.approved).toEqual([]);
    expect(view.rejected).toHaveLength(1);
    expect(view.rejected[0]).toMatchObject({ decidedBy: "user-2", note: "duplicate" });
  });

  it("should send a bill back to pending when its amount changes after approval", async () => {
    await approvals.decide("tenant-1", {
      entityId: idOf("qb-1"),
      decision: "approved",
      actorId: "user-1",
    });
    await mirror.upsert("tenant-1", bill("qb-1", { amount: 550, sourceVersion: "2" }), {
      source: "quickbooks",
      occurredAt: "2026-03-02T08:00:00.000Z",
    });

    const view = await approvals.getView("tenant-1");
    expect(view.approved).toEqual([]);
    expect(view.pending.find((i) => i.externalId === "qb-1")).toMatchObject({
      amount: 550,
      decision: "pending",
      decidedBy: null,
      supersededDecision: "approved",
    });
    expect(view.totals).toEqual({ pending: 800, approved: 0, rejected: 0 });
  });

  it("should keep a decision when the bill changes elsewhere", async () => {
    await approvals.decide("tenant-1", {
      entityId: idOf("qb-1"),
      decision: "approved",
      actorId: "user-1",
    });
    await mirror.upsert(
      "tenant-1",
      bill("qb-1", { dueDate: "2026-03-27", sourceVersion: "2" }),
      { source: "quickbooks", occurredAt: "2026-03-02T08:00:00.000Z" }
    );

    const view = await approvals.getView("tenant-1");
    expect(view.approved[0]).toMatchObject({
      externalId: "qb-1",
      dueDate: "2026-03-27",
      supersededDecision: null,
    });
  });

  it("should drop a bill from the view once it is paid", async () => {
    await mirror.upsert("tenant-1", bill("qb-1", { status: "paid", sourceVersion: "2" }), {
      source: "quickbooks",
      occurredAt: "2026-03-02T08:00:00.000Z",
    });

    const view = await approvals.getView("tenant-1");
    expect(view.pending.map((i) => i.externalId)).toEqual(["qb-5"]);
  });

  it("should refuse to decide on a bill the ledger flags unpayable", async () => {
    await expect(
      approvals.decide("tenant-1", {
        entityId: idOf("qb-2"),
        decision: "approved",
        actorId: "user-1",
      })
    ).rejects.toBeInstanceOf(NotPayableError);
  });

  it("should refuse to decide on an unknown bill", async () => {
    await expect(
      approvals.decide("tenant-1", {
        entityId: "missing",
        decision: "approved",
        actorId: "user-1",
      })
    ).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it("should explain why a local draft is not payable", async () => {
    const result = await mirror.applyLocalChange(
      "tenant-1",
      { entity: bill("local-1", { externalId: null, status: "draft", dueDate: null }) },
      "user-1"
    );

    expect(payabilityProblems(result.record)).toEqual([
      "status draft",
      "no due date",
      "never synced",
    ]);
  });
});
