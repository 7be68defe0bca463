/**
 * Approvals view - payable bills with persisted approval decisions
 *
 * Decisions live in `approval_queue`, so every instance of the service sees
 * the same queue. A bill that stops being payable (paid, deleted, edited
 * into an incomplete state) drops out of the view; its decision row stays.
 * A decision holds only for the amount and vendor it was made on: once
 * either changes the bill is pending again.
 */

import { dbLogger } from "../../logger.js";
import { RecordNotFoundError } from "../mirror/mirror-store.js";
import { BaseDataOrchestrator, type ViewEnvelope } from "./base.js";

import type {
  ApprovalDecision,
  ApprovalQueueRow,
  Database,
} from "../../db/types.js";
import type { MirrorRecord } from "../../types/index.js";
import type { MirrorStore } from "../mirror/mirror-store.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface ApprovalItem {
  entityId: string;
  externalId: string | null;
  amount: number;
  dueDate: string;
  counterpartyId: string;
  counterpartyName: string | null;
  categoryHint: string | null;
  decision: ApprovalDecision;
  decidedBy: string | null;
  decidedAt: string | null;
  note: string | null;
  /** Earlier decision no longer valid because the bill changed */
  supersededDecision: ApprovalDecision | null;
}

export interface ApprovalView extends ViewEnvelope {
  pending: ApprovalItem[];
  approved: ApprovalItem[];
  rejected: ApprovalItem[];
  totals: Record<ApprovalDecision, number>;
}

export interface DecideInput {
  entityId: string;
  decision: ApprovalDecision;
  actorId: string;
  note?: string | null;
}

export class NotPayableError extends Error {
  constructor(
    readonly entityId: string,
    readonly reasons: string[]
  ) {
    super(`Bill ${entityId} is not payable: ${reasons.join(", ")}`);
    this.name = "NotPayableError";
  }
}

const PAYABLE_STATUSES = new Set(["open", "partially_paid", "scheduled"]);

// ============================================================================
// Rules
// ============================================================================

/**
 * Reasons a bill cannot be approved; empty when it is payable
 */
export function payabilityProblems(record: MirrorRecord): string[] {
  const problems: string[] = [];
  if (record.entityType !== "bill") {
    problems.push("not a bill");
  }
  if (!PAYABLE_STATUSES.has(record.status)) {
    problems.push(`status ${record.status}`);
  }
  if (record.amount === null || record.amount <= 0) {
    problems.push("no positive amount");
  }
  if (record.counterpartyId === null) {
    problems.push("no vendor");
  }
  if (record.dueDate === null) {
    problems.push("no due date");
  }
  if (record.lastSyncedAt === null) {
    problems.push("never synced");
  }
  if (record.logPending) {
    problems.push("audit log pending");
  }
  if (record.attributes.payable === false) {
    problems.push("flagged unpayable by the ledger");
  }
  return problems;
}

function decisionHolds(row: ApprovalQueueRow, bill: MirrorRecord): boolean {
  return (
    row.decided_amount === bill.amount &&
    row.decided_counterparty_id === bill.counterpartyId
  );
}

function stringAttribute(record: MirrorRecord, name: string): string | null {
  const value = record.attributes[name];
  return typeof value === "string" ? value : null;
}

// ============================================================================
// ApprovalOrchestrator
// ============================================================================

export class ApprovalOrchestrator extends BaseDataOrchestrator<ApprovalView> {
  readonly name = "approvals";

  constructor(
    private db: Kysely<Database>,
    mirror: MirrorStore,
    now: () => Date = () => new Date()
  ) {
    super(mirror, now);
  }

  async getView(tenantId: string): Promise<ApprovalView> {
    const bills = await this.collect(tenantId, ["bill"]);
    const decisions = await this.db
      .selectFrom("approval_queue")
      .selectAll()
      .where("tenant_id", "=", tenantId)
      .execute();
    const byEntity = new Map(decisions.map((row) => [row.entity_id, row]));

    const view: ApprovalView = {
      ...this.envelope(tenantId),
      pending: [],
      approved: [],
      rejected: [],
      totals: { pending: 0, approved: 0, rejected: 0 },
    };

    for (const bill of bills) {
      if (
        payabilityProblems(bill).length > 0 ||
        bill.amount === null ||
        bill.dueDate === null ||
        bill.counterpartyId === null
      ) {
        continue;
      }
      const stored = byEntity.get(bill.id);
      const row =
        stored !== undefined && decisionHolds(stored, bill) ? stored : undefined;
      const decision = row?.decision ?? "pending";
      const superseded =
        stored !== undefined && row === undefined && stored.decision !== "pending"
          ? stored.decision
          : null;

      view[decision].push({
        entityId: bill.id,
        externalId: bill.externalId,
        amount: bill.amount,
        dueDate: bill.dueDate,
        counterpartyId: bill.counterpartyId,
        counterpartyName: bill.counterpartyName,
        categoryHint: stringAttribute(bill, "categoryHint"),
        decision,
        decidedBy: row?.decided_by ?? null,
        decidedAt: row?.decided_at ?? null,
        note: row?.note ?? null,
        supersededDecision: superseded,
      });
      view.totals[decision] = roundCents(view.totals[decision] + bill.amount);
    }

    return view;
  }

  /**
   * Record a decision for a payable bill (re-deciding overwrites)
   */
  async decide(tenantId: string, input: DecideInput): Promise<ApprovalItem> {
    const bill = await this.mirror.getById(tenantId, "bill", input.entityId);
    if (bill === null) {
      throw new RecordNotFoundError("bill", input.entityId);
    }

    const problems = payabilityProblems(bill);
    if (
      problems.length > 0 ||
      bill.amount === null ||
      bill.dueDate === null ||
      bill.counterpartyId === null
    ) {
      throw new NotPayableError(bill.id, problems);
    }

    const decidedAt = this.now().toISOString();
    const values = {
      decision: input.decision,
      decided_by: input.actorId,
      decided_at: decidedAt,
      decided_amount: bill.amount,
      decided_counterparty_id: bill.counterpartyId,
      note: input.note ?? null,
    };

    await this.db
      .insertInto("approval_queue")
      .values({
        tenant_id: tenantId,
        entity_id: bill.id,
        created_at: decidedAt,
        ...values,
      })
      .onConflict((oc) =>
        oc.columns(["tenant_id", "entity_id"]).doUpdateSet(values)
      )
      .execute();

    dbLogger.info(
      {
        tenantId,
        entityId: bill.id,
        decision: input.decision,
        actorId: input.actorId,
      },
      "Approval decision recorded"
    );

    return {
      entityId: bill.id,
      externalId: bill.externalId,
      amount: bill.amount,
      dueDate: bill.dueDate,
      counterpartyId: bill.counterpartyId,
      counterpartyName: bill.counterpartyName,
      categoryHint: stringAttribute(bill, "categoryHint"),
      decision: input.decision,
      decidedBy: input.actorId,
      decidedAt,
      note: input.note ?? null,
      supersededDecision: null,
    };
  }
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}
