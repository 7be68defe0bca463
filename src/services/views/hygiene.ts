/**
 * Hygiene view - open bills and invoices with data-quality problems
 */

import { BaseDataOrchestrator, type ViewEnvelope } from "./base.js";

import type { EntityType, MirrorRecord } from "../../types/index.js";
import type { MirrorStore } from "../mirror/mirror-store.js";

// ============================================================================
// Types
// ============================================================================

export const HYGIENE_ISSUES = [
  "missing_counterparty",
  "missing_due_date",
  "non_positive_amount",
  "not_synced",
  "log_pending",
] as const;

export type HygieneIssue = (typeof HYGIENE_ISSUES)[number];

export interface HygieneItem {
  entityId: string;
  entityType: EntityType;
  externalId: string | null;
  status: string;
  amount: number | null;
  dueDate: string | null;
  counterpartyName: string | null;
  issues: HygieneIssue[];
}

export interface HygieneView extends ViewEnvelope {
  /** Overdue, due within the urgency window, or undated */
  urgent: HygieneItem[];
  upcoming: HygieneItem[];
  counts: Record<HygieneIssue, number>;
}

const HYGIENE_TYPES: readonly EntityType[] = ["bill", "invoice"];
const SETTLED_STATUSES = new Set(["paid"]);
const DAY_MS = 86_400_000;

// ============================================================================
// Rules
// ============================================================================

export function findIssues(record: MirrorRecord): HygieneIssue[] {
  const issues: HygieneIssue[] = [];
  if (record.counterpartyId === null) {
    issues.push("missing_counterparty");
  }
  if (record.dueDate === null) {
    issues.push("missing_due_date");
  }
  if (record.amount === null || record.amount <= 0) {
    issues.push("non_positive_amount");
  }
  if (record.lastSyncedAt === null) {
    issues.push("not_synced");
  }
  if (record.logPending) {
    issues.push("log_pending");
  }
  return issues;
}

// ============================================================================
// HygieneOrchestrator
// ============================================================================

export class HygieneOrchestrator extends BaseDataOrchestrator<HygieneView> {
  readonly name = "hygiene";

  constructor(
    mirror: MirrorStore,
    now: () => Date = () => new Date(),
    private urgentWindowDays = 7
  ) {
    super(mirror, now);
  }

  async getView(tenantId: string): Promise<HygieneView> {
    const records = await this.collect(tenantId, HYGIENE_TYPES);
    const horizon = new Date(
      this.now().getTime() + this.urgentWindowDays * DAY_MS
    )
      .toISOString()
      .slice(0, 10);

    const counts: Record<HygieneIssue, number> = {
      missing_counterparty: 0,
      missing_due_date: 0,
      non_positive_amount: 0,
      not_synced: 0,
      log_pending: 0,
    };
    const urgent: HygieneItem[] = [];
    const upcoming: HygieneItem[] = [];

    for (const record of records) {
      if (SETTLED_STATUSES.has(record.status)) {
        continue;
      }
      const issues = findIssues(record);
      if (issues.length === 0) {
        continue;
      }
      for (const issue of issues) {
        counts[issue]++;
      }

      const item: HygieneItem = {
        entityId: record.id,
        entityType: record.entityType,
        externalId: record.externalId,
        status: record.status,
        amount: record.amount,
        dueDate: record.dueDate,
        counterpartyName: record.counterpartyName,
        issues,
      };

      if (record.dueDate === null || record.dueDate.slice(0, 10) <= horizon) {
        urgent.push(item);
      } else {
        upcoming.push(item);
      }
    }

    return { ...this.envelope(tenantId), urgent, upcoming, counts };
  }
}
