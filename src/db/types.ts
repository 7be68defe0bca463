import type { Generated, Insertable, Selectable, Updateable } from "kysely";

import type {
  CredentialStatus,
  EntityType,
  OperationKind,
  SyncState,
} from "../types/index.js";

// ============================================================================
// Enum Types
// ============================================================================

export type SyncRunStatus =
  | "running"
  | "succeeded"
  | "failed_retryable"
  | "failed_fatal"
  | "cancelled";

export type SyncTrigger = "schedule" | "webhook" | "manual" | "api";

export type ApprovalDecision = "pending" | "approved" | "rejected";

// ============================================================================
// Mirror Tables (one per entity type, identical columns)
// ============================================================================

export interface MirrorTable {
  id: string;
  tenant_id: string;
  external_id: string | null;
  status: string;
  amount: number | null;
  due_date: string | null;
  counterparty_id: string | null;
  counterparty_name: string | null;
  attributes: string; // JSON object
  source_version: string | null;
  sync_source: string;
  last_synced_at: string | null;
  log_pending: number; // 0/1
  created_at: string;
  updated_at: string;
}

export const MIRROR_TABLES = {
  bill: "mirror_bills",
  invoice: "mirror_invoices",
  vendor: "mirror_vendors",
  payment: "mirror_payments",
  balance: "mirror_balances",
} as const satisfies Record<EntityType, string>;

export type MirrorTableName = (typeof MIRROR_TABLES)[EntityType];

// ============================================================================
// Transaction Log
// ============================================================================

/**
 * transaction_log - append-only; rows are never updated or deleted
 */
export interface TransactionLogTable {
  log_id: string;
  tenant_id: string;
  entity_type: EntityType;
  entity_id: string;
  sequence: number;
  operation_kind: OperationKind;
  source: string;
  full_snapshot: string; // JSON MirrorSnapshot
  diff: string; // JSON FieldDiff
  actor_id: string | null;
  occurred_at: string;
  idempotency_key: string;
  recorded_at: string;
}

// ============================================================================
// Sync Bookkeeping
// ============================================================================

export interface SyncCursorsTable {
  tenant_id: string;
  rail: string;
  entity_type: EntityType;
  cursor_token: string | null;
  state: SyncState;
  consecutive_failures: number;
  next_attempt_at: string | null;
  last_run_at: string | null;
  last_success_at: string | null;
  last_error: string | null;
  last_error_code: string | null;
  updated_at: string;
}

export interface SyncLeasesTable {
  lease_key: string;
  token: string;
  holder: string;
  acquired_at: string;
  expires_at: string;
}

export interface SyncRunsTable {
  run_id: string;
  tenant_id: string;
  rail: string;
  entity_type: EntityType;
  trigger: SyncTrigger;
  status: SyncRunStatus;
  fetched: Generated<number>;
  created: Generated<number>;
  updated: Generated<number>;
  synced: Generated<number>;
  deleted: Generated<number>;
  unchanged: Generated<number>;
  skipped: Generated<number>;
  log_pending: Generated<number>;
  cursor_before: string | null;
  cursor_after: string | null;
  error_code: string | null;
  error_message: string | null;
  started_at: string;
  finished_at: string | null;
}

export interface RailCredentialsTable {
  tenant_id: string;
  rail: string;
  access_token: string;
  refresh_token: string | null;
  account_id: string | null;
  expires_at: string | null;
  status: CredentialStatus;
  status_reason: string | null;
  updated_at: string;
}

// ============================================================================
// Workflow Tables (owned by data orchestrators)
// ============================================================================

export interface ApprovalQueueTable {
  tenant_id: string;
  entity_id: string;
  decision: ApprovalDecision;
  decided_by: string | null;
  decided_at: string | null;
  /** Bill terms the decision was made on */
  decided_amount: number | null;
  decided_counterparty_id: string | null;
  note: string | null;
  created_at: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  mirror_bills: MirrorTable;
  mirror_invoices: MirrorTable;
  mirror_vendors: MirrorTable;
  mirror_payments: MirrorTable;
  mirror_balances: MirrorTable;
  transaction_log: TransactionLogTable;
  sync_cursors: SyncCursorsTable;
  sync_leases: SyncLeasesTable;
  sync_runs: SyncRunsTable;
  rail_credentials: RailCredentialsTable;
  approval_queue: ApprovalQueueTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type MirrorRow = Selectable<MirrorTable>;
export type NewMirrorRow = Insertable<MirrorTable>;
export type MirrorRowUpdate = Updateable<MirrorTable>;

export type TransactionLogRow = Selectable<TransactionLogTable>;
export type NewTransactionLogRow = Insertable<TransactionLogTable>;

export type SyncCursorRow = Selectable<SyncCursorsTable>;
export type SyncLeaseRow = Selectable<SyncLeasesTable>;
export type SyncRunRow = Selectable<SyncRunsTable>;
export type RailCredentialRow = Selectable<RailCredentialsTable>;
export type ApprovalQueueRow = Selectable<ApprovalQueueTable>;

// ============================================================================
// Defaults
// ============================================================================

export const SYNC_DEFAULTS = {
  retry: {
    // Run-level retry after a failed_retryable run
    initialBackoffMs: 60_000,
    backoffMultiplier: 2,
    maxBackoffMs: 3_600_000,
    maxConsecutiveFailures: 5,
  },
  lease: {
    taskDurationMs: 600_000,
  },
  pageSize: 100,
  maxPagesPerRun: 50,
} as const;
