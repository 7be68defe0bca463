/**
 * Domain types shared by the mirror, the transaction log and the rails.
 *
 * Timestamps are ISO-8601 UTC strings throughout; they sort lexically and
 * survive both SQLite and Postgres unchanged.
 */

// ============================================================================
// Entity & Rail Names
// ============================================================================

export const ENTITY_TYPES = [
  "bill",
  "invoice",
  "vendor",
  "payment",
  "balance",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const RAIL_NAMES = ["quickbooks", "billpay"] as const;

export type RailName = (typeof RAIL_NAMES)[number];

/** Who caused a change: a rail sync or a local user action */
export type ChangeSource = RailName | "user";

export type OperationKind = "created" | "updated" | "synced" | "deleted";

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

export function isRailName(value: string): value is RailName {
  return RAIL_NAMES.some((rail) => rail === value);
}

// ============================================================================
// Canonical Entity
// ============================================================================

export type AttributeValue = string | number | boolean | null | string[];

export type Attributes = Record<string, AttributeValue>;

/**
 * Rail-independent shape every mapped record is reduced to.
 *
 * Type-specific fields (document numbers, linked bills, payability hints)
 * live in `attributes`.
 */
export interface CanonicalEntity {
  entityType: EntityType;
  externalId: string | null;
  amount: number | null;
  dueDate: string | null;
  status: string;
  counterpartyId: string | null;
  counterpartyName: string | null;
  attributes: Attributes;
  sourceVersion: string | null;
}

/** Soft-delete marker shared by every entity type */
export const DELETED_STATUS = "deleted";

// ============================================================================
// Mirror
// ============================================================================

/**
 * The logged part of a mirror row. A transaction log entry stores exactly
 * this, so folding history reproduces it.
 */
export interface MirrorSnapshot extends CanonicalEntity {
  id: string;
  tenantId: string;
  syncSource: ChangeSource;
}

export interface MirrorRecord extends MirrorSnapshot {
  lastSyncedAt: string | null;
  logPending: boolean;
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// Transaction Log
// ============================================================================

export type FieldDiff = Record<
  string,
  { from: AttributeValue; to: AttributeValue }
>;

export interface TransactionLogEntry {
  logId: string;
  tenantId: string;
  entityType: EntityType;
  entityId: string;
  sequence: number;
  operationKind: OperationKind;
  source: ChangeSource;
  fullSnapshot: MirrorSnapshot;
  diff: FieldDiff;
  actorId: string | null;
  occurredAt: string;
  idempotencyKey: string;
  recordedAt: string;
}

// ============================================================================
// Sync State
// ============================================================================

export type SyncState =
  | "idle"
  | "running"
  | "succeeded"
  | "failed_retryable"
  | "failed_fatal";

export interface SyncKey {
  tenantId: string;
  rail: RailName;
  entityType: EntityType;
}

export interface SyncCursor extends SyncKey {
  cursorToken: string | null;
  state: SyncState;
  consecutiveFailures: number;
  nextAttemptAt: string | null;
  lastRunAt: string | null;
  lastSuccessAt: string | null;
  lastError: string | null;
  lastErrorCode: string | null;
}

export type HealthStatus = "ok" | "degraded" | "needs_attention";

// ============================================================================
// Credentials
// ============================================================================

export type CredentialStatus = "active" | "needs_reconnection";

export interface RailCredential {
  tenantId: string;
  rail: RailName;
  accessToken: string;
  refreshToken: string | null;
  /** Rail-side account/company identifier (e.g. a QuickBooks realm id) */
  accountId: string | null;
  expiresAt: string | null;
  status: CredentialStatus;
}

export function syncKeyToString(key: SyncKey): string {
  return `${key.tenantId}:${key.rail}:${key.entityType}`;
}
