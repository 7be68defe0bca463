/**
 * Response schemas shared by the route modules
 */

import { Type } from "@sinclair/typebox";

import {
  EntityTypeSchema,
  NullableNumber,
  NullableString,
  RailNameSchema,
  createListResponseSchema,
  createResponseSchema,
} from "./common.js";

// ============================================================================
// Records & History
// ============================================================================

const AttributesSchema = Type.Record(Type.String(), Type.Unknown());

export const MirrorRecordSchema = Type.Object({
  id: Type.String(),
  tenantId: Type.String(),
  entityType: EntityTypeSchema,
  externalId: NullableString,
  amount: NullableNumber,
  dueDate: NullableString,
  status: Type.String(),
  counterpartyId: NullableString,
  counterpartyName: NullableString,
  attributes: AttributesSchema,
  sourceVersion: NullableString,
  syncSource: Type.String(),
  lastSyncedAt: NullableString,
  logPending: Type.Boolean(),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});

export const LogEntrySchema = Type.Object({
  logId: Type.String(),
  entityId: Type.String(),
  sequence: Type.Number(),
  operationKind: Type.String(),
  source: Type.String(),
  fullSnapshot: AttributesSchema,
  diff: Type.Record(
    Type.String(),
    Type.Object({ from: Type.Unknown(), to: Type.Unknown() })
  ),
  actorId: NullableString,
  occurredAt: Type.String(),
  recordedAt: Type.String(),
});

export const MirrorRecordResponseSchema = createResponseSchema(
  MirrorRecordSchema
);

export const MirrorRecordListResponseSchema =
  createListResponseSchema(MirrorRecordSchema);

export const HistoryResponseSchema = createListResponseSchema(LogEntrySchema);

export const WriteResultResponseSchema = createResponseSchema(
  Type.Object({
    record: MirrorRecordSchema,
    change: Type.String(),
    logId: NullableString,
    logPending: Type.Boolean(),
  })
);

export const VerifyResponseSchema = createResponseSchema(
  Type.Object({
    checked: Type.Number(),
    mismatches: Type.Array(
      Type.Object({
        entityId: Type.String(),
        externalId: NullableString,
        reason: Type.String(),
      })
    ),
  })
);

// ============================================================================
// Sync
// ============================================================================

export const RunCountersSchema = Type.Object({
  fetched: Type.Number(),
  created: Type.Number(),
  updated: Type.Number(),
  synced: Type.Number(),
  deleted: Type.Number(),
  unchanged: Type.Number(),
  skipped: Type.Number(),
  logPending: Type.Number(),
});

export const SyncRunSchema = Type.Object({
  runId: Type.String(),
  rail: Type.String(),
  entityType: EntityTypeSchema,
  trigger: Type.String(),
  status: Type.String(),
  counters: RunCountersSchema,
  errorCode: NullableString,
  message: NullableString,
  startedAt: Type.String(),
  finishedAt: NullableString,
});

export const SyncRunListResponseSchema = createListResponseSchema(SyncRunSchema);

export const TriggerResultSchema = Type.Object({
  rail: Type.String(),
  entityType: EntityTypeSchema,
  outcome: Type.String(),
  runId: NullableString,
  reason: NullableString,
});

export const TriggerResponseSchema = createListResponseSchema(
  TriggerResultSchema
);

const HealthStatusSchema = Type.Union([
  Type.Literal("ok"),
  Type.Literal("degraded"),
  Type.Literal("needs_attention"),
]);

export const TenantHealthResponseSchema = createResponseSchema(
  Type.Object({
    tenantId: Type.String(),
    health: HealthStatusSchema,
    connections: Type.Array(
      Type.Object({
        rail: RailNameSchema,
        status: Type.String(),
        message: NullableString,
      })
    ),
    keys: Type.Array(
      Type.Object({
        rail: RailNameSchema,
        entityType: EntityTypeSchema,
        state: Type.String(),
        health: HealthStatusSchema,
        lastSuccessfulSyncAt: NullableString,
        nextAttemptAt: NullableString,
        stale: Type.Boolean(),
        message: NullableString,
      })
    ),
  })
);

// ============================================================================
// Views
// ============================================================================

export const HygieneItemSchema = Type.Object({
  entityId: Type.String(),
  entityType: EntityTypeSchema,
  externalId: NullableString,
  status: Type.String(),
  amount: NullableNumber,
  dueDate: NullableString,
  counterpartyName: NullableString,
  issues: Type.Array(Type.String()),
});

export const HygieneViewResponseSchema = createResponseSchema(
  Type.Object({
    tenantId: Type.String(),
    generatedAt: Type.String(),
    urgent: Type.Array(HygieneItemSchema),
    upcoming: Type.Array(HygieneItemSchema),
    counts: Type.Record(Type.String(), Type.Number()),
  })
);

export const ApprovalItemSchema = Type.Object({
  entityId: Type.String(),
  externalId: NullableString,
  amount: Type.Number(),
  dueDate: Type.String(),
  counterpartyId: Type.String(),
  counterpartyName: NullableString,
  categoryHint: NullableString,
  decision: Type.String(),
  decidedBy: NullableString,
  decidedAt: NullableString,
  note: NullableString,
  supersededDecision: NullableString,
});

export const ApprovalViewResponseSchema = createResponseSchema(
  Type.Object({
    tenantId: Type.String(),
    generatedAt: Type.String(),
    pending: Type.Array(ApprovalItemSchema),
    approved: Type.Array(ApprovalItemSchema),
    rejected: Type.Array(ApprovalItemSchema),
    totals: Type.Record(Type.String(), Type.Number()),
  })
);

export const ApprovalItemResponseSchema =
  createResponseSchema(ApprovalItemSchema);
