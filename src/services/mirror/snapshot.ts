/**
 * Snapshot helpers shared by the mirror and the transaction log:
 * row mapping, normalization, diffing and change classification.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { PersistenceError } from "../sync/errors.js";

import type { MirrorRow } from "../../db/types.js";
import type {
  AttributeValue,
  Attributes,
  CanonicalEntity,
  ChangeSource,
  EntityType,
  FieldDiff,
  MirrorRecord,
  MirrorSnapshot,
  OperationKind,
} from "../../types/index.js";

// ============================================================================
// Schemas (validate JSON read back from storage)
// ============================================================================

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Union([schema, Type.Null()]);

const AttributeValueSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Null(),
  Type.Array(Type.String()),
]);

export const AttributesSchema = Type.Record(
  Type.String(),
  AttributeValueSchema
);

const EntityTypeSchema = Type.Union([
  Type.Literal("bill"),
  Type.Literal("invoice"),
  Type.Literal("vendor"),
  Type.Literal("payment"),
  Type.Literal("balance"),
]);

const ChangeSourceSchema = Type.Union([
  Type.Literal("quickbooks"),
  Type.Literal("billpay"),
  Type.Literal("user"),
]);

export const MirrorSnapshotSchema = Type.Object({
  id: Type.String(),
  tenantId: Type.String(),
  entityType: EntityTypeSchema,
  externalId: Nullable(Type.String()),
  amount: Nullable(Type.Number()),
  dueDate: Nullable(Type.String()),
  status: Type.String(),
  counterpartyId: Nullable(Type.String()),
  counterpartyName: Nullable(Type.String()),
  attributes: AttributesSchema,
  sourceVersion: Nullable(Type.String()),
  syncSource: ChangeSourceSchema,
});

export const FieldDiffSchema = Type.Record(
  Type.String(),
  Type.Object({ from: AttributeValueSchema, to: AttributeValueSchema })
);

export function parseJson<T extends TSchema>(
  schema: T,
  text: string,
  what: string
): Static<T> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new PersistenceError(`Stored ${what} is not valid JSON`, {
      cause: error,
    });
  }
  if (!Value.Check(schema, value)) {
    throw new PersistenceError(`Stored ${what} does not match its schema`);
  }
  return value;
}

// ============================================================================
// Row Mapping
// ============================================================================

function toChangeSource(value: string): ChangeSource {
  if (value === "quickbooks" || value === "billpay" || value === "user") {
    return value;
  }
  throw new PersistenceError(`Unknown sync source "${value}"`);
}

export function rowToRecord(
  row: MirrorRow,
  entityType: EntityType
): MirrorRecord {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    entityType,
    externalId: row.external_id,
    amount: row.amount,
    dueDate: row.due_date,
    status: row.status,
    counterpartyId: row.counterparty_id,
    counterpartyName: row.counterparty_name,
    attributes: parseJson(AttributesSchema, row.attributes, "attributes"),
    sourceVersion: row.source_version,
    syncSource: toChangeSource(row.sync_source),
    lastSyncedAt: row.last_synced_at,
    logPending: row.log_pending === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toSnapshot(record: MirrorSnapshot): MirrorSnapshot {
  return {
    id: record.id,
    tenantId: record.tenantId,
    entityType: record.entityType,
    externalId: record.externalId,
    amount: record.amount,
    dueDate: record.dueDate,
    status: record.status,
    counterpartyId: record.counterpartyId,
    counterpartyName: record.counterpartyName,
    attributes: record.attributes,
    sourceVersion: record.sourceVersion,
    syncSource: record.syncSource,
  };
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Attributes with a null value are dropped so "absent" has one spelling,
 * and keys are sorted so stored JSON is stable.
 */
export function normalizeAttributes(attributes: Attributes): Attributes {
  const out: Attributes = {};
  for (const key of Object.keys(attributes).sort()) {
    const value = attributes[key];
    if (value !== undefined && value !== null) {
      out[key] = Array.isArray(value) ? [...value] : value;
    }
  }
  return out;
}

export function normalizeEntity(entity: CanonicalEntity): CanonicalEntity {
  return {
    ...entity,
    amount:
      entity.amount === null ? null : Math.round(entity.amount * 100) / 100,
    attributes: normalizeAttributes(entity.attributes),
  };
}

export function serializeAttributes(attributes: Attributes): string {
  return JSON.stringify(normalizeAttributes(attributes));
}

// ============================================================================
// Diffing
// ============================================================================

const CONTENT_FIELDS = [
  "amount",
  "dueDate",
  "status",
  "counterpartyId",
  "counterpartyName",
] as const;

const PROVENANCE_FIELDS = [
  "externalId",
  "sourceVersion",
  "syncSource",
] as const;

const ATTRIBUTE_PREFIX = "attributes.";

function sameValue(a: AttributeValue, b: AttributeValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => v === b[i]);
  }
  return a === b;
}

/**
 * Field-level diff between two snapshots. Attribute keys are flattened to
 * `attributes.<key>`; a removed attribute diffs to null.
 */
export function diffSnapshots(
  before: MirrorSnapshot | null,
  after: MirrorSnapshot
): FieldDiff {
  const diff: FieldDiff = {};

  for (const field of [...CONTENT_FIELDS, ...PROVENANCE_FIELDS]) {
    const from = before === null ? null : before[field];
    const to = after[field];
    if (!sameValue(from, to)) {
      diff[field] = { from, to };
    }
  }

  const beforeAttrs = before?.attributes ?? {};
  const keys = new Set([
    ...Object.keys(beforeAttrs),
    ...Object.keys(after.attributes),
  ]);
  for (const key of [...keys].sort()) {
    const from = beforeAttrs[key] ?? null;
    const to = after.attributes[key] ?? null;
    if (!sameValue(from, to)) {
      diff[`${ATTRIBUTE_PREFIX}${key}`] = { from, to };
    }
  }

  return diff;
}

/**
 * Apply a diff to a snapshot, producing the next snapshot
 */
export function applyDiff(
  snapshot: MirrorSnapshot,
  diff: FieldDiff
): MirrorSnapshot {
  const next: MirrorSnapshot = {
    ...snapshot,
    attributes: { ...snapshot.attributes },
  };

  for (const [key, change] of Object.entries(diff)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      const attr = key.slice(ATTRIBUTE_PREFIX.length);
      if (change.to === null) {
        delete next.attributes[attr];
      } else {
        next.attributes[attr] = change.to;
      }
      continue;
    }
    assignField(next, key, change.to);
  }

  next.attributes = normalizeAttributes(next.attributes);
  return next;
}

function asNullableString(value: AttributeValue, field: string): string | null {
  if (value === null || typeof value === "string") {
    return value;
  }
  throw new PersistenceError(`Diff value for ${field} is not a string`);
}

function assignField(
  target: MirrorSnapshot,
  field: string,
  value: AttributeValue
): void {
  switch (field) {
    case "amount":
      if (value !== null && typeof value !== "number") {
        throw new PersistenceError("Diff value for amount is not a number");
      }
      target.amount = value;
      return;
    case "status": {
      const status = asNullableString(value, field);
      if (status === null) {
        throw new PersistenceError("Diff value for status is null");
      }
      target.status = status;
      return;
    }
    case "syncSource":
      if (typeof value !== "string") {
        throw new PersistenceError("Diff value for syncSource is invalid");
      }
      target.syncSource = toChangeSource(value);
      return;
    case "dueDate":
      target.dueDate = asNullableString(value, field);
      return;
    case "counterpartyId":
      target.counterpartyId = asNullableString(value, field);
      return;
    case "counterpartyName":
      target.counterpartyName = asNullableString(value, field);
      return;
    case "externalId":
      target.externalId = asNullableString(value, field);
      return;
    case "sourceVersion":
      target.sourceVersion = asNullableString(value, field);
      return;
    default:
      throw new PersistenceError(`Unknown diff field "${field}"`);
  }
}

/**
 * True when two snapshots describe the same logged state
 */
export function snapshotsEqual(a: MirrorSnapshot, b: MirrorSnapshot): boolean {
  return (
    a.id === b.id &&
    a.tenantId === b.tenantId &&
    a.entityType === b.entityType &&
    Object.keys(diffSnapshots(a, b)).length === 0
  );
}

// ============================================================================
// Change Classification
// ============================================================================

export type ChangeKind = OperationKind | "unchanged";

/**
 * - no prior row: created
 * - status moves to deleted: deleted
 * - any content field or attribute changed: updated
 * - only provenance (external id, version, source) changed: synced
 */
export function classifyChange(
  before: MirrorSnapshot | null,
  after: MirrorSnapshot,
  deletedStatus: string
): ChangeKind {
  if (before === null) {
    return "created";
  }

  const diff = diffSnapshots(before, after);
  const fields = Object.keys(diff);
  if (fields.length === 0) {
    return "unchanged";
  }

  if (after.status === deletedStatus && before.status !== deletedStatus) {
    return "deleted";
  }

  const provenance: readonly string[] = PROVENANCE_FIELDS;
  if (fields.every((f) => provenance.includes(f))) {
    return "synced";
  }
  return "updated";
}
