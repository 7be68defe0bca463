/**
 * Bill-pay execution rail
 *
 * Mirrors payments and payee vendors from a cursor-paginated REST API and
 * pushes locally created payments outward with an idempotency key.
 */

import { createHash } from "node:crypto";

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  compareCursor,
  decodeCursor,
  encodeCursor,
  type CursorPayload,
} from "../../utils/pagination.js";
import { FatalSyncError, MappingError } from "../sync/errors.js";

import type {
  ExecutionRailService,
  FetchPage,
  FetchPageRequest,
  PushRequest,
  PushResult,
  RailContext,
  RailRecord,
} from "./types.js";
import type { CanonicalEntity, EntityType } from "../../types/index.js";

// ============================================================================
// Payload Schemas
// ============================================================================

const PAYMENT_STATUSES = [
  "scheduled",
  "processing",
  "paid",
  "failed",
  "cancelled",
] as const;

export const BillpayPaymentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  vendor_id: Type.String(),
  vendor_name: Type.Optional(Type.String()),
  amount_cents: Type.Integer(),
  currency: Type.String(),
  status: Type.Union(PAYMENT_STATUSES.map((s) => Type.Literal(s))),
  scheduled_date: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  bill_external_id: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  method: Type.Optional(Type.String()),
  deleted: Type.Optional(Type.Boolean()),
  updated_at: Type.String(),
  version: Type.Integer(),
});

export const BillpayVendorSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  email: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  payment_method: Type.Optional(Type.String()),
  status: Type.Union([Type.Literal("active"), Type.Literal("inactive")]),
  deleted: Type.Optional(Type.Boolean()),
  updated_at: Type.String(),
  version: Type.Integer(),
});

const ListResponseSchema = Type.Object({
  data: Type.Array(Type.Unknown()),
  has_more: Type.Boolean(),
});

const IdentitySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  updated_at: Type.String(),
});

type BillpayPayment = Static<typeof BillpayPaymentSchema>;
type BillpayVendor = Static<typeof BillpayVendorSchema>;

const RESOURCES: Partial<Record<EntityType, string>> = {
  payment: "payments",
  vendor: "vendors",
};

// ============================================================================
// Helpers
// ============================================================================

function identify(payload: unknown): CursorPayload | null {
  if (!Value.Check(IdentitySchema, payload)) {
    return null;
  }
  const time = Date.parse(payload.updated_at);
  if (Number.isNaN(time)) {
    return null;
  }
  return { sortValue: new Date(time).toISOString(), id: payload.id };
}

function check<T extends TSchema>(
  schema: T,
  payload: unknown,
  what: string
): Static<T> {
  if (Value.Check(schema, payload)) {
    return payload;
  }
  const details = [...Value.Errors(schema, payload)]
    .slice(0, 5)
    .map((e) => `${e.path}: ${e.message}`);
  throw new MappingError(
    `Unexpected bill-pay ${what} payload`,
    identify(payload)?.id ?? null,
    details
  );
}

/**
 * Stable per (record, local revision): retrying one push reuses the key,
 * a later edit gets a new one.
 */
export function pushIdempotencyKey(
  tenantId: string,
  entityId: string,
  revision: string
): string {
  return createHash("sha256")
    .update(`${tenantId}|${entityId}|${revision}`)
    .digest("hex");
}

// ============================================================================
// Mapping
// ============================================================================

export function mapPayment(payment: BillpayPayment): CanonicalEntity {
  return {
    entityType: "payment",
    externalId: payment.id,
    amount: payment.amount_cents / 100,
    dueDate: payment.scheduled_date ?? null,
    status: payment.deleted === true ? "deleted" : payment.status,
    counterpartyId: payment.vendor_id,
    counterpartyName: payment.vendor_name ?? null,
    attributes: {
      currency: payment.currency,
      ledgerBillId: payment.bill_external_id ?? null,
      method: payment.method ?? null,
    },
    sourceVersion: String(payment.version),
  };
}

export function mapPayee(vendor: BillpayVendor): CanonicalEntity {
  return {
    entityType: "vendor",
    externalId: vendor.id,
    amount: null,
    dueDate: null,
    status: vendor.deleted === true ? "deleted" : vendor.status,
    counterpartyId: vendor.id,
    counterpartyName: vendor.name,
    attributes: {
      email: vendor.email ?? null,
      paymentMethod: vendor.payment_method ?? null,
    },
    sourceVersion: String(vendor.version),
  };
}

export function mapBillpayEntity(
  entityType: EntityType,
  payload: unknown
): CanonicalEntity {
  switch (entityType) {
    case "payment":
      return mapPayment(check(BillpayPaymentSchema, payload, "payment"));
    case "vendor":
      return mapPayee(check(BillpayVendorSchema, payload, "vendor"));
    default:
      throw new FatalSyncError(
        `Bill-pay rail does not carry ${entityType} records`,
        "unsupported"
      );
  }
}

/**
 * Request body for creating or updating a payment from a mirror record
 */
export function toPaymentRequest(
  request: PushRequest
): Record<string, string | number | null> {
  const { record } = request;
  if (record.entityType !== "payment") {
    throw new FatalSyncError(
      `Cannot push ${record.entityType} to bill-pay`,
      "unsupported"
    );
  }
  if (record.amount === null || record.amount <= 0) {
    throw new FatalSyncError("Payment amount must be positive", "validation");
  }
  if (record.counterpartyId === null) {
    throw new FatalSyncError("Payment has no payee vendor", "validation");
  }

  const currency = record.attributes.currency;
  const ledgerBillId = record.attributes.ledgerBillId;
  return {
    vendor_id: record.counterpartyId,
    amount_cents: Math.round(record.amount * 100),
    currency: typeof currency === "string" ? currency : "USD",
    scheduled_date: record.dueDate,
    bill_external_id: typeof ledgerBillId === "string" ? ledgerBillId : null,
  };
}

// ============================================================================
// Rail Factory
// ============================================================================

export function createBillpayRail(context: RailContext): ExecutionRailService {
  const { client, baseUrl } = context;

  async function fetch(request: FetchPageRequest): Promise<FetchPage> {
    const resource = RESOURCES[request.entityType];
    if (resource === undefined) {
      throw new FatalSyncError(
        `Bill-pay rail does not carry ${request.entityType} records`,
        "unsupported"
      );
    }

    const after =
      request.cursor === null ? null : decodeCursor(request.cursor);

    const body = await client.call(
      `${baseUrl}/${resource}`,
      {
        limit: request.pageSize,
        updated_since: after === null ? undefined : String(after.sortValue),
        starting_after: after?.id,
      },
      request.credential,
      { signal: request.signal }
    );

    if (!Value.Check(ListResponseSchema, body)) {
      throw new MappingError(`Unexpected bill-pay ${resource} list response`);
    }

    const records: RailRecord[] = [];
    for (const payload of body.data) {
      const position = identify(payload);
      if (position === null) {
        records.push({
          externalId: null,
          occurredAt: null,
          cursorAfter: null,
          payload,
        });
        continue;
      }
      if (after !== null && compareCursor(position, after) <= 0) {
        continue;
      }
      records.push({
        externalId: position.id,
        occurredAt: String(position.sortValue),
        cursorAfter: encodeCursor(position),
        payload,
      });
    }

    return { records, hasMore: body.has_more };
  }

  async function push(request: PushRequest): Promise<PushResult> {
    const body = toPaymentRequest(request);
    const { record } = request;
    const endpoint =
      record.externalId === null
        ? `${baseUrl}/payments`
        : `${baseUrl}/payments/${encodeURIComponent(record.externalId)}`;

    const response = await client.call(endpoint, {}, request.credential, {
      method: "POST",
      body,
      idempotencyKey: pushIdempotencyKey(
        request.tenantId,
        record.id,
        record.updatedAt
      ),
      signal: request.signal,
    });

    const payment = check(BillpayPaymentSchema, response, "payment");
    return {
      entity: mapPayment(payment),
      occurredAt: new Date(Date.parse(payment.updated_at)).toISOString(),
    };
  }

  return {
    kind: "execution",
    name: "billpay",
    entityTypes: ["payment", "vendor"],
    pushableTypes: ["payment"],
    fetch,
    map: mapBillpayEntity,
    push,
  };
}

// ============================================================================
// Webhooks
// ============================================================================

const BillpayEventSchema = Type.Object({
  type: Type.String(),
  account_id: Type.String({ minLength: 1 }),
  data: Type.Optional(Type.Object({ id: Type.Optional(Type.String()) })),
});

export interface BillpayChangeNotice {
  accountId: string;
  entityType: EntityType;
}

const EVENT_PREFIXES = new Map<string, EntityType>([
  ["payment", "payment"],
  ["vendor", "vendor"],
]);

/**
 * `payment.updated`, `vendor.created`, ... reduced to the entity type
 * touched. Returns null for an unknown or malformed event.
 */
export function parseBillpayWebhook(body: unknown): BillpayChangeNotice | null {
  if (!Value.Check(BillpayEventSchema, body)) {
    return null;
  }
  const prefix = body.type.split(".")[0] ?? "";
  const entityType = EVENT_PREFIXES.get(prefix);
  if (entityType === undefined) {
    return null;
  }
  return { accountId: body.account_id, entityType };
}
