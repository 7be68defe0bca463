/**
 * QuickBooks Online ledger rail (read-only)
 *
 * Fetches through the query endpoint, incrementally by
 * MetaData.LastUpdatedTime, and maps bills, invoices, vendors, bill
 * payments and bank/credit-card account balances to canonical entities.
 * The query endpoint never returns removed entities; those come from the
 * change-data-capture endpoint and from webhook Delete operations.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { railLogger } from "../../logger.js";
import {
  compareCursor,
  decodeCursor,
  encodeCursor,
  type CursorPayload,
} from "../../utils/pagination.js";
import { FatalSyncError, MappingError } from "../sync/errors.js";

import type {
  DeletionRequest,
  FetchPage,
  FetchPageRequest,
  LedgerRailService,
  RailContext,
  RailRecord,
  RemoteDeletion,
  TokenGrant,
} from "./types.js";
import {
  ENTITY_TYPES,
  type CanonicalEntity,
  type EntityType,
  type RailCredential,
} from "../../types/index.js";

// ============================================================================
// Payload Schemas
// ============================================================================

const RefSchema = Type.Object({
  value: Type.String(),
  name: Type.Optional(Type.String()),
});

const MetaDataSchema = Type.Object({
  LastUpdatedTime: Type.String(),
  CreateTime: Type.Optional(Type.String()),
});

const Base = {
  Id: Type.String({ minLength: 1 }),
  SyncToken: Type.String(),
  MetaData: MetaDataSchema,
  /** Present on change-data-capture payloads for removed entities */
  status: Type.Optional(Type.String()),
};

const ExpenseLineSchema = Type.Object({
  Amount: Type.Optional(Type.Number()),
  AccountBasedExpenseLineDetail: Type.Optional(
    Type.Object({ AccountRef: Type.Optional(RefSchema) })
  ),
});

export const QboBillSchema = Type.Object({
  ...Base,
  TotalAmt: Type.Number(),
  Balance: Type.Optional(Type.Number()),
  DueDate: Type.Optional(Type.String()),
  TxnDate: Type.Optional(Type.String()),
  DocNumber: Type.Optional(Type.String()),
  VendorRef: Type.Optional(RefSchema),
  CurrencyRef: Type.Optional(RefSchema),
  Line: Type.Optional(Type.Array(ExpenseLineSchema)),
});

export const QboInvoiceSchema = Type.Object({
  ...Base,
  TotalAmt: Type.Number(),
  Balance: Type.Optional(Type.Number()),
  DueDate: Type.Optional(Type.String()),
  TxnDate: Type.Optional(Type.String()),
  DocNumber: Type.Optional(Type.String()),
  CustomerRef: Type.Optional(RefSchema),
  CurrencyRef: Type.Optional(RefSchema),
  EmailStatus: Type.Optional(Type.String()),
});

export const QboVendorSchema = Type.Object({
  ...Base,
  DisplayName: Type.String(),
  CompanyName: Type.Optional(Type.String()),
  Active: Type.Optional(Type.Boolean()),
  Balance: Type.Optional(Type.Number()),
  PrimaryEmailAddr: Type.Optional(Type.Object({ Address: Type.String() })),
  TermRef: Type.Optional(RefSchema),
});

export const QboBillPaymentSchema = Type.Object({
  ...Base,
  TotalAmt: Type.Number(),
  TxnDate: Type.Optional(Type.String()),
  DocNumber: Type.Optional(Type.String()),
  PayType: Type.Optional(Type.String()),
  VendorRef: Type.Optional(RefSchema),
  CurrencyRef: Type.Optional(RefSchema),
  Line: Type.Optional(
    Type.Array(
      Type.Object({
        Amount: Type.Optional(Type.Number()),
        LinkedTxn: Type.Optional(
          Type.Array(
            Type.Object({ TxnId: Type.String(), TxnType: Type.String() })
          )
        ),
      })
    )
  ),
});

export const QboAccountSchema = Type.Object({
  ...Base,
  Name: Type.String(),
  AccountType: Type.String(),
  AccountSubType: Type.Optional(Type.String()),
  CurrentBalance: Type.Number(),
  Active: Type.Optional(Type.Boolean()),
  CurrencyRef: Type.Optional(RefSchema),
});

const QueryResponseSchema = Type.Object({
  QueryResponse: Type.Record(Type.String(), Type.Unknown()),
});

const IdentitySchema = Type.Object({
  Id: Type.String({ minLength: 1 }),
  MetaData: MetaDataSchema,
});

const CdcResponseSchema = Type.Object({
  CDCResponse: Type.Array(
    Type.Object({
      QueryResponse: Type.Optional(
        Type.Array(Type.Record(Type.String(), Type.Unknown()))
      ),
    })
  ),
});

const CdcEntitySchema = Type.Object({
  Id: Type.String({ minLength: 1 }),
  status: Type.Optional(Type.String()),
  MetaData: Type.Optional(MetaDataSchema),
});

const TokenResponseSchema = Type.Object({
  access_token: Type.String({ minLength: 1 }),
  refresh_token: Type.Optional(Type.String({ minLength: 1 })),
  expires_in: Type.Optional(Type.Number()),
});

type QboBill = Static<typeof QboBillSchema>;
type QboInvoice = Static<typeof QboInvoiceSchema>;
type QboVendor = Static<typeof QboVendorSchema>;
type QboBillPayment = Static<typeof QboBillPaymentSchema>;
type QboAccount = Static<typeof QboAccountSchema>;

// ============================================================================
// Constants
// ============================================================================

export const QBO_ENTITY_NAMES = {
  bill: "Bill",
  invoice: "Invoice",
  vendor: "Vendor",
  payment: "BillPayment",
  balance: "Account",
} as const satisfies Record<EntityType, string>;

const EXTRA_FILTERS: Partial<Record<EntityType, string>> = {
  balance: "AccountType IN ('Bank', 'Credit Card')",
};

const EPOCH = "1970-01-01T00:00:00.000Z";

// Bounded scan over tied timestamps before giving up on a page
const MAX_TIE_SCAN_PAGES = 20;

// ============================================================================
// Helpers
// ============================================================================

function toUtcIso(value: string): string | null {
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

function identify(payload: unknown): CursorPayload | null {
  if (!Value.Check(IdentitySchema, payload)) {
    return null;
  }
  const updatedAt = toUtcIso(payload.MetaData.LastUpdatedTime);
  return updatedAt === null ? null : { sortValue: updatedAt, id: payload.Id };
}

export function buildQuery(
  entityType: EntityType,
  since: string | null,
  startPosition: number,
  pageSize: number
): string {
  const clauses = [
    `Metadata.LastUpdatedTime >= '${since ?? EPOCH}'`,
    EXTRA_FILTERS[entityType],
  ].filter((c): c is string => c !== undefined);

  return [
    `select * from ${QBO_ENTITY_NAMES[entityType]}`,
    `where ${clauses.join(" and ")}`,
    "orderby Metadata.LastUpdatedTime",
    `startposition ${String(startPosition)}`,
    `maxresults ${String(pageSize)}`,
  ].join(" ");
}

function requireRealm(credential: RailCredential): string {
  if (credential.accountId === null || credential.accountId === "") {
    throw new FatalSyncError(
      "QuickBooks credential has no realm id",
      "configuration"
    );
  }
  return credential.accountId;
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
    `Unexpected QuickBooks ${what} payload`,
    identify(payload)?.id ?? null,
    details
  );
}

function openStatus(total: number, balance: number): string {
  if (balance <= 0) {
    return "paid";
  }
  return balance < total ? "partially_paid" : "open";
}

function isDeleted(status: string | undefined): boolean {
  return status?.toLowerCase() === "deleted";
}

// ============================================================================
// Mapping
// ============================================================================

export function mapBill(bill: QboBill): CanonicalEntity {
  const balance = bill.Balance ?? bill.TotalAmt;
  const vendorId = bill.VendorRef?.value ?? null;
  const dueDate = bill.DueDate ?? null;
  const status = isDeleted(bill.status)
    ? "deleted"
    : openStatus(bill.TotalAmt, balance);
  const categoryHint =
    bill.Line?.find((l) => l.AccountBasedExpenseLineDetail?.AccountRef)
      ?.AccountBasedExpenseLineDetail?.AccountRef?.name ?? null;

  return {
    entityType: "bill",
    externalId: bill.Id,
    amount: bill.TotalAmt,
    dueDate,
    status,
    counterpartyId: vendorId,
    counterpartyName: bill.VendorRef?.name ?? null,
    attributes: {
      docNumber: bill.DocNumber ?? null,
      txnDate: bill.TxnDate ?? null,
      openBalance: balance,
      currency: bill.CurrencyRef?.value ?? null,
      categoryHint,
      payable:
        status !== "deleted" &&
        balance > 0 &&
        bill.TotalAmt > 0 &&
        vendorId !== null &&
        dueDate !== null,
    },
    sourceVersion: bill.SyncToken,
  };
}

export function mapInvoice(invoice: QboInvoice): CanonicalEntity {
  const balance = invoice.Balance ?? invoice.TotalAmt;
  return {
    entityType: "invoice",
    externalId: invoice.Id,
    amount: invoice.TotalAmt,
    dueDate: invoice.DueDate ?? null,
    status: isDeleted(invoice.status)
      ? "deleted"
      : openStatus(invoice.TotalAmt, balance),
    counterpartyId: invoice.CustomerRef?.value ?? null,
    counterpartyName: invoice.CustomerRef?.name ?? null,
    attributes: {
      docNumber: invoice.DocNumber ?? null,
      txnDate: invoice.TxnDate ?? null,
      openBalance: balance,
      currency: invoice.CurrencyRef?.value ?? null,
      emailStatus: invoice.EmailStatus ?? null,
    },
    sourceVersion: invoice.SyncToken,
  };
}

export function mapVendor(vendor: QboVendor): CanonicalEntity {
  let status = vendor.Active === false ? "inactive" : "active";
  if (isDeleted(vendor.status)) {
    status = "deleted";
  }
  return {
    entityType: "vendor",
    externalId: vendor.Id,
    amount: vendor.Balance ?? null,
    dueDate: null,
    status,
    counterpartyId: vendor.Id,
    counterpartyName: vendor.DisplayName,
    attributes: {
      companyName: vendor.CompanyName ?? null,
      email: vendor.PrimaryEmailAddr?.Address ?? null,
      terms: vendor.TermRef?.name ?? null,
    },
    sourceVersion: vendor.SyncToken,
  };
}

export function mapBillPayment(payment: QboBillPayment): CanonicalEntity {
  const linkedBillIds = (payment.Line ?? [])
    .flatMap((line) => line.LinkedTxn ?? [])
    .filter((txn) => txn.TxnType === "Bill")
    .map((txn) => txn.TxnId);

  return {
    entityType: "payment",
    externalId: payment.Id,
    amount: payment.TotalAmt,
    dueDate: null,
    status: isDeleted(payment.status) ? "deleted" : "paid",
    counterpartyId: payment.VendorRef?.value ?? null,
    counterpartyName: payment.VendorRef?.name ?? null,
    attributes: {
      docNumber: payment.DocNumber ?? null,
      txnDate: payment.TxnDate ?? null,
      payType: payment.PayType ?? null,
      currency: payment.CurrencyRef?.value ?? null,
      linkedBillIds,
    },
    sourceVersion: payment.SyncToken,
  };
}

export function mapAccount(account: QboAccount): CanonicalEntity {
  let status = account.Active === false ? "inactive" : "active";
  if (isDeleted(account.status)) {
    status = "deleted";
  }
  return {
    entityType: "balance",
    externalId: account.Id,
    amount: account.CurrentBalance,
    dueDate: null,
    status,
    counterpartyId: null,
    counterpartyName: null,
    attributes: {
      name: account.Name,
      accountType: account.AccountType,
      accountSubType: account.AccountSubType ?? null,
      currency: account.CurrencyRef?.value ?? null,
    },
    sourceVersion: account.SyncToken,
  };
}

export function mapQuickbooksEntity(
  entityType: EntityType,
  payload: unknown
): CanonicalEntity {
  switch (entityType) {
    case "bill":
      return mapBill(check(QboBillSchema, payload, "bill"));
    case "invoice":
      return mapInvoice(check(QboInvoiceSchema, payload, "invoice"));
    case "vendor":
      return mapVendor(check(QboVendorSchema, payload, "vendor"));
    case "payment":
      return mapBillPayment(
        check(QboBillPaymentSchema, payload, "bill payment")
      );
    case "balance":
      return mapAccount(check(QboAccountSchema, payload, "account"));
  }
}

// ============================================================================
// Rail Factory
// ============================================================================

export interface QuickbooksOAuthConfig {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
}

export interface QuickbooksRailContext extends RailContext {
  /** App credentials for refreshing access tokens; omit to disable refresh */
  oauth?: QuickbooksOAuthConfig;
}

export function createQuickbooksRail(
  context: QuickbooksRailContext
): LedgerRailService {
  const { client, baseUrl, oauth } = context;

  async function queryPage(
    request: FetchPageRequest,
    since: string | null,
    startPosition: number
  ): Promise<unknown[]> {
    const realmId = requireRealm(request.credential);
    const query = buildQuery(
      request.entityType,
      since,
      startPosition,
      request.pageSize
    );
    const body = await client.call(
      `${baseUrl}/${encodeURIComponent(realmId)}/query`,
      { query, minorversion: 70 },
      request.credential,
      { signal: request.signal }
    );

    if (!Value.Check(QueryResponseSchema, body)) {
      throw new MappingError("QuickBooks query response has no QueryResponse");
    }
    const rows = body.QueryResponse[QBO_ENTITY_NAMES[request.entityType]];
    if (rows === undefined) {
      return [];
    }
    if (!Array.isArray(rows)) {
      throw new MappingError("QuickBooks query response rows are not a list");
    }
    return rows;
  }

  /**
   * One page past the cursor, ordered by (LastUpdatedTime, Id).
   *
   * The API orders by time only, so when a page is full the records tied
   * at its last timestamp are held back for the next call. A full page with
   * nothing newer than the cursor steps STARTPOSITION forward.
   */
  async function fetch(request: FetchPageRequest): Promise<FetchPage> {
    const after =
      request.cursor === null ? null : decodeCursor(request.cursor);
    if (request.cursor !== null && after === null) {
      railLogger.warn(
        { tenantId: request.tenantId, entityType: request.entityType },
        "Unreadable QuickBooks cursor, restarting from the beginning"
      );
    }
    const since = after === null ? null : String(after.sortValue);

    let startPosition = 1;
    for (let scan = 0; scan < MAX_TIE_SCAN_PAGES; scan++) {
      const rows = await queryPage(request, since, startPosition);
      const full = rows.length === request.pageSize;

      const unreadable: RailRecord[] = [];
      const positioned: { position: CursorPayload; payload: unknown }[] = [];
      for (const payload of rows) {
        const position = identify(payload);
        if (position === null) {
          unreadable.push({
            externalId: null,
            occurredAt: null,
            cursorAfter: null,
            payload,
          });
        } else if (after === null || compareCursor(position, after) > 0) {
          positioned.push({ position, payload });
        }
      }
      positioned.sort((a, b) => compareCursor(a.position, b.position));

      let selected = positioned;
      const lastTime = positioned.at(-1)?.position.sortValue;
      if (full && lastTime !== undefined) {
        const older = positioned.filter(
          (p) => p.position.sortValue !== lastTime
        );
        if (older.length > 0) {
          selected = older;
        }
      }

      if (full && selected.length === 0 && unreadable.length === 0) {
        startPosition += request.pageSize;
        continue;
      }

      const records: RailRecord[] = [
        ...unreadable,
        ...selected.map(({ position, payload }) => ({
          externalId: position.id,
          occurredAt: String(position.sortValue),
          cursorAfter: encodeCursor(position),
          payload,
        })),
      ];
      return { records, hasMore: full };
    }

    railLogger.warn(
      { tenantId: request.tenantId, entityType: request.entityType },
      "QuickBooks tie scan limit reached"
    );
    return { records: [], hasMore: false };
  }

  /**
   * Removed entities changed since the cursor's timestamp, from the
   * change-data-capture endpoint. A first sync has nothing to remove.
   */
  async function fetchDeletions(
    request: DeletionRequest
  ): Promise<RemoteDeletion[]> {
    const after =
      request.cursor === null ? null : decodeCursor(request.cursor);
    if (after === null) {
      return [];
    }

    const realmId = requireRealm(request.credential);
    const entityName = QBO_ENTITY_NAMES[request.entityType];
    const body = await client.call(
      `${baseUrl}/${encodeURIComponent(realmId)}/cdc`,
      {
        entities: entityName,
        changedSince: String(after.sortValue),
        minorversion: 70,
      },
      request.credential,
      { signal: request.signal, cache: false }
    );

    if (!Value.Check(CdcResponseSchema, body)) {
      throw new MappingError("QuickBooks CDC response has no CDCResponse");
    }

    const deletions: RemoteDeletion[] = [];
    for (const response of body.CDCResponse) {
      for (const group of response.QueryResponse ?? []) {
        const rows = group[entityName];
        if (!Array.isArray(rows)) {
          continue;
        }
        for (const row of rows) {
          if (Value.Check(CdcEntitySchema, row) && isDeleted(row.status)) {
            deletions.push({
              externalId: row.Id,
              occurredAt:
                row.MetaData === undefined
                  ? null
                  : toUtcIso(row.MetaData.LastUpdatedTime),
            });
          }
        }
      }
    }
    return deletions;
  }

  async function refreshCredential(
    credential: RailCredential,
    signal?: AbortSignal
  ): Promise<TokenGrant> {
    if (oauth === undefined) {
      throw new FatalSyncError(
        "QuickBooks token refresh is not configured",
        "configuration"
      );
    }
    if (credential.refreshToken === null) {
      throw new FatalSyncError("QuickBooks credential has no refresh token", "auth");
    }

    const basic = Buffer.from(
      `${oauth.clientId}:${oauth.clientSecret}`
    ).toString("base64");
    const body = await client.call(oauth.tokenUrl, {}, credential, {
      method: "POST",
      form: {
        grant_type: "refresh_token",
        refresh_token: credential.refreshToken,
      },
      headers: { Authorization: `Basic ${basic}` },
      signal,
    });

    if (!Value.Check(TokenResponseSchema, body)) {
      throw new FatalSyncError(
        "QuickBooks token response has no access token",
        "auth"
      );
    }
    return {
      accessToken: body.access_token,
      refreshToken: body.refresh_token ?? null,
      expiresInSeconds: body.expires_in ?? null,
    };
  }

  const rail: LedgerRailService = {
    kind: "ledger",
    name: "quickbooks",
    entityTypes: ["bill", "invoice", "vendor", "payment", "balance"],
    fetch,
    fetchDeletions,
    map: mapQuickbooksEntity,
  };
  return oauth === undefined ? rail : { ...rail, refreshCredential };
}

// ============================================================================
// Webhooks
// ============================================================================

const WebhookSchema = Type.Object({
  eventNotifications: Type.Array(
    Type.Object({
      realmId: Type.String(),
      dataChangeEvent: Type.Optional(
        Type.Object({
          entities: Type.Array(
            Type.Object({
              name: Type.String(),
              id: Type.Optional(Type.String()),
              operation: Type.Optional(Type.String()),
              lastUpdated: Type.Optional(Type.String()),
            })
          ),
        })
      ),
    })
  ),
});

export interface QuickbooksDeletionNotice extends RemoteDeletion {
  entityType: EntityType;
}

export interface QuickbooksChangeNotice {
  realmId: string;
  /** Types to re-sync */
  entityTypes: EntityType[];
  /** Entities the ledger removed; a re-sync would never see them */
  deletions: QuickbooksDeletionNotice[];
}

/**
 * Reduce a change notification to the entity types touched per realm,
 * plus the entities it reports deleted. Returns null for a body that is
 * not a notification.
 */
export function parseQuickbooksWebhook(
  body: unknown
): QuickbooksChangeNotice[] | null {
  if (!Value.Check(WebhookSchema, body)) {
    return null;
  }

  const byName = new Map<string, EntityType>(
    ENTITY_TYPES.map((type) => [QBO_ENTITY_NAMES[type], type])
  );

  const notices = new Map<
    string,
    { types: Set<EntityType>; deletions: QuickbooksDeletionNotice[] }
  >();
  for (const notification of body.eventNotifications) {
    const notice = notices.get(notification.realmId) ?? {
      types: new Set<EntityType>(),
      deletions: [],
    };
    for (const entity of notification.dataChangeEvent?.entities ?? []) {
      const type = byName.get(entity.name);
      if (type === undefined) {
        continue;
      }
      if (entity.operation === "Delete" && entity.id !== undefined) {
        notice.deletions.push({
          entityType: type,
          externalId: entity.id,
          occurredAt:
            entity.lastUpdated === undefined
              ? null
              : toUtcIso(entity.lastUpdated),
        });
      } else {
        notice.types.add(type);
      }
    }
    notices.set(notification.realmId, notice);
  }

  return [...notices.entries()]
    .filter(([, n]) => n.types.size > 0 || n.deletions.length > 0)
    .map(([realmId, n]) => ({
      realmId,
      entityTypes: [...n.types].sort(),
      deletions: n.deletions,
    }));
}
