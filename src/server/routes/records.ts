/**
 * Record API Routes
 *
 * Read the mirror and its transaction log, and apply user-originated
 * changes. Writes here go through MirrorStore, so each one is logged with
 * source "user" and the caller's actor id.
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  createPaginationMeta,
  parseLimit,
  validateCursor,
} from "../../utils/pagination.js";
import { NotFoundError, ValidationError } from "../plugins/error-handler.js";
import {
  NullableNumber,
  NullableString,
  RailNameSchema,
  TenantEntityParamSchema,
  TenantRecordParamSchema,
  type TenantEntityParam,
  type TenantRecordParam,
} from "../schemas/common.js";
import {
  HistoryResponseSchema,
  MirrorRecordListResponseSchema,
  MirrorRecordResponseSchema,
  VerifyResponseSchema,
  WriteResultResponseSchema,
} from "../schemas/responses.js";

import type { Services } from "../../services/index.js";
import type {
  Attributes,
  CanonicalEntity,
  EntityType,
  MirrorRecord,
  RailName,
} from "../../types/index.js";
import type { FastifyInstance, FastifyRequest } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const AttributeValueSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Null(),
  Type.Array(Type.String()),
]);

const RecordFieldsSchema = {
  externalId: Type.Optional(NullableString),
  amount: Type.Optional(NullableNumber),
  dueDate: Type.Optional(NullableString),
  counterpartyId: Type.Optional(NullableString),
  counterpartyName: Type.Optional(NullableString),
  attributes: Type.Optional(Type.Record(Type.String(), AttributeValueSchema)),
};

const CreateRecordBodySchema = Type.Object({
  ...RecordFieldsSchema,
  status: Type.String({ minLength: 1 }),
});

type CreateRecordBody = Static<typeof CreateRecordBodySchema>;

const UpdateRecordBodySchema = Type.Object({
  ...RecordFieldsSchema,
  status: Type.Optional(Type.String({ minLength: 1 })),
});

type UpdateRecordBody = Static<typeof UpdateRecordBodySchema>;

const ActorHeadersSchema = Type.Object({
  "x-actor-id": Type.String({ minLength: 1 }),
});

const ListRecordsQuerySchema = Type.Object({
  status: Type.Optional(Type.String()),
  dueBefore: Type.Optional(Type.String()),
  dueAfter: Type.Optional(Type.String()),
  counterpartyId: Type.Optional(Type.String()),
  minAmount: Type.Optional(Type.Number()),
  maxAmount: Type.Optional(Type.Number()),
  logPending: Type.Optional(Type.Boolean()),
  includeDeleted: Type.Optional(Type.Boolean()),
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 500, default: 100 })),
  cursor: Type.Optional(Type.String()),
});

type ListRecordsQuery = Static<typeof ListRecordsQuerySchema>;

const PushParamsSchema = Type.Object({
  ...TenantRecordParamSchema.properties,
  rail: RailNameSchema,
});

type PushParams = TenantRecordParam & { rail: RailName };

// ============================================================================
// Helper Functions
// ============================================================================

function actorOf(request: FastifyRequest): string {
  const actor = request.headers["x-actor-id"];
  if (typeof actor !== "string" || actor === "") {
    throw new ValidationError("Missing x-actor-id header");
  }
  return actor;
}

function toCanonical(record: MirrorRecord): CanonicalEntity {
  return {
    entityType: record.entityType,
    externalId: record.externalId,
    amount: record.amount,
    dueDate: record.dueDate,
    status: record.status,
    counterpartyId: record.counterpartyId,
    counterpartyName: record.counterpartyName,
    attributes: record.attributes,
    sourceVersion: record.sourceVersion,
  };
}

function mergeAttributes(
  base: Attributes,
  patch: Attributes | undefined
): Attributes {
  return patch === undefined ? base : { ...base, ...patch };
}

async function requireRecord(
  services: Services,
  tenantId: string,
  entityType: EntityType,
  entityId: string
): Promise<MirrorRecord> {
  const record = await services.mirror.getById(tenantId, entityType, entityId);
  if (record === null) {
    throw new NotFoundError(`No ${entityType} with id ${entityId}`);
  }
  return record;
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerRecordRoutes(
  app: FastifyInstance,
  services: Services
): void {
  const { mirror, log, orchestrator } = services;

  // GET /tenants/:tenantId/records/:entityType - Filtered mirror listing
  app.get<{ Params: TenantEntityParam; Querystring: ListRecordsQuery }>(
    "/tenants/:tenantId/records/:entityType",
    {
      schema: {
        summary: "List mirror records",
        description:
          "Ordered by due date (undated last) then id. Deleted records are excluded unless requested.",
        tags: ["Records"],
        params: TenantEntityParamSchema,
        querystring: ListRecordsQuerySchema,
        response: { 200: MirrorRecordListResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityType } = request.params;
      const query = request.query;
      const limit = parseLimit(query.limit, 100, 500);

      const cursor = validateCursor(query.cursor);
      if (query.cursor !== undefined && cursor === null) {
        throw new ValidationError("Invalid cursor");
      }
      const offset =
        typeof cursor?.sortValue === "number" ? cursor.sortValue : 0;

      const rows = await mirror.query(tenantId, entityType, {
        statuses: query.status?.split(",").filter((s) => s !== ""),
        dueBefore: query.dueBefore,
        dueAfter: query.dueAfter,
        counterpartyId: query.counterpartyId,
        minAmount: query.minAmount,
        maxAmount: query.maxAmount,
        logPending: query.logPending,
        includeDeleted: query.includeDeleted,
        limit: limit + 1,
        offset,
      });

      const hasMore = rows.length > limit;
      const items = hasMore ? rows.slice(0, limit) : rows;

      return {
        data: items,
        meta: {
          pagination: createPaginationMeta(
            items,
            limit,
            (item) => ({ sortValue: offset + items.length, id: item.id }),
            hasMore
          ),
        },
      };
    }
  );

  // GET /tenants/:tenantId/records/:entityType/verify - Replay oracle
  app.get<{ Params: TenantEntityParam }>(
    "/tenants/:tenantId/records/:entityType/verify",
    {
      schema: {
        summary: "Verify mirror against log replay",
        description:
          "Folds each record's history and reports records whose replayed state differs from the mirror",
        tags: ["Records"],
        params: TenantEntityParamSchema,
        response: { 200: VerifyResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityType } = request.params;
      return { data: await mirror.verify(tenantId, entityType) };
    }
  );

  // GET /tenants/:tenantId/records/:entityType/:entityId
  app.get<{ Params: TenantRecordParam }>(
    "/tenants/:tenantId/records/:entityType/:entityId",
    {
      schema: {
        summary: "Get a mirror record",
        tags: ["Records"],
        params: TenantRecordParamSchema,
        response: { 200: MirrorRecordResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityType, entityId } = request.params;
      return {
        data: await requireRecord(services, tenantId, entityType, entityId),
      };
    }
  );

  // GET /tenants/:tenantId/records/:entityType/:entityId/history
  app.get<{ Params: TenantRecordParam }>(
    "/tenants/:tenantId/records/:entityType/:entityId/history",
    {
      schema: {
        summary: "Record history",
        description: "Transaction log entries, oldest first",
        tags: ["Records"],
        params: TenantRecordParamSchema,
        response: { 200: HistoryResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityType, entityId } = request.params;
      await requireRecord(services, tenantId, entityType, entityId);
      return { data: await log.history(tenantId, entityId) };
    }
  );

  // POST /tenants/:tenantId/records/:entityType - Create locally
  app.post<{ Params: TenantEntityParam; Body: CreateRecordBody }>(
    "/tenants/:tenantId/records/:entityType",
    {
      schema: {
        summary: "Create a record locally",
        tags: ["Records"],
        params: TenantEntityParamSchema,
        headers: ActorHeadersSchema,
        body: CreateRecordBodySchema,
        response: { 201: WriteResultResponseSchema },
      },
    },
    async (request, reply) => {
      const { tenantId, entityType } = request.params;
      const body = request.body;

      const result = await mirror.applyLocalChange(
        tenantId,
        {
          entity: {
            entityType,
            externalId: body.externalId ?? null,
            amount: body.amount ?? null,
            dueDate: body.dueDate ?? null,
            status: body.status,
            counterpartyId: body.counterpartyId ?? null,
            counterpartyName: body.counterpartyName ?? null,
            attributes: body.attributes ?? {},
            sourceVersion: null,
          },
        },
        actorOf(request)
      );
      return reply.status(201).send({ data: result });
    }
  );

  // PATCH /tenants/:tenantId/records/:entityType/:entityId - Edit locally
  app.patch<{ Params: TenantRecordParam; Body: UpdateRecordBody }>(
    "/tenants/:tenantId/records/:entityType/:entityId",
    {
      schema: {
        summary: "Edit a record locally",
        description: "Fields left out keep their value; attributes merge",
        tags: ["Records"],
        params: TenantRecordParamSchema,
        headers: ActorHeadersSchema,
        body: UpdateRecordBodySchema,
        response: { 200: WriteResultResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityType, entityId } = request.params;
      const actorId = actorOf(request);
      const existing = await requireRecord(
        services,
        tenantId,
        entityType,
        entityId
      );
      const body = request.body;
      const current = toCanonical(existing);

      const result = await mirror.applyLocalChange(
        tenantId,
        {
          entityId,
          entity: {
            ...current,
            externalId: body.externalId ?? current.externalId,
            amount: body.amount !== undefined ? body.amount : current.amount,
            dueDate:
              body.dueDate !== undefined ? body.dueDate : current.dueDate,
            status: body.status ?? current.status,
            counterpartyId:
              body.counterpartyId !== undefined
                ? body.counterpartyId
                : current.counterpartyId,
            counterpartyName:
              body.counterpartyName !== undefined
                ? body.counterpartyName
                : current.counterpartyName,
            attributes: mergeAttributes(current.attributes, body.attributes),
          },
        },
        actorId
      );
      return { data: result };
    }
  );

  // DELETE /tenants/:tenantId/records/:entityType/:entityId - Soft delete
  app.delete<{ Params: TenantRecordParam }>(
    "/tenants/:tenantId/records/:entityType/:entityId",
    {
      schema: {
        summary: "Soft-delete a record",
        tags: ["Records"],
        params: TenantRecordParamSchema,
        headers: ActorHeadersSchema,
        response: { 200: WriteResultResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityType, entityId } = request.params;
      const result = await mirror.markDeleted(tenantId, entityType, entityId, {
        source: "user",
        occurredAt: services.now().toISOString(),
        actorId: actorOf(request),
      });
      return { data: result };
    }
  );

  // POST /tenants/:tenantId/records/:entityType/:entityId/push/:rail
  app.post<{ Params: PushParams }>(
    "/tenants/:tenantId/records/:entityType/:entityId/push/:rail",
    {
      schema: {
        summary: "Push a local record to an execution rail",
        description:
          "Creates or updates the record on the rail with an idempotency key, then folds the rail's answer back into the mirror",
        tags: ["Records"],
        params: PushParamsSchema,
        headers: ActorHeadersSchema,
        response: { 200: WriteResultResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityType, entityId, rail } = request.params;
      const result = await orchestrator.pushLocalChange({
        tenantId,
        rail,
        entityType,
        entityId,
        actorId: actorOf(request),
      });
      return { data: result };
    }
  );
}
