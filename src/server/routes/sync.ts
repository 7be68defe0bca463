/**
 * Sync API Routes
 *
 * Trigger sync runs, inspect run history and tenant health. Runs started
 * here go through the same lease and state machine as scheduled runs.
 */

import { Type, type Static } from "@sinclair/typebox";

import { publicMessageFor } from "../../services/sync/errors.js";
import {
  EntityTypeSchema,
  RailNameSchema,
  TenantKeyParamSchema,
  TenantParamSchema,
  TenantRailParamSchema,
  createResponseSchema,
  type TenantKeyParam,
  type TenantParam,
  type TenantRailParam,
} from "../schemas/common.js";
import {
  SyncRunListResponseSchema,
  TenantHealthResponseSchema,
  TriggerResponseSchema,
} from "../schemas/responses.js";

import type { SyncRunRow } from "../../db/types.js";
import type { Services } from "../../services/index.js";
import type { TriggerResult } from "../../services/sync/orchestrator.js";
import type { EntityType } from "../../types/index.js";
import type { SyncRunDto, TriggerResponseDto } from "../../types/api.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const TriggerBodySchema = Type.Object({
  entityTypes: Type.Optional(Type.Array(EntityTypeSchema, { minItems: 1 })),
  force: Type.Optional(Type.Boolean()),
});

type TriggerBody = Static<typeof TriggerBodySchema>;

const SingleTriggerBodySchema = Type.Object({
  force: Type.Optional(Type.Boolean()),
});

type SingleTriggerBody = Static<typeof SingleTriggerBodySchema>;

const SyncRunStatusSchema = Type.Union([
  Type.Literal("running"),
  Type.Literal("succeeded"),
  Type.Literal("failed_retryable"),
  Type.Literal("failed_fatal"),
  Type.Literal("cancelled"),
]);

const RunsQuerySchema = Type.Object({
  status: Type.Optional(SyncRunStatusSchema),
  rail: Type.Optional(RailNameSchema),
  entityType: Type.Optional(EntityTypeSchema),
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 200, default: 50 })),
  offset: Type.Optional(Type.Number({ minimum: 0, default: 0 })),
});

type RunsQuery = Static<typeof RunsQuerySchema>;

const CountResponseSchema = createResponseSchema(
  Type.Object({ count: Type.Number() })
);

// ============================================================================
// Helper Functions
// ============================================================================

export function formatRun(row: SyncRunRow): SyncRunDto {
  return {
    runId: row.run_id,
    rail: row.rail,
    entityType: row.entity_type,
    trigger: row.trigger,
    status: row.status,
    counters: {
      fetched: Number(row.fetched),
      created: Number(row.created),
      updated: Number(row.updated),
      synced: Number(row.synced),
      deleted: Number(row.deleted),
      unchanged: Number(row.unchanged),
      skipped: Number(row.skipped),
      logPending: Number(row.log_pending),
    },
    errorCode: row.error_code,
    message: publicMessageFor(row.error_code),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

export function formatTrigger(
  rail: string,
  entityType: EntityType,
  result: TriggerResult
): TriggerResponseDto {
  switch (result.outcome) {
    case "skipped":
      return {
        rail,
        entityType,
        outcome: result.outcome,
        runId: null,
        reason: result.reason,
      };
    case "failed":
      return {
        rail,
        entityType,
        outcome: result.outcome,
        runId: result.runId,
        reason: result.errorCode,
      };
    case "completed":
    case "cancelled":
      return {
        rail,
        entityType,
        outcome: result.outcome,
        runId: result.runId,
        reason: null,
      };
  }
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerSyncRoutes(
  app: FastifyInstance,
  services: Services
): void {
  const { orchestrator, runs } = services;

  // GET /tenants/:tenantId/health - Derived health per connection and key
  app.get<{ Params: TenantParam }>(
    "/tenants/:tenantId/health",
    {
      schema: {
        summary: "Tenant sync health",
        description:
          "Last successful sync time and derived health (ok, degraded, needs_attention) per rail and entity type",
        tags: ["Sync"],
        params: TenantParamSchema,
        response: { 200: TenantHealthResponseSchema },
      },
    },
    async (request) => {
      const health = await orchestrator.health(request.params.tenantId);
      return { data: health };
    }
  );

  // POST /tenants/:tenantId/sync/cancel - Abort every run in flight
  app.post<{ Params: TenantParam }>(
    "/tenants/:tenantId/sync/cancel",
    {
      schema: {
        summary: "Cancel tenant sync runs",
        tags: ["Sync"],
        params: TenantParamSchema,
        response: { 200: CountResponseSchema },
      },
    },
    (request) => {
      const count = orchestrator.cancelTenant(request.params.tenantId);
      return { data: { count } };
    }
  );

  // POST /tenants/:tenantId/sync/:rail/resolve - Clear failed state
  app.post<{ Params: TenantRailParam }>(
    "/tenants/:tenantId/sync/:rail/resolve",
    {
      schema: {
        summary: "Resolve failed sync keys",
        description:
          "Returns failed keys of a rail to idle once the cause (e.g. a revoked connection) is fixed",
        tags: ["Sync"],
        params: TenantRailParamSchema,
        response: { 200: CountResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, rail } = request.params;
      const count = await orchestrator.resolve(tenantId, rail);
      return { data: { count } };
    }
  );

  // POST /tenants/:tenantId/sync/:rail - Sync every (or selected) entity type
  app.post<{ Params: TenantRailParam; Body: TriggerBody }>(
    "/tenants/:tenantId/sync/:rail",
    {
      schema: {
        summary: "Trigger a rail sync",
        description:
          "Runs one sync per entity type, one after another. Keys whose lease is held are reported as skipped.",
        tags: ["Sync"],
        params: TenantRailParamSchema,
        body: TriggerBodySchema,
        response: { 200: TriggerResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, rail } = request.params;
      const results = await orchestrator.triggerAll(
        tenantId,
        rail,
        { source: "api", force: request.body.force === true },
        request.body.entityTypes
      );
      return {
        data: [...results.entries()].map(([entityType, result]) =>
          formatTrigger(rail, entityType, result)
        ),
      };
    }
  );

  // POST /tenants/:tenantId/sync/:rail/:entityType - Sync one key
  app.post<{ Params: TenantKeyParam; Body: SingleTriggerBody }>(
    "/tenants/:tenantId/sync/:rail/:entityType",
    {
      schema: {
        summary: "Trigger a single sync key",
        tags: ["Sync"],
        params: TenantKeyParamSchema,
        body: SingleTriggerBodySchema,
        response: { 200: TriggerResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, rail, entityType } = request.params;
      const result = await orchestrator.trigger(tenantId, rail, entityType, {
        source: "api",
        force: request.body.force === true,
      });
      return { data: [formatTrigger(rail, entityType, result)] };
    }
  );

  // GET /tenants/:tenantId/sync/runs - Run history, newest first
  app.get<{ Params: TenantParam; Querystring: RunsQuery }>(
    "/tenants/:tenantId/sync/runs",
    {
      schema: {
        summary: "List sync runs",
        tags: ["Sync"],
        params: TenantParamSchema,
        querystring: RunsQuerySchema,
        response: { 200: SyncRunListResponseSchema },
      },
    },
    async (request) => {
      const { status, rail, entityType, limit = 50, offset = 0 } =
        request.query;
      const rows = await runs.list(request.params.tenantId, {
        status,
        rail,
        entityType,
        limit,
        offset,
      });
      return { data: rows.map(formatRun) };
    }
  );
}
