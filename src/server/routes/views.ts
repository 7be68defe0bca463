/**
 * View API Routes - DataOrchestrator read models and the approval workflow
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  TenantParamSchema,
  type TenantParam,
} from "../schemas/common.js";
import {
  ApprovalItemResponseSchema,
  ApprovalViewResponseSchema,
  HygieneViewResponseSchema,
} from "../schemas/responses.js";

import type { Services } from "../../services/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const DecisionParamsSchema = Type.Object({
  tenantId: Type.String({ minLength: 1 }),
  entityId: Type.String({ minLength: 1 }),
});

type DecisionParams = Static<typeof DecisionParamsSchema>;

const DecisionBodySchema = Type.Object({
  decision: Type.Union([
    Type.Literal("approved"),
    Type.Literal("rejected"),
    Type.Literal("pending"),
  ]),
  note: Type.Optional(Type.String({ maxLength: 1000 })),
});

type DecisionBody = Static<typeof DecisionBodySchema>;

const ActorHeadersSchema = Type.Object({
  "x-actor-id": Type.String({ minLength: 1 }),
});

type ActorHeaders = Static<typeof ActorHeadersSchema>;

// ============================================================================
// Route Registration
// ============================================================================

export function registerViewRoutes(
  app: FastifyInstance,
  services: Services
): void {
  const { hygiene, approvals } = services.views;

  // GET /tenants/:tenantId/views/hygiene
  app.get<{ Params: TenantParam }>(
    "/tenants/:tenantId/views/hygiene",
    {
      schema: {
        summary: "Data-quality issues",
        description:
          "Open bills and invoices with missing or suspicious data, split into urgent and upcoming",
        tags: ["Views"],
        params: TenantParamSchema,
        response: { 200: HygieneViewResponseSchema },
      },
    },
    async (request) => ({
      data: await hygiene.getView(request.params.tenantId),
    })
  );

  // GET /tenants/:tenantId/views/approvals
  app.get<{ Params: TenantParam }>(
    "/tenants/:tenantId/views/approvals",
    {
      schema: {
        summary: "Bills ready for approval",
        tags: ["Views"],
        params: TenantParamSchema,
        response: { 200: ApprovalViewResponseSchema },
      },
    },
    async (request) => ({
      data: await approvals.getView(request.params.tenantId),
    })
  );

  // PUT /tenants/:tenantId/views/approvals/:entityId - Record a decision
  app.put<{
    Params: DecisionParams;
    Body: DecisionBody;
    Headers: ActorHeaders;
  }>(
    "/tenants/:tenantId/views/approvals/:entityId",
    {
      schema: {
        summary: "Decide on a bill",
        tags: ["Views"],
        params: DecisionParamsSchema,
        headers: ActorHeadersSchema,
        body: DecisionBodySchema,
        response: { 200: ApprovalItemResponseSchema },
      },
    },
    async (request) => {
      const { tenantId, entityId } = request.params;
      const item = await approvals.decide(tenantId, {
        entityId,
        decision: request.body.decision,
        actorId: request.headers["x-actor-id"],
        note: request.body.note,
      });
      return { data: item };
    }
  );
}
