/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Ledger Mirror Sync API",
        description:
          "Tenant-scoped mirror of accounting and bill-pay data. Every change to a mirrored " +
          "record is written to an append-only transaction log, and sync runs against each " +
          "rail are tracked per tenant, rail and entity type.",
        version: "0.1.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Health",
          description: "Service liveness",
        },
        {
          name: "Sync",
          description:
            "Trigger sync runs, inspect per-key state, run history and tenant health",
        },
        {
          name: "Records",
          description:
            "Mirror records, their transaction log history and local changes",
        },
        {
          name: "Views",
          description: "Use-case views built from the mirror (hygiene, approvals)",
        },
        {
          name: "Webhooks",
          description: "Signed change notifications from rails",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
