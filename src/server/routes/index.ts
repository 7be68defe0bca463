/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerRecordRoutes } from "./records.js";
import { registerSyncRoutes } from "./sync.js";
import { registerViewRoutes } from "./views.js";
import { registerWebhookRoutes } from "./webhooks.js";

import type { Services } from "../../services/index.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API v1 routes plus the unversioned health and webhook endpoints
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  services: Services
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  // API v1 routes
  await app.register(
    (api, _opts, done) => {
      registerSyncRoutes(api, services);
      registerRecordRoutes(api, services);
      registerViewRoutes(api, services);
      done();
    },
    { prefix: "/api/v1" }
  );

  // Rails call these directly, so they stay outside the versioned prefix
  await registerWebhookRoutes(app, services);
}
