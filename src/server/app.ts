import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { Services } from "../services/index.js";

export interface BuildAppOptions {
  /** Pass false to silence request logging (tests) */
  logger?: boolean;
}

/**
 * Assemble the Fastify instance without listening, so tests can `inject`
 */
export async function buildApp(
  services: Services,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : fastifyLoggerConfig,
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, services);

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  // Background work must settle before the database goes away
  app.addHook("onClose", async () => {
    services.orchestrator.cancelAll();
    await services.scheduler.stop();
    await services.webhooks.drain();
  });

  return app;
}
