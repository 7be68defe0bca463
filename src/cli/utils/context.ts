/**
 * Shared setup for CLI commands: configuration, database and services
 */

import { InvalidArgumentError } from "commander";

import { loadConfig } from "../../config.js";
import { closeConnection, getDb } from "../../db/connection.js";
import { createServices, type Services } from "../../services/index.js";
import {
  ENTITY_TYPES,
  RAIL_NAMES,
  isEntityType,
  isRailName,
  type EntityType,
  type RailName,
} from "../../types/index.js";

/**
 * Build the services, run `fn`, and always close the database afterwards
 */
export async function withServices<T>(
  fn: (services: Services) => Promise<T>
): Promise<T> {
  const config = loadConfig();
  const services = createServices(getDb(config.databaseUrl), config);
  try {
    return await fn(services);
  } finally {
    services.orchestrator.cancelAll();
    await services.scheduler.stop();
    await services.webhooks.drain();
    await closeConnection();
  }
}

// ============================================================================
// Argument Parsers
// ============================================================================

export function parseRail(value: string): RailName {
  if (!isRailName(value)) {
    throw new InvalidArgumentError(`Expected one of: ${RAIL_NAMES.join(", ")}`);
  }
  return value;
}

export function parseEntityType(value: string): EntityType {
  if (!isEntityType(value)) {
    throw new InvalidArgumentError(
      `Expected one of: ${ENTITY_TYPES.join(", ")}`
    );
  }
  return value;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer");
  }
  return parsed;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}
