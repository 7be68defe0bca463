import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool } = pg;

// ============================================================================
// Configuration
// ============================================================================

const DEFAULT_DATABASE_URL = "./data/ledger-sync.db";

const poolConfig: Omit<pg.PoolConfig, "connectionString"> = {
  max: 20, // Maximum pool connections
  idleTimeoutMillis: 30_000, // Close idle connections after 30s
  connectionTimeoutMillis: 5000, // Connection timeout
};

export function isPostgresUrl(url: string): boolean {
  return url.startsWith("postgres://") || url.startsWith("postgresql://");
}

/**
 * Create a Kysely instance for the given URL.
 *
 * Postgres URLs go through a pg pool; anything else is treated as a SQLite
 * file path (`:memory:` for an in-process database).
 */
export function createDb(url: string): Kysely<Database> {
  if (isPostgresUrl(url)) {
    return new Kysely<Database>({
      dialect: new PostgresDialect({
        pool: new Pool({ ...poolConfig, connectionString: url }),
      }),
    });
  }

  if (url !== ":memory:") {
    const dataDir = dirname(url);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(url) }),
  });
}

// ============================================================================
// Shared Instance
// ============================================================================

let instance: { url: string; db: Kysely<Database> } | null = null;

/**
 * Lazily open the process-wide database handle
 */
export function getDb(
  url: string = process.env.DATABASE_URL ?? DEFAULT_DATABASE_URL
): Kysely<Database> {
  if (instance === null) {
    instance = { url, db: createDb(url) };
    dbLogger.debug({ url: maskUrl(url) }, "Database handle created");
  }
  return instance.db;
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the shared database connection
 */
export async function closeConnection(): Promise<void> {
  if (instance === null) {
    return;
  }
  const { db } = instance;
  instance = null;
  try {
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

function maskUrl(url: string): string {
  if (!isPostgresUrl(url)) {
    return url;
  }
  const parsed = new URL(url);
  if (parsed.password !== "") {
    parsed.password = "****";
  }
  return parsed.toString();
}

/**
 * Get the current database URL (for display, with password masked)
 */
export function getDatabaseUrl(): string {
  return maskUrl(
    instance?.url ?? process.env.DATABASE_URL ?? DEFAULT_DATABASE_URL
  );
}
