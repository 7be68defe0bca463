import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";
import { closeConnection, getDb } from "./connection.js";
import { MIRROR_TABLES, type Database } from "./types.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create every table and index the service needs.
 *
 * Uses only column types both Postgres and SQLite accept, so the same
 * migration runs against either dialect. Safe to run repeatedly.
 */
export async function runMigration(db: Kysely<Database>): Promise<void> {
  dbLogger.info("Running schema migration...");

  for (const table of Object.values(MIRROR_TABLES)) {
    await db.schema
      .createTable(table)
      .ifNotExists()
      .addColumn("id", "text", (col) => col.primaryKey())
      .addColumn("tenant_id", "text", (col) => col.notNull())
      .addColumn("external_id", "text")
      .addColumn("status", "text", (col) => col.notNull())
      .addColumn("amount", "double precision")
      .addColumn("due_date", "text")
      .addColumn("counterparty_id", "text")
      .addColumn("counterparty_name", "text")
      .addColumn("attributes", "text", (col) => col.notNull().defaultTo("{}"))
      .addColumn("source_version", "text")
      .addColumn("sync_source", "text", (col) => col.notNull())
      .addColumn("last_synced_at", "text")
      .addColumn("log_pending", "integer", (col) => col.notNull().defaultTo(0))
      .addColumn("created_at", "text", (col) => col.notNull())
      .addColumn("updated_at", "text", (col) => col.notNull())
      .execute();

    // NULL external ids (local-only rows) never collide
    await db.schema
      .createIndex(`${table}_tenant_external_idx`)
      .ifNotExists()
      .on(table)
      .columns(["tenant_id", "external_id"])
      .unique()
      .execute();

    await db.schema
      .createIndex(`${table}_tenant_status_idx`)
      .ifNotExists()
      .on(table)
      .columns(["tenant_id", "status"])
      .execute();
  }

  await db.schema
    .createTable("transaction_log")
    .ifNotExists()
    .addColumn("log_id", "text", (col) => col.primaryKey())
    .addColumn("tenant_id", "text", (col) => col.notNull())
    .addColumn("entity_type", "text", (col) => col.notNull())
    .addColumn("entity_id", "text", (col) => col.notNull())
    .addColumn("sequence", "integer", (col) => col.notNull())
    .addColumn("operation_kind", "text", (col) => col.notNull())
    .addColumn("source", "text", (col) => col.notNull())
    .addColumn("full_snapshot", "text", (col) => col.notNull())
    .addColumn("diff", "text", (col) => col.notNull())
    .addColumn("actor_id", "text")
    .addColumn("occurred_at", "text", (col) => col.notNull())
    .addColumn("idempotency_key", "text", (col) => col.notNull().unique())
    .addColumn("recorded_at", "text", (col) => col.notNull())
    .addUniqueConstraint("transaction_log_entity_sequence_uq", [
      "entity_id",
      "sequence",
    ])
    .execute();

  await db.schema
    .createIndex("transaction_log_tenant_entity_idx")
    .ifNotExists()
    .on("transaction_log")
    .columns(["tenant_id", "entity_id", "occurred_at"])
    .execute();

  await db.schema
    .createTable("sync_cursors")
    .ifNotExists()
    .addColumn("tenant_id", "text", (col) => col.notNull())
    .addColumn("rail", "text", (col) => col.notNull())
    .addColumn("entity_type", "text", (col) => col.notNull())
    .addColumn("cursor_token", "text")
    .addColumn("state", "text", (col) => col.notNull().defaultTo("idle"))
    .addColumn("consecutive_failures", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("next_attempt_at", "text")
    .addColumn("last_run_at", "text")
    .addColumn("last_success_at", "text")
    .addColumn("last_error", "text")
    .addColumn("last_error_code", "text")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("sync_cursors_pk", [
      "tenant_id",
      "rail",
      "entity_type",
    ])
    .execute();

  await db.schema
    .createTable("sync_leases")
    .ifNotExists()
    .addColumn("lease_key", "text", (col) => col.primaryKey())
    .addColumn("token", "text", (col) => col.notNull())
    .addColumn("holder", "text", (col) => col.notNull())
    .addColumn("acquired_at", "text", (col) => col.notNull())
    .addColumn("expires_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("sync_runs")
    .ifNotExists()
    .addColumn("run_id", "text", (col) => col.primaryKey())
    .addColumn("tenant_id", "text", (col) => col.notNull())
    .addColumn("rail", "text", (col) => col.notNull())
    .addColumn("entity_type", "text", (col) => col.notNull())
    .addColumn("trigger", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("fetched", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("created", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("updated", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("synced", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("deleted", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("unchanged", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("skipped", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("log_pending", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("cursor_before", "text")
    .addColumn("cursor_after", "text")
    .addColumn("error_code", "text")
    .addColumn("error_message", "text")
    .addColumn("started_at", "text", (col) => col.notNull())
    .addColumn("finished_at", "text")
    .execute();

  await db.schema
    .createIndex("sync_runs_tenant_started_idx")
    .ifNotExists()
    .on("sync_runs")
    .columns(["tenant_id", "started_at"])
    .execute();

  await db.schema
    .createTable("rail_credentials")
    .ifNotExists()
    .addColumn("tenant_id", "text", (col) => col.notNull())
    .addColumn("rail", "text", (col) => col.notNull())
    .addColumn("access_token", "text", (col) => col.notNull())
    .addColumn("refresh_token", "text")
    .addColumn("account_id", "text")
    .addColumn("expires_at", "text")
    .addColumn("status", "text", (col) => col.notNull().defaultTo("active"))
    .addColumn("status_reason", "text")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("rail_credentials_pk", ["tenant_id", "rail"])
    .execute();

  await db.schema
    .createTable("approval_queue")
    .ifNotExists()
    .addColumn("tenant_id", "text", (col) => col.notNull())
    .addColumn("entity_id", "text", (col) => col.notNull())
    .addColumn("decision", "text", (col) => col.notNull().defaultTo("pending"))
    .addColumn("decided_by", "text")
    .addColumn("decided_at", "text")
    .addColumn("decided_amount", "double precision")
    .addColumn("decided_counterparty_id", "text")
    .addColumn("note", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("approval_queue_pk", ["tenant_id", "entity_id"])
    .execute();

  dbLogger.info("Schema migration completed successfully");
}

/**
 * Check if the schema exists (has the log table)
 */
export async function hasSchema(db: Kysely<Database>): Promise<boolean> {
  const tables = await db.introspection.getTables();
  return tables.some((t) => t.name === "transaction_log");
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Get row counts for every table the service owns
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<TableStat[]> {
  const tables = await db.introspection.getTables();
  const stats: TableStat[] = [];
  for (const table of tables) {
    const result = await sql<{ count: number | string }>`
      SELECT COUNT(*) AS count FROM ${sql.table(table.name)}
    `.execute(db);
    stats.push({
      table_name: table.name,
      row_count: Number(result.rows[0]?.count ?? 0),
    });
  }
  return stats.sort((a, b) => a.table_name.localeCompare(b.table_name));
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  try {
    const db = getDb();
    await runMigration(db);
    console.log("Migration completed successfully!");

    const stats = await getTableStats(db);
    if (stats.length > 0) {
      console.log("\nTable statistics:");
      for (const row of stats) {
        console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
      }
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// Only run main() if this file is executed directly (not imported)
const isMainModule = process.argv[1]?.includes("migrate");
if (isMainModule === true) {
  void main();
}
