import ora from "ora";

import { loadConfig } from "../../config.js";
import {
  checkConnection,
  closeConnection,
  getDatabaseUrl,
  getDb,
} from "../../db/connection.js";
import { runMigration, hasSchema, getTableStats } from "../../db/migrate.js";
import { errorMessage } from "../utils/context.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the mirror, log and orchestration tables")
    .action(async () => {
      const spinner = ora("Running migration...").start();

      try {
        const handle = getDb(loadConfig().databaseUrl);
        await runMigration(handle);
        spinner.succeed("Migration completed successfully");

        const stats = await getTableStats(handle);
        if (stats.length > 0) {
          console.log("\nTables:");
          for (const row of stats) {
            console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
          }
        }
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        const handle = getDb(loadConfig().databaseUrl);
        const connected = await checkConnection(handle);

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${getDatabaseUrl()}`);

        const schemaExists = await hasSchema(handle);
        if (!schemaExists) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        } else {
          const stats = await getTableStats(handle);
          console.log("\nTable statistics:");
          for (const row of stats) {
            console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
          }
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
