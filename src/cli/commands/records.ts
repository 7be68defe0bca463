/**
 * Record commands - read the mirror and its transaction log
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import {
  errorMessage,
  parseEntityType,
  parsePositiveInt,
  withServices,
} from "../utils/context.js";
import {
  displayHistory,
  displayVerify,
  printError,
  printWarning,
} from "../utils/display.js";

import type { EntityType } from "../../types/index.js";
import type { Command } from "commander";

export function registerRecordsCommand(program: Command): void {
  const records = program
    .command("records")
    .description("Inspect mirrored records and their history");

  // records list <tenant> <entity>
  records
    .command("list")
    .description("List mirror records ordered by due date")
    .argument("<tenant>", "Tenant id")
    .argument("<entity>", "Entity type", parseEntityType)
    .option("--status <list>", "Comma-separated statuses")
    .option("--pending", "Only records whose log entry is pending")
    .option("--limit <n>", "Maximum rows", parsePositiveInt, 50)
    .action(
      async (
        tenantId: string,
        entityType: EntityType,
        options: { status?: string; pending?: boolean; limit: number }
      ) => {
        try {
          const rows = await withServices((services) =>
            services.mirror.query(tenantId, entityType, {
              statuses: options.status?.split(",").filter((s) => s !== ""),
              logPending: options.pending === true ? true : undefined,
              limit: options.limit,
            })
          );
          if (rows.length === 0) {
            printWarning("No records found");
            return;
          }

          const table = new CliTable3({
            head: ["Id", "External", "Status", "Amount", "Due", "Counterparty"].map(
              (h) => chalk.cyan(h)
            ),
          });
          for (const row of rows) {
            table.push([
              row.id,
              row.externalId ?? "",
              row.logPending ? chalk.yellow(`${row.status}*`) : row.status,
              row.amount === null ? "" : row.amount.toFixed(2),
              row.dueDate ?? "",
              row.counterpartyName ?? row.counterpartyId ?? "",
            ]);
          }
          console.log(table.toString());
          if (rows.some((r) => r.logPending)) {
            console.log(chalk.gray("* log entry pending"));
          }
        } catch (error) {
          printError(errorMessage(error));
          process.exitCode = 1;
        }
      }
    );

  // records history <tenant> <id>
  records
    .command("history")
    .description("Show the transaction log of one record, oldest first")
    .argument("<tenant>", "Tenant id")
    .argument("<id>", "Mirror record id")
    .action(async (tenantId: string, entityId: string) => {
      try {
        const entries = await withServices((services) =>
          services.log.history(tenantId, entityId)
        );
        if (entries.length === 0) {
          printWarning(`No history for ${entityId}`);
          return;
        }
        displayHistory(entries);
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });

  // records verify <tenant> <entity>
  records
    .command("verify")
    .description("Replay the log and compare it with the mirror")
    .argument("<tenant>", "Tenant id")
    .argument("<entity>", "Entity type", parseEntityType)
    .action(async (tenantId: string, entityType: EntityType) => {
      try {
        const report = await withServices((services) =>
          services.mirror.verify(tenantId, entityType)
        );
        displayVerify(report);
        if (report.mismatches.length > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
