import { InvalidArgumentError } from "commander";
import ora from "ora";

import {
  errorMessage,
  parseEntityType,
  parsePositiveInt,
  parseRail,
  withServices,
} from "../utils/context.js";
import {
  displayHealth,
  displayRunsTable,
  displayTriggerResults,
  printError,
  printSuccess,
  printWarning,
} from "../utils/display.js";

import type { SyncRunStatus } from "../../db/types.js";
import type { Services } from "../../services/index.js";
import type { EntityType, RailName } from "../../types/index.js";
import type { Command } from "commander";

const RUN_STATUSES: readonly SyncRunStatus[] = [
  "running",
  "succeeded",
  "failed_retryable",
  "failed_fatal",
  "cancelled",
];

function parseRunStatus(value: string): SyncRunStatus {
  const status = RUN_STATUSES.find((s) => s === value);
  if (status === undefined) {
    throw new InvalidArgumentError(
      `Expected one of: ${RUN_STATUSES.join(", ")}`
    );
  }
  return status;
}

function collectEntityTypes(value: string, previous: EntityType[]): EntityType[] {
  return [...previous, parseEntityType(value)];
}

/**
 * Abort the tenant's runs on Ctrl+C instead of killing the process, so the
 * cursor and run record are written before exit
 */
function cancelOnInterrupt(services: Services, tenantId: string): () => void {
  const onSigint = (): void => {
    const count = services.orchestrator.cancelTenant(tenantId);
    printWarning(`Cancelling ${String(count)} run(s)...`);
  };
  process.on("SIGINT", onSigint);
  return () => process.off("SIGINT", onSigint);
}

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Pull rail data into the mirror and inspect sync state")
    .addHelpText(
      "after",
      `
SYNC WORKFLOW:
══════════════════════════════════════════════════════════════════════════════
  1. ledger-sync db migrate
  2. ledger-sync credentials set <tenant> quickbooks --account <realm-id>
  3. ledger-sync sync all <tenant> quickbooks
  4. ledger-sync sync status <tenant>

A key in failed_fatal is never retried automatically. Fix the cause (usually
reconnecting the rail), then clear it with 'sync resolve <tenant> <rail>'.
══════════════════════════════════════════════════════════════════════════════
`
    );

  // sync run <tenant> <rail> <entity>
  sync
    .command("run")
    .description("Sync one entity type from a rail")
    .argument("<tenant>", "Tenant id")
    .argument("<rail>", "Rail name", parseRail)
    .argument("<entity>", "Entity type", parseEntityType)
    .option("--force", "Ignore backoff")
    .action(
      async (
        tenantId: string,
        rail: RailName,
        entityType: EntityType,
        options: { force?: boolean }
      ) => {
        const spinner = ora(`Syncing ${rail} ${entityType}...`).start();
        try {
          const result = await withServices(async (services) => {
            const detach = cancelOnInterrupt(services, tenantId);
            try {
              return await services.orchestrator.trigger(
                tenantId,
                rail,
                entityType,
                { source: "manual", force: options.force }
              );
            } finally {
              detach();
            }
          });

          switch (result.outcome) {
            case "completed":
              spinner.succeed(
                `${entityType}: ${String(result.counters.fetched)} fetched, ${String(result.counters.created)} created, ${String(result.counters.updated)} updated`
              );
              break;
            case "skipped":
              spinner.warn(`${entityType}: skipped (${result.reason})`);
              break;
            case "cancelled":
              spinner.warn(`${entityType}: cancelled`);
              break;
            case "failed":
              spinner.fail(`${entityType}: failed (${result.errorCode})`);
              process.exitCode = 1;
          }
        } catch (error) {
          spinner.fail(`Failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    );

  // sync all <tenant> <rail>
  sync
    .command("all")
    .description("Sync every entity type a rail carries")
    .argument("<tenant>", "Tenant id")
    .argument("<rail>", "Rail name", parseRail)
    .option("--force", "Ignore backoff")
    .option(
      "-e, --entity <type>",
      "Limit to an entity type (repeatable)",
      collectEntityTypes,
      []
    )
    .action(
      async (
        tenantId: string,
        rail: RailName,
        options: { force?: boolean; entity: EntityType[] }
      ) => {
        const spinner = ora(`Syncing ${rail}...`).start();
        try {
          const results = await withServices(async (services) => {
            const detach = cancelOnInterrupt(services, tenantId);
            try {
              return await services.orchestrator.triggerAll(
                tenantId,
                rail,
                { source: "manual", force: options.force },
                options.entity.length > 0 ? options.entity : undefined
              );
            } finally {
              detach();
            }
          });
          spinner.stop();
          displayTriggerResults(results);

          const failed = [...results.values()].filter(
            (r) => r.outcome === "failed"
          ).length;
          if (failed > 0) {
            printError(`${String(failed)} entity type(s) failed`);
            process.exitCode = 1;
          }
        } catch (error) {
          spinner.fail(`Failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    );

  // sync status <tenant>
  sync
    .command("status")
    .description("Show connection and per-key sync health for a tenant")
    .argument("<tenant>", "Tenant id")
    .action(async (tenantId: string) => {
      try {
        const health = await withServices((services) =>
          services.orchestrator.health(tenantId)
        );
        displayHealth(health);
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });

  // sync runs <tenant>
  sync
    .command("runs")
    .description("List recent sync runs, newest first")
    .argument("<tenant>", "Tenant id")
    .option("--status <status>", "Filter by run status", parseRunStatus)
    .option("--rail <rail>", "Filter by rail", parseRail)
    .option("--entity <type>", "Filter by entity type", parseEntityType)
    .option("--limit <n>", "Maximum rows", parsePositiveInt, 20)
    .action(
      async (
        tenantId: string,
        options: {
          status?: SyncRunStatus;
          rail?: RailName;
          entity?: EntityType;
          limit: number;
        }
      ) => {
        try {
          const runs = await withServices((services) =>
            services.runs.list(tenantId, {
              status: options.status,
              rail: options.rail,
              entityType: options.entity,
              limit: options.limit,
            })
          );
          if (runs.length === 0) {
            console.log("No runs found matching criteria");
            return;
          }
          displayRunsTable(runs);
        } catch (error) {
          printError(errorMessage(error));
          process.exitCode = 1;
        }
      }
    );

  // sync resolve <tenant> <rail>
  sync
    .command("resolve")
    .description("Return failed keys of a rail to idle after fixing the cause")
    .argument("<tenant>", "Tenant id")
    .argument("<rail>", "Rail name", parseRail)
    .action(async (tenantId: string, rail: RailName) => {
      try {
        const count = await withServices((services) =>
          services.orchestrator.resolve(tenantId, rail)
        );
        if (count === 0) {
          printWarning("Nothing to resolve");
        } else {
          printSuccess(`${String(count)} key(s) reset to idle`);
        }
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });

  // sync schedule
  sync
    .command("schedule")
    .description("Run the periodic scheduler in the foreground")
    .option("--once", "Run a single tick and exit")
    .action(async (options: { once?: boolean }) => {
      try {
        await withServices(async (services) => {
          if (options.once === true) {
            const summary = await services.scheduler.tick();
            console.log(
              `Triggered ${String(summary.triggered)}: ${String(summary.completed)} completed, ${String(summary.failed)} failed, ${String(summary.skipped)} skipped, ${String(summary.cancelled)} cancelled`
            );
            return;
          }

          services.scheduler.start();
          console.log("Scheduler running, press Ctrl+C to stop");
          await new Promise<void>((resolve) => {
            process.once("SIGINT", () => {
              services.orchestrator.cancelAll();
              resolve();
            });
          });
        });
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
