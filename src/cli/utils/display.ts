/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { SyncRunRow } from "../../db/types.js";
import type { CredentialSummary } from "../../services/credentials.js";
import type { VerifyReport } from "../../services/mirror/mirror-store.js";
import type {
  TenantHealth,
  TriggerResult,
} from "../../services/sync/orchestrator.js";
import type { ApprovalItem, ApprovalView } from "../../services/views/approvals.js";
import type { HygieneItem, HygieneView } from "../../services/views/hygiene.js";
import type {
  EntityType,
  HealthStatus,
  TransactionLogEntry,
} from "../../types/index.js";

// ============================================================================
// Formatting
// ============================================================================

function healthLabel(health: HealthStatus): string {
  switch (health) {
    case "ok":
      return chalk.green("ok");
    case "degraded":
      return chalk.yellow("degraded");
    case "needs_attention":
      return chalk.red("needs attention");
  }
}

function formatAmount(amount: number | null): string {
  return amount === null ? chalk.gray("-") : amount.toFixed(2);
}

function formatTime(value: string | null): string {
  return value === null ? chalk.gray("never") : value.replace("T", " ").slice(0, 19);
}

function statusColor(status: string): string {
  if (status === "succeeded" || status === "completed") {
    return chalk.green(status);
  }
  if (status.startsWith("failed")) {
    return chalk.red(status);
  }
  if (status === "running") {
    return chalk.cyan(status);
  }
  return chalk.yellow(status);
}

// ============================================================================
// Sync
// ============================================================================

export function displayTriggerResults(
  results: Map<EntityType, TriggerResult>
): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Entity"),
      chalk.cyan("Outcome"),
      chalk.cyan("Fetched"),
      chalk.cyan("Created"),
      chalk.cyan("Updated"),
      chalk.cyan("Detail"),
    ],
  });

  for (const [entityType, result] of results) {
    switch (result.outcome) {
      case "skipped":
        table.push([entityType, chalk.gray("skipped"), "", "", "", result.reason]);
        break;
      case "failed":
        table.push([
          entityType,
          statusColor("failed"),
          String(result.counters.fetched),
          String(result.counters.created),
          String(result.counters.updated),
          result.retryable
            ? `${result.errorCode}, retry after ${formatTime(result.nextAttemptAt)}`
            : result.errorCode,
        ]);
        break;
      default:
        table.push([
          entityType,
          statusColor(result.outcome),
          String(result.counters.fetched),
          String(result.counters.created),
          String(result.counters.updated),
          "",
        ]);
    }
  }

  console.log(table.toString());
}

export function displayHealth(health: TenantHealth): void {
  console.log(
    chalk.bold(`\nTenant ${health.tenantId}: `) + healthLabel(health.health)
  );

  if (health.connections.length > 0) {
    console.log(chalk.bold("\nConnections:"));
    for (const connection of health.connections) {
      const status =
        connection.status === "active"
          ? chalk.green("active")
          : chalk.red("needs reconnection");
      console.log(`  ${connection.rail.padEnd(12)} ${status}`);
      if (connection.message !== null) {
        console.log(chalk.gray(`    ${connection.message}`));
      }
    }
  }

  if (health.keys.length === 0) {
    console.log(chalk.gray("\nNo sync history yet"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Rail"),
      chalk.cyan("Entity"),
      chalk.cyan("State"),
      chalk.cyan("Health"),
      chalk.cyan("Last success"),
      chalk.cyan("Message"),
    ],
    colWidths: [12, 10, 18, 18, 21, 40],
    wordWrap: true,
  });
  for (const key of health.keys) {
    table.push([
      key.rail,
      key.entityType,
      statusColor(key.state),
      healthLabel(key.health) + (key.stale ? chalk.gray(" (stale)") : ""),
      formatTime(key.lastSuccessfulSyncAt),
      key.message ?? "",
    ]);
  }
  console.log(table.toString());
}

export function displayRunsTable(runs: SyncRunRow[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Started"),
      chalk.cyan("Rail"),
      chalk.cyan("Entity"),
      chalk.cyan("Trigger"),
      chalk.cyan("Status"),
      chalk.cyan("Fetched"),
      chalk.cyan("Changed"),
      chalk.cyan("Error"),
    ],
  });

  for (const run of runs) {
    table.push([
      formatTime(run.started_at),
      run.rail,
      run.entity_type,
      run.trigger,
      statusColor(run.status),
      String(run.fetched),
      String(run.created + run.updated + run.deleted),
      run.error_code ?? "",
    ]);
  }

  console.log(table.toString());
}

export function displayCredentials(credentials: CredentialSummary[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Tenant"),
      chalk.cyan("Rail"),
      chalk.cyan("Account"),
      chalk.cyan("Expires"),
      chalk.cyan("Status"),
    ],
  });
  for (const credential of credentials) {
    table.push([
      credential.tenantId,
      credential.rail,
      credential.accountId ?? chalk.gray("-"),
      credential.expiresAt ?? chalk.gray("-"),
      credential.status === "active"
        ? chalk.green("active")
        : chalk.red(credential.statusReason ?? "needs reconnection"),
    ]);
  }
  console.log(table.toString());
}

// ============================================================================
// Records
// ============================================================================

export function displayHistory(entries: TransactionLogEntry[]): void {
  for (const entry of entries) {
    const actor = entry.actorId === null ? "" : chalk.gray(` by ${entry.actorId}`);
    console.log(
      `${chalk.cyan(`#${String(entry.sequence)}`)} ${entry.operationKind} from ${entry.source}${actor} at ${formatTime(entry.occurredAt)}`
    );
    for (const [field, change] of Object.entries(entry.diff)) {
      console.log(
        `    ${field}: ${chalk.red(JSON.stringify(change.from))} -> ${chalk.green(JSON.stringify(change.to))}`
      );
    }
  }
}

export function displayVerify(report: VerifyReport): void {
  if (report.mismatches.length === 0) {
    printSuccess(`${String(report.checked)} records match their log`);
    return;
  }
  printWarning(
    `${String(report.mismatches.length)} of ${String(report.checked)} records differ from their log`
  );
  for (const mismatch of report.mismatches) {
    console.log(`  ${mismatch.entityId}: ${mismatch.reason}`);
    for (const broken of mismatch.chainBreaks) {
      console.log(chalk.gray(`    sequence ${String(broken.sequence)}: ${broken.reason}`));
    }
  }
}

// ============================================================================
// Views
// ============================================================================

function hygieneRows(items: HygieneItem[]): string[][] {
  return items.map((item) => [
    item.entityType,
    item.externalId ?? item.entityId,
    item.counterpartyName ?? chalk.gray("-"),
    formatAmount(item.amount),
    item.dueDate ?? chalk.gray("-"),
    item.issues.join(", "),
  ]);
}

export function displayHygiene(view: HygieneView): void {
  const head = ["Type", "Id", "Counterparty", "Amount", "Due", "Issues"].map(
    (h) => chalk.cyan(h)
  );

  for (const [title, items] of [
    ["Urgent", view.urgent],
    ["Upcoming", view.upcoming],
  ] as const) {
    console.log(chalk.bold(`\n${title} (${String(items.length)}):`));
    if (items.length === 0) {
      continue;
    }
    const table = new CliTable3({ head });
    table.push(...hygieneRows(items));
    console.log(table.toString());
  }
}

function approvalRows(items: ApprovalItem[]): string[][] {
  return items.map((item) => [
    item.externalId ?? item.entityId,
    item.counterpartyName ?? item.counterpartyId,
    formatAmount(item.amount),
    item.dueDate,
    item.decidedBy ?? "",
  ]);
}

export function displayApprovals(view: ApprovalView): void {
  const head = ["Bill", "Vendor", "Amount", "Due", "Decided by"].map((h) =>
    chalk.cyan(h)
  );

  for (const decision of ["pending", "approved", "rejected"] as const) {
    const items = view[decision];
    console.log(
      chalk.bold(
        `\n${decision} (${String(items.length)}, total ${view.totals[decision].toFixed(2)}):`
      )
    );
    if (items.length === 0) {
      continue;
    }
    const table = new CliTable3({ head });
    table.push(...approvalRows(items));
    console.log(table.toString());
  }
}

// ============================================================================
// Messages
// ============================================================================

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("Success:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
