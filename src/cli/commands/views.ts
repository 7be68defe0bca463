/**
 * View commands - hygiene and approvals
 */

import { input, select } from "@inquirer/prompts";
import chalk from "chalk";

import {
  errorMessage,
  isPromptExit,
  withServices,
} from "../utils/context.js";
import {
  displayApprovals,
  displayHygiene,
  printError,
  printSuccess,
  printWarning,
} from "../utils/display.js";

import type { ApprovalDecision } from "../../db/types.js";
import type { Command } from "commander";

export function registerViewsCommand(program: Command): void {
  const views = program
    .command("views")
    .description("Read models built from the mirror");

  // views hygiene <tenant>
  views
    .command("hygiene")
    .description("Open bills and invoices with data problems")
    .argument("<tenant>", "Tenant id")
    .action(async (tenantId: string) => {
      try {
        const view = await withServices((services) =>
          services.views.hygiene.getView(tenantId)
        );
        displayHygiene(view);
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });

  // views approvals <tenant>
  views
    .command("approvals")
    .description("Payable bills grouped by approval decision")
    .argument("<tenant>", "Tenant id")
    .action(async (tenantId: string) => {
      try {
        const view = await withServices((services) =>
          services.views.approvals.getView(tenantId)
        );
        displayApprovals(view);
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });

  // views approve <tenant>
  views
    .command("approve")
    .description("Walk through pending bills and record decisions")
    .argument("<tenant>", "Tenant id")
    .requiredOption("--actor <id>", "Who is deciding")
    .action(async (tenantId: string, options: { actor: string }) => {
      try {
        await withServices(async (services) => {
          const view = await services.views.approvals.getView(tenantId);
          if (view.pending.length === 0) {
            printWarning("No bills pending approval");
            return;
          }

          for (const bill of view.pending) {
            console.log(
              `\n${chalk.bold(bill.counterpartyName ?? bill.counterpartyId)} ${bill.amount.toFixed(2)} due ${bill.dueDate}`
            );
            const decision = await select<ApprovalDecision | "skip">({
              message: "Decision:",
              choices: [
                { name: "Approve", value: "approved" },
                { name: "Reject", value: "rejected" },
                { name: "Skip", value: "skip" },
              ],
            });
            if (decision === "skip") {
              continue;
            }
            const note = await input({ message: "Note (optional):" });

            await services.views.approvals.decide(tenantId, {
              entityId: bill.entityId,
              decision,
              actorId: options.actor,
              note: note === "" ? null : note,
            });
            printSuccess(`${bill.externalId ?? bill.entityId} ${decision}`);
          }
        });
      } catch (error) {
        if (isPromptExit(error)) {
          console.log("\nGoodbye!");
          return;
        }
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
