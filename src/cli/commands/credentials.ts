/**
 * Credential commands - connect a tenant to a rail
 */

import { password } from "@inquirer/prompts";

import {
  errorMessage,
  isPromptExit,
  parseRail,
  withServices,
} from "../utils/context.js";
import {
  displayCredentials,
  printError,
  printSuccess,
  printWarning,
} from "../utils/display.js";

import type { RailName } from "../../types/index.js";
import type { Command } from "commander";

interface SetOptions {
  token?: string;
  refreshToken?: string;
  account?: string;
  expiresAt?: string;
}

export function registerCredentialsCommand(program: Command): void {
  const credentials = program
    .command("credentials")
    .description("Manage per-tenant rail credentials");

  // credentials set <tenant> <rail>
  credentials
    .command("set")
    .description("Store an access token (prompts when --token is omitted)")
    .argument("<tenant>", "Tenant id")
    .argument("<rail>", "Rail name", parseRail)
    .option("--token <token>", "Access token")
    .option("--refresh-token <token>", "Refresh token")
    .option("--account <id>", "Rail-side account id (QuickBooks realm id)")
    .option("--expires-at <iso>", "Token expiry as an ISO timestamp")
    .action(async (tenantId: string, rail: RailName, options: SetOptions) => {
      try {
        const accessToken =
          options.token ??
          (await password({ message: `Access token for ${rail}:`, mask: "*" }));
        if (accessToken === "") {
          printError("Access token is required");
          process.exitCode = 1;
          return;
        }
        if (
          options.expiresAt !== undefined &&
          Number.isNaN(Date.parse(options.expiresAt))
        ) {
          printError(`Invalid --expires-at: ${options.expiresAt}`);
          process.exitCode = 1;
          return;
        }

        await withServices(async (services) => {
          await services.credentials.save({
            tenantId,
            rail,
            accessToken,
            refreshToken: options.refreshToken,
            accountId: options.account,
            expiresAt:
              options.expiresAt === undefined
                ? null
                : new Date(options.expiresAt).toISOString(),
          });
        });
        printSuccess(`Credential for ${tenantId}/${rail} saved`);
      } catch (error) {
        if (isPromptExit(error)) {
          return;
        }
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });

  // credentials list [tenant]
  credentials
    .command("list")
    .description("List credentials (tokens are never shown)")
    .argument("[tenant]", "Only this tenant")
    .action(async (tenantId: string | undefined) => {
      try {
        const rows = await withServices((services) =>
          services.credentials.list(tenantId)
        );
        if (rows.length === 0) {
          printWarning("No credentials stored");
          return;
        }
        displayCredentials(rows);
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });

  // credentials remove <tenant> <rail>
  credentials
    .command("remove")
    .description("Delete a tenant's credential for a rail")
    .argument("<tenant>", "Tenant id")
    .argument("<rail>", "Rail name", parseRail)
    .action(async (tenantId: string, rail: RailName) => {
      try {
        const removed = await withServices((services) =>
          services.credentials.remove(tenantId, rail)
        );
        if (removed) {
          printSuccess(`Credential for ${tenantId}/${rail} removed`);
        } else {
          printWarning(`No credential for ${tenantId}/${rail}`);
        }
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
