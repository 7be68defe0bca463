/**
 * RailRegistry - rail name to service lookup
 */

import { createBillpayRail } from "./billpay.js";
import { createQuickbooksRail } from "./quickbooks.js";

import type { ExecutionRailService, RailSyncService } from "./types.js";
import type { AppConfig } from "../../config.js";
import type { RateLimitedClient } from "../../http/rate-limited-client.js";
import type { RailName } from "../../types/index.js";

export class UnknownRailError extends Error {
  constructor(readonly rail: string) {
    super(`No rail registered as "${rail}"`);
    this.name = "UnknownRailError";
  }
}

export class RailRegistry {
  private readonly rails = new Map<RailName, RailSyncService>();

  constructor(rails: RailSyncService[] = []) {
    for (const rail of rails) {
      this.register(rail);
    }
  }

  register(rail: RailSyncService): void {
    this.rails.set(rail.name, rail);
  }

  get(name: RailName): RailSyncService {
    const rail = this.rails.get(name);
    if (rail === undefined) {
      throw new UnknownRailError(name);
    }
    return rail;
  }

  /**
   * The execution rail for a name, or null when that rail only reads
   */
  getExecution(name: RailName): ExecutionRailService | null {
    const rail = this.get(name);
    return rail.kind === "execution" ? rail : null;
  }

  list(): RailSyncService[] {
    return [...this.rails.values()];
  }
}

export function createDefaultRails(
  client: RateLimitedClient,
  config: AppConfig["rails"]
): RailRegistry {
  return new RailRegistry([
    createQuickbooksRail({
      client,
      baseUrl: config.quickbooks.baseUrl,
      oauth: config.quickbooks.oauth ?? undefined,
    }),
    createBillpayRail({ client, baseUrl: config.billpay.baseUrl }),
  ]);
}
