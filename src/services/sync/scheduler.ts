/**
 * SyncScheduler - periodic trigger for every connected tenant
 *
 * Each tick sweeps expired leases, then triggers every (credential, entity
 * type) pair as a "schedule" run. The orchestrator's soft-TTL and backoff
 * checks decide what actually runs; a held lease is simply skipped.
 */

import { syncLogger } from "../../logger.js";

import type { SyncOrchestrator, TriggerResult } from "./orchestrator.js";
import type { CredentialStore } from "../credentials.js";
import type { RailRegistry } from "../rails/registry.js";

export interface TickSummary {
  triggered: number;
  completed: number;
  failed: number;
  skipped: number;
  cancelled: number;
  errors: number;
}

export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<TickSummary> | null = null;

  constructor(
    private orchestrator: SyncOrchestrator,
    private credentials: CredentialStore,
    private rails: RailRegistry,
    private intervalMs: number
  ) {}

  /**
   * Run one pass. Overlapping calls share the pass in flight.
   */
  async tick(): Promise<TickSummary> {
    if (this.ticking !== null) {
      return await this.ticking;
    }
    this.ticking = this.runTick();
    try {
      return await this.ticking;
    } finally {
      this.ticking = null;
    }
  }

  private async runTick(): Promise<TickSummary> {
    const swept = await this.orchestrator.sweepExpiredLeases();
    const credentials = await this.credentials.listActive();

    const jobs: Promise<TriggerResult>[] = [];
    for (const credential of credentials) {
      const rail = this.rails.get(credential.rail);
      for (const entityType of rail.entityTypes) {
        jobs.push(
          this.orchestrator.trigger(
            credential.tenantId,
            credential.rail,
            entityType,
            { source: "schedule" }
          )
        );
      }
    }

    const settled = await Promise.allSettled(jobs);
    const summary: TickSummary = {
      triggered: jobs.length,
      completed: 0,
      failed: 0,
      skipped: 0,
      cancelled: 0,
      errors: 0,
    };

    for (const result of settled) {
      if (result.status === "rejected") {
        summary.errors++;
        syncLogger.error({ error: result.reason }, "Scheduled trigger threw");
        continue;
      }
      switch (result.value.outcome) {
        case "completed":
          summary.completed++;
          break;
        case "failed":
          summary.failed++;
          break;
        case "skipped":
          summary.skipped++;
          break;
        case "cancelled":
          summary.cancelled++;
          break;
      }
    }

    syncLogger.info({ ...summary, swept }, "Scheduler tick finished");
    return summary;
  }

  start(): void {
    if (this.timer !== null) {
      return;
    }
    syncLogger.info({ intervalMs: this.intervalMs }, "Sync scheduler started");

    const run = (): void => {
      this.tick().catch((error: unknown) => {
        syncLogger.error({ error }, "Scheduler tick failed");
      });
    };

    run();
    this.timer = setInterval(run, this.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      syncLogger.info("Sync scheduler stopped");
    }
    if (this.ticking !== null) {
      await this.ticking;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
