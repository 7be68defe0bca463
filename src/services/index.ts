/**
 * Service wiring shared by the HTTP server and the CLI
 */

import { SYNC_DEFAULTS } from "../db/types.js";
import {
  RateLimitedClient,
  type RateLimitedClientDeps,
} from "../http/rate-limited-client.js";
import { CredentialStore } from "./credentials.js";
import { MirrorStore } from "./mirror/mirror-store.js";
import { TransactionLogStore } from "./mirror/transaction-log.js";
import { createDefaultRails, type RailRegistry } from "./rails/registry.js";
import { SyncCursorStore } from "./sync/cursors.js";
import { LeaseStore } from "./sync/leases.js";
import { SyncOrchestrator } from "./sync/orchestrator.js";
import { EntityPolicy } from "./sync/policy.js";
import { SyncRunStore } from "./sync/runs.js";
import { SyncScheduler } from "./sync/scheduler.js";
import { WebhookDispatcher } from "./sync/webhook-dispatcher.js";
import { ApprovalOrchestrator } from "./views/approvals.js";
import { HygieneOrchestrator } from "./views/hygiene.js";

import type { AppConfig } from "../config.js";
import type { Database } from "../db/types.js";
import type { Kysely } from "kysely";

export interface Services {
  db: Kysely<Database>;
  config: AppConfig;
  now: () => Date;
  client: RateLimitedClient;
  log: TransactionLogStore;
  mirror: MirrorStore;
  credentials: CredentialStore;
  cursors: SyncCursorStore;
  runs: SyncRunStore;
  leases: LeaseStore;
  rails: RailRegistry;
  orchestrator: SyncOrchestrator;
  scheduler: SyncScheduler;
  webhooks: WebhookDispatcher;
  views: {
    hygiene: HygieneOrchestrator;
    approvals: ApprovalOrchestrator;
  };
}

export interface ServiceOverrides {
  /** Injected into the RateLimitedClient (tests stub `fetchFn`) */
  http?: RateLimitedClientDeps;
  /** Replace the configured rails */
  rails?: RailRegistry;
  now?: () => Date;
}

export function createServices(
  db: Kysely<Database>,
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Services {
  const now = overrides.now ?? (() => new Date());

  const client = new RateLimitedClient(config.http, overrides.http);
  const log = new TransactionLogStore(db, now);
  const mirror = new MirrorStore(db, log, now);
  const credentials = new CredentialStore(db, now);
  const cursors = new SyncCursorStore(db, now);
  const runs = new SyncRunStore(db, now);
  const leases = new LeaseStore(db, now);
  const rails = overrides.rails ?? createDefaultRails(client, config.rails);

  const orchestrator = new SyncOrchestrator(
    {
      cursors,
      leases,
      runs,
      mirror,
      credentials,
      rails,
      client,
      policy: new EntityPolicy(),
      now,
    },
    {
      pageSize: config.sync.pageSize,
      maxPagesPerRun: config.sync.maxPagesPerRun,
      maxTaskDurationMs: config.sync.maxTaskDurationMs,
      retry: {
        ...SYNC_DEFAULTS.retry,
        maxConsecutiveFailures: config.sync.maxConsecutiveFailures,
      },
      tokenRefreshBufferMs: config.sync.tokenRefreshBufferMs,
    }
  );

  const scheduler = new SyncScheduler(
    orchestrator,
    credentials,
    rails,
    config.sync.intervalMs
  );

  return {
    db,
    config,
    now,
    client,
    log,
    mirror,
    credentials,
    cursors,
    runs,
    leases,
    rails,
    orchestrator,
    scheduler,
    webhooks: new WebhookDispatcher(credentials, orchestrator),
    views: {
      hygiene: new HygieneOrchestrator(mirror, now),
      approvals: new ApprovalOrchestrator(db, mirror, now),
    },
  };
}
