/**
 * SyncOrchestrator - rail-agnostic sync runs per (tenant, rail, entity type)
 *
 * Every trigger (schedule, webhook, CLI, API) ends here. A run:
 * 1. Checks credential, state machine and backoff
 * 2. Takes the key's lease (skips when held, never waits)
 * 3. Settles log_pending rows left by an earlier run
 * 4. Pages through the rail from the stored cursor, mapping and upserting
 *    each record and advancing the cursor past every committed one
 * 5. Applies deletions the rail reports since the starting cursor
 * 6. Records run metrics and releases the lease
 */

import { SYNC_DEFAULTS, type SyncTrigger } from "../../db/types.js";
import { syncLogger } from "../../logger.js";
import {
  DELETED_STATUS,
  type CanonicalEntity,
  type EntityType,
  type HealthStatus,
  type RailCredential,
  type RailName,
  type SyncCursor,
  type SyncKey,
} from "../../types/index.js";
import { RecordNotFoundError } from "../mirror/mirror-store.js";
import { supportsEntity } from "../rails/types.js";
import {
  CancelledError,
  FatalSyncError,
  MappingError,
  TransientSyncError,
  isSyncError,
  publicMessageFor,
} from "./errors.js";
import { emptyCounters, type RunCounters } from "./runs.js";
import {
  isBackingOff,
  transition,
  type MachineState,
  type RetryPolicy,
  type SyncEvent,
} from "./state-machine.js";

import type { SyncCursorStore } from "./cursors.js";
import type { LeaseStore } from "./leases.js";
import type { EntityPolicy } from "./policy.js";
import type { SyncRunStore } from "./runs.js";
import type { RateLimitedClient } from "../../http/rate-limited-client.js";
import type { CredentialStore } from "../credentials.js";
import type { MirrorStore, MirrorWriteResult } from "../mirror/mirror-store.js";
import type { RailRegistry } from "../rails/registry.js";
import type {
  PushResult,
  RailSyncService,
  RemoteDeletion,
  TokenGrant,
} from "../rails/types.js";
import type { Logger } from "pino";

// ============================================================================
// Types
// ============================================================================

export interface SyncOrchestratorDeps {
  cursors: SyncCursorStore;
  leases: LeaseStore;
  runs: SyncRunStore;
  mirror: MirrorStore;
  credentials: CredentialStore;
  rails: RailRegistry;
  client: RateLimitedClient;
  policy: EntityPolicy;
  now?: () => Date;
}

export interface SyncOrchestratorOptions {
  pageSize: number;
  maxPagesPerRun: number;
  maxTaskDurationMs: number;
  retry: RetryPolicy;
  /** Refresh an access token this long before it expires */
  tokenRefreshBufferMs: number;
}

export interface TriggerOptions {
  source?: SyncTrigger;
  /** Run even while a retry backoff or the soft TTL would defer it */
  force?: boolean;
  signal?: AbortSignal;
}

export type SkipReason =
  | "lease_held"
  | "backoff"
  | "needs_reconnection"
  | "no_credential"
  | "failed_fatal"
  | "fresh"
  | "unsupported";

export type TriggerResult =
  | {
      outcome: "completed";
      runId: string;
      counters: RunCounters;
      cursor: string | null;
    }
  | {
      outcome: "failed";
      runId: string;
      counters: RunCounters;
      errorCode: string;
      retryable: boolean;
      nextAttemptAt: string | null;
    }
  | { outcome: "cancelled"; runId: string; counters: RunCounters }
  | { outcome: "skipped"; reason: SkipReason };

export interface KeyHealth {
  rail: RailName;
  entityType: EntityType;
  state: SyncCursor["state"];
  health: HealthStatus;
  lastSuccessfulSyncAt: string | null;
  nextAttemptAt: string | null;
  stale: boolean;
  message: string | null;
}

export interface TenantHealth {
  tenantId: string;
  health: HealthStatus;
  connections: {
    rail: RailName;
    status: "active" | "needs_reconnection";
    message: string | null;
  }[];
  keys: KeyHealth[];
}

export interface PushLocalChangeInput {
  tenantId: string;
  rail: RailName;
  entityType: EntityType;
  entityId: string;
  actorId: string;
  signal?: AbortSignal;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: SyncOrchestratorOptions = {
  pageSize: SYNC_DEFAULTS.pageSize,
  maxPagesPerRun: SYNC_DEFAULTS.maxPagesPerRun,
  maxTaskDurationMs: SYNC_DEFAULTS.lease.taskDurationMs,
  retry: { ...SYNC_DEFAULTS.retry },
  tokenRefreshBufferMs: 5 * 60_000,
};

const HEALTH_RANK: Record<HealthStatus, number> = {
  ok: 0,
  degraded: 1,
  needs_attention: 2,
};

function worst(a: HealthStatus, b: HealthStatus): HealthStatus {
  return HEALTH_RANK[b] > HEALTH_RANK[a] ? b : a;
}

function machineOf(cursor: SyncCursor): MachineState {
  return {
    state: cursor.state,
    consecutiveFailures: cursor.consecutiveFailures,
    nextAttemptAt: cursor.nextAttemptAt,
  };
}

function countChange(counters: RunCounters, result: MirrorWriteResult): void {
  counters[result.change]++;
  if (result.logPending) {
    counters.logPending++;
  }
}

/** Credential in use by one run; refreshed at most once per run */
interface RunAuth {
  credential: RailCredential;
  refreshed: boolean;
}

// ============================================================================
// SyncOrchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly active = new Map<string, Set<AbortController>>();
  private readonly refreshing = new Map<string, Promise<RailCredential>>();
  private readonly now: () => Date;
  private readonly options: SyncOrchestratorOptions;

  constructor(
    private deps: SyncOrchestratorDeps,
    options: Partial<SyncOrchestratorOptions> = {}
  ) {
    this.now = deps.now ?? (() => new Date());
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
  }

  // ==========================================================================
  // Trigger
  // ==========================================================================

  async trigger(
    tenantId: string,
    railName: RailName,
    entityType: EntityType,
    options: TriggerOptions = {}
  ): Promise<TriggerResult> {
    const key: SyncKey = { tenantId, rail: railName, entityType };
    const source = options.source ?? "manual";
    const log = syncLogger.child({ tenantId, rail: railName, entityType });

    const rail = this.deps.rails.get(railName);
    if (!supportsEntity(rail, entityType)) {
      return this.skip(log, "unsupported");
    }

    const credential = await this.deps.credentials.get(tenantId, railName);
    if (credential === null) {
      return this.skip(log, "no_credential");
    }
    if (credential.status === "needs_reconnection") {
      return this.skip(log, "needs_reconnection");
    }

    const cursor = await this.deps.cursors.get(key);
    const now = this.now();
    if (cursor.state === "failed_fatal") {
      return this.skip(log, "failed_fatal");
    }
    if (options.force !== true) {
      if (isBackingOff(machineOf(cursor), now)) {
        return this.skip(log, "backoff");
      }
      if (
        source === "schedule" &&
        this.deps.policy.isFresh(entityType, cursor.lastSuccessAt, now)
      ) {
        return this.skip(log, "fresh");
      }
    }

    const lease = await this.deps.leases.tryAcquire(
      key,
      this.options.maxTaskDurationMs
    );
    if (lease === null) {
      return this.skip(log, "lease_held");
    }

    try {
      return await this.run(key, rail, source, options.signal);
    } finally {
      await this.deps.leases.release(lease);
    }
  }

  /**
   * Trigger every entity type the rail carries, one after another
   */
  async triggerAll(
    tenantId: string,
    railName: RailName,
    options: TriggerOptions = {},
    entityTypes?: readonly EntityType[]
  ): Promise<Map<EntityType, TriggerResult>> {
    const rail = this.deps.rails.get(railName);
    const results = new Map<EntityType, TriggerResult>();
    for (const entityType of entityTypes ?? rail.entityTypes) {
      results.set(
        entityType,
        await this.trigger(tenantId, railName, entityType, options)
      );
    }
    return results;
  }

  private skip(log: Logger, reason: SkipReason): TriggerResult {
    if (reason === "lease_held") {
      log.info("Sync skipped, lease held");
    } else {
      log.debug({ reason }, "Sync skipped");
    }
    return { outcome: "skipped", reason };
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async run(
    key: SyncKey,
    rail: RailSyncService,
    source: SyncTrigger,
    callerSignal: AbortSignal | undefined
  ): Promise<TriggerResult> {
    const { tenantId, entityType } = key;
    const { retry } = this.options;
    const log = syncLogger.child({ tenantId, rail: rail.name, entityType });

    let cursor = await this.deps.cursors.get(key);
    let machine = machineOf(cursor);

    // A run left "running" lost its lease without finishing
    if (machine.state === "running") {
      log.warn("Recovering sync key left running by an earlier run");
      machine = transition(machine, { type: "recover" }, retry, this.now());
      if (machine.state === "failed_fatal") {
        // The lost run was the last retry the key had left
        await this.deps.cursors.applyState(key, machine, {
          message: "Sync run ended without finishing",
          code: "INTERRUPTED",
        });
        log.error(
          { consecutiveFailures: machine.consecutiveFailures },
          "Recovered sync key reached the failure limit"
        );
        return { outcome: "skipped", reason: "failed_fatal" };
      }
    }
    if (
      machine.state === "failed_retryable" &&
      !isBackingOff(machine, this.now())
    ) {
      machine = transition(
        machine,
        { type: "backoff_elapsed" },
        retry,
        this.now()
      );
    }
    machine = transition(machine, { type: "start" }, retry, this.now());

    cursor = {
      ...cursor,
      ...machine,
      lastRunAt: this.now().toISOString(),
    };
    await this.deps.cursors.save(cursor);

    const runId = await this.deps.runs.start(key, source, cursor.cursorToken);
    const counters = emptyCounters();
    let cursorToken = cursor.cursorToken;

    const controller = new AbortController();
    this.track(tenantId, controller);
    const signal =
      callerSignal === undefined
        ? controller.signal
        : AbortSignal.any([controller.signal, callerSignal]);

    let timedOut = false;
    const watchdog = setTimeout(() => {
      timedOut = true;
      log.fatal(
        { runId, maxTaskDurationMs: this.options.maxTaskDurationMs },
        "Sync run exceeded max task duration; aborting and releasing lease"
      );
      controller.abort(new CancelledError("Sync run timed out"));
      this.deps.leases.forceRelease(key).catch((error: unknown) => {
        log.error({ error }, "Watchdog could not release lease");
      });
    }, this.options.maxTaskDurationMs);
    watchdog.unref();

    log.info({ runId, source, cursor: cursorToken }, "Sync run started");

    try {
      const settled = await this.deps.mirror.reconcilePending(
        tenantId,
        entityType
      );
      if (settled > 0) {
        log.info({ settled }, "Settled log_pending rows before fetching");
      }

      const stored = await this.deps.credentials.get(tenantId, rail.name);
      if (stored === null || stored.status !== "active") {
        throw new FatalSyncError("Credential no longer active", "auth");
      }
      const auth = await this.prepareAuth(rail, stored, signal);
      const startCursor = cursorToken;
      let drained = false;

      for (let page = 0; page < this.options.maxPagesPerRun; page++) {
        throwIfCancelled(signal);

        const fetched = await this.withAuthRetry(rail, auth, signal, (c) =>
          rail.fetch({
            tenantId,
            entityType,
            cursor: cursorToken,
            pageSize: this.options.pageSize,
            credential: c,
            signal,
          })
        );

        for (const record of fetched.records) {
          throwIfCancelled(signal);
          counters.fetched++;

          let entity: CanonicalEntity;
          try {
            entity = rail.map(entityType, record.payload);
          } catch (error) {
            if (!(error instanceof MappingError)) {
              throw error;
            }
            counters.skipped++;
            log.warn(
              {
                runId,
                externalId: record.externalId ?? error.externalId,
                details: error.details,
              },
              "Skipping record that could not be mapped"
            );
            cursorToken = await this.advance(
              key,
              record.cursorAfter,
              cursorToken
            );
            continue;
          }

          const result = await this.deps.mirror.upsert(tenantId, entity, {
            source: rail.name,
            occurredAt: record.occurredAt ?? this.now().toISOString(),
          });
          countChange(counters, result);
          cursorToken = await this.advance(
            key,
            record.cursorAfter,
            cursorToken
          );
        }

        if (!fetched.hasMore || fetched.records.length === 0) {
          drained = true;
          break;
        }
      }

      if (
        drained &&
        rail.kind === "ledger" &&
        rail.fetchDeletions !== undefined
      ) {
        const fetchDeletions = rail.fetchDeletions.bind(rail);
        throwIfCancelled(signal);
        const deletions = await this.withAuthRetry(rail, auth, signal, (c) =>
          fetchDeletions({
            tenantId,
            entityType,
            cursor: startCursor,
            credential: c,
            signal,
          })
        );
        for (const deletion of deletions) {
          const result = await this.applyRemoteDeletion(
            tenantId,
            rail.name,
            entityType,
            deletion
          );
          if (result !== null) {
            countChange(counters, result);
          }
        }
      }

      const done = transition(machine, { type: "succeed" }, retry, this.now());
      await this.deps.cursors.save({
        ...cursor,
        ...done,
        cursorToken,
        lastSuccessAt: this.now().toISOString(),
        lastError: null,
        lastErrorCode: null,
      });
      await this.deps.runs.finish(runId, {
        status: "succeeded",
        counters,
        cursorAfter: cursorToken,
      });

      log.info({ runId, counters }, "Sync run succeeded");
      return { outcome: "completed", runId, counters, cursor: cursorToken };
    } catch (error) {
      return await this.handleFailure({
        key,
        runId,
        counters,
        cursor: { ...cursor, cursorToken },
        machine,
        error,
        timedOut,
        cancelled: signal.aborted,
      });
    } finally {
      clearTimeout(watchdog);
      this.untrack(tenantId, controller);
      if (this.activeRunCount(tenantId) === 0) {
        this.deps.client.clearCache(tenantId);
      }
    }
  }

  private async advance(
    key: SyncKey,
    cursorAfter: string | null,
    current: string | null
  ): Promise<string | null> {
    if (cursorAfter === null) {
      return current;
    }
    await this.deps.cursors.advance(key, cursorAfter);
    return cursorAfter;
  }

  // ==========================================================================
  // Credentials
  // ==========================================================================

  private canRefresh(
    rail: RailSyncService,
    credential: RailCredential
  ): boolean {
    return (
      rail.refreshCredential !== undefined && credential.refreshToken !== null
    );
  }

  /**
   * Refresh ahead of the run when the token is inside the refresh buffer
   */
  private async prepareAuth(
    rail: RailSyncService,
    credential: RailCredential,
    signal: AbortSignal | undefined
  ): Promise<RunAuth> {
    if (
      this.canRefresh(rail, credential) &&
      this.deps.credentials.expiresWithin(
        credential,
        this.options.tokenRefreshBufferMs
      )
    ) {
      return {
        credential: await this.refreshCredential(rail, credential, signal),
        refreshed: true,
      };
    }
    return { credential, refreshed: false };
  }

  /**
   * Run a rail call, refreshing the token and retrying once on a 401
   */
  private async withAuthRetry<T>(
    rail: RailSyncService,
    auth: RunAuth,
    signal: AbortSignal | undefined,
    call: (credential: RailCredential) => Promise<T>
  ): Promise<T> {
    try {
      return await call(auth.credential);
    } catch (error) {
      if (
        auth.refreshed ||
        !this.canRefresh(rail, auth.credential) ||
        !(error instanceof FatalSyncError) ||
        error.status !== 401
      ) {
        throw error;
      }
      syncLogger.info(
        { tenantId: auth.credential.tenantId, rail: rail.name },
        "Access token rejected, refreshing once"
      );
      auth.credential = await this.refreshCredential(
        rail,
        auth.credential,
        signal
      );
      auth.refreshed = true;
      return await call(auth.credential);
    }
  }

  /**
   * One refresh per tenant and rail at a time; runs that need it together
   * share the result
   */
  private async refreshCredential(
    rail: RailSyncService,
    credential: RailCredential,
    signal: AbortSignal | undefined
  ): Promise<RailCredential> {
    const key = `${credential.tenantId}:${credential.rail}`;
    let pending = this.refreshing.get(key);
    if (pending === undefined) {
      pending = this.exchangeToken(rail, credential, signal).finally(() => {
        this.refreshing.delete(key);
      });
      this.refreshing.set(key, pending);
    }
    return await pending;
  }

  /**
   * A rejected refresh is an auth failure: the connection then needs the
   * tenant to re-authorize
   */
  private async exchangeToken(
    rail: RailSyncService,
    credential: RailCredential,
    signal: AbortSignal | undefined
  ): Promise<RailCredential> {
    if (rail.refreshCredential === undefined) {
      throw new FatalSyncError("Access token cannot be refreshed", "auth");
    }

    let grant: TokenGrant;
    try {
      grant = await rail.refreshCredential(credential, signal);
    } catch (error) {
      if (error instanceof FatalSyncError) {
        throw new FatalSyncError(
          `Token refresh failed: ${error.message}`,
          "auth",
          error.status,
          { cause: error }
        );
      }
      throw error;
    }

    const expiresAt =
      grant.expiresInSeconds === null
        ? null
        : new Date(
            this.now().getTime() + grant.expiresInSeconds * 1000
          ).toISOString();
    return await this.deps.credentials.updateTokens(credential, {
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiresAt,
    });
  }

  private async handleFailure(failure: {
    key: SyncKey;
    runId: string;
    counters: RunCounters;
    cursor: SyncCursor;
    machine: MachineState;
    error: unknown;
    timedOut: boolean;
    cancelled: boolean;
  }): Promise<TriggerResult> {
    const { key, runId, counters, cursor, error } = failure;
    const log = syncLogger.child({
      tenantId: key.tenantId,
      rail: key.rail,
      entityType: key.entityType,
      runId,
    });
    const now = this.now();

    const cancelled = failure.cancelled || error instanceof CancelledError;
    if (!failure.timedOut && cancelled) {
      const machine = transition(
        failure.machine,
        { type: "cancel" },
        this.options.retry,
        now
      );
      await this.deps.cursors.save({ ...cursor, ...machine });
      await this.deps.runs.finish(runId, {
        status: "cancelled",
        counters,
        cursorAfter: cursor.cursorToken,
        errorCode: "CANCELLED",
      });
      log.info({ counters }, "Sync run cancelled");
      return { outcome: "cancelled", runId, counters };
    }

    let event: SyncEvent;
    let errorCode: string;
    if (failure.timedOut) {
      event = { type: "recover" };
      errorCode = "TIMEOUT";
    } else if (error instanceof FatalSyncError) {
      event = { type: "fail", retryable: false };
      errorCode = error.code;
    } else {
      event = { type: "fail", retryable: true };
      errorCode = isSyncError(error) ? error.code : "INTERNAL";
    }

    const machine = transition(failure.machine, event, this.options.retry, now);
    const message = error instanceof Error ? error.message : String(error);

    await this.deps.cursors.save({
      ...cursor,
      ...machine,
      lastError: message,
      lastErrorCode: errorCode,
    });
    await this.deps.runs.finish(runId, {
      status:
        machine.state === "failed_fatal" ? "failed_fatal" : "failed_retryable",
      counters,
      cursorAfter: cursor.cursorToken,
      errorCode,
      errorMessage: message,
    });

    if (error instanceof FatalSyncError && error.needsReconnection) {
      await this.deps.credentials.markNeedsReconnection(
        key.tenantId,
        key.rail,
        error.message
      );
    }

    const retryable = machine.state === "failed_retryable";
    const level =
      retryable || error instanceof TransientSyncError ? "warn" : "error";
    log[level](
      {
        errorCode,
        error: message,
        state: machine.state,
        nextAttemptAt: machine.nextAttemptAt,
      },
      "Sync run failed"
    );

    return {
      outcome: "failed",
      runId,
      counters,
      errorCode,
      retryable,
      nextAttemptAt: machine.nextAttemptAt,
    };
  }

  // ==========================================================================
  // Cancellation
  // ==========================================================================

  private track(tenantId: string, controller: AbortController): void {
    const set = this.active.get(tenantId) ?? new Set<AbortController>();
    set.add(controller);
    this.active.set(tenantId, set);
  }

  private untrack(tenantId: string, controller: AbortController): void {
    const set = this.active.get(tenantId);
    if (set === undefined) {
      return;
    }
    set.delete(controller);
    if (set.size === 0) {
      this.active.delete(tenantId);
    }
  }

  /**
   * Abort every run in flight for a tenant. Returns the number aborted.
   */
  cancelTenant(tenantId: string): number {
    const set = this.active.get(tenantId);
    if (set === undefined) {
      return 0;
    }
    for (const controller of set) {
      controller.abort(new CancelledError(`Tenant ${tenantId} cancelled`));
    }
    syncLogger.info(
      { tenantId, runs: set.size },
      "Cancelled tenant sync runs"
    );
    return set.size;
  }

  /**
   * Abort every run in this process (shutdown)
   */
  cancelAll(): number {
    let count = 0;
    for (const tenantId of [...this.active.keys()]) {
      count += this.cancelTenant(tenantId);
    }
    return count;
  }

  activeRunCount(tenantId?: string): number {
    if (tenantId !== undefined) {
      return this.active.get(tenantId)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.active.values()) {
      total += set.size;
    }
    return total;
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Drop expired leases and close run rows their holders never finished
   */
  async sweepExpiredLeases(): Promise<{ leases: number; runs: number }> {
    const leases = await this.deps.leases.sweepExpired();
    const cutoff = new Date(
      this.now().getTime() - this.options.maxTaskDurationMs
    );
    const runs = await this.deps.runs.abandonStale(cutoff);
    return { leases, runs };
  }

  /**
   * Clear failed state for a tenant's rail after the cause was fixed.
   * Returns the number of keys reset.
   */
  async resolve(tenantId: string, railName: RailName): Promise<number> {
    const cursors = await this.deps.cursors.listForTenant(tenantId);
    let resolved = 0;
    for (const cursor of cursors) {
      if (
        cursor.rail !== railName ||
        (cursor.state !== "failed_fatal" &&
          cursor.state !== "failed_retryable")
      ) {
        continue;
      }
      const machine = transition(
        machineOf(cursor),
        { type: "resolve" },
        this.options.retry,
        this.now()
      );
      await this.deps.cursors.save({ ...cursor, ...machine });
      resolved++;
    }
    syncLogger.info(
      { tenantId, rail: railName, resolved },
      "Resolved sync keys"
    );
    return resolved;
  }

  /**
   * Soft-delete the mirror row for an entity the rail removed. Returns null
   * when the entity was never mirrored or is already deleted.
   */
  async applyRemoteDeletion(
    tenantId: string,
    railName: RailName,
    entityType: EntityType,
    deletion: RemoteDeletion
  ): Promise<MirrorWriteResult | null> {
    const record = await this.deps.mirror.get(
      tenantId,
      entityType,
      deletion.externalId
    );
    if (record === null || record.status === DELETED_STATUS) {
      return null;
    }

    const result = await this.deps.mirror.markDeleted(
      tenantId,
      entityType,
      record.id,
      {
        source: railName,
        occurredAt: deletion.occurredAt ?? this.now().toISOString(),
      }
    );
    syncLogger.info(
      {
        tenantId,
        rail: railName,
        entityType,
        externalId: deletion.externalId,
      },
      "Mirrored remote deletion"
    );
    return result;
  }

  // ==========================================================================
  // Health
  // ==========================================================================

  async health(tenantId: string): Promise<TenantHealth> {
    const now = this.now();
    const [cursors, credentials] = await Promise.all([
      this.deps.cursors.listForTenant(tenantId),
      this.deps.credentials.list(tenantId),
    ]);

    let overall: HealthStatus = "ok";

    const connections = credentials.map((credential) => {
      const reconnect = credential.status === "needs_reconnection";
      if (reconnect) {
        overall = worst(overall, "needs_attention");
      }
      return {
        rail: credential.rail,
        status: credential.status,
        message: reconnect ? publicMessageFor("FATAL_AUTH") : null,
      };
    });

    const keys = cursors.map((cursor): KeyHealth => {
      const stale = this.deps.policy.isStale(
        cursor.entityType,
        cursor.lastSuccessAt,
        now
      );
      let health: HealthStatus = "ok";
      if (cursor.state === "failed_fatal") {
        health = "needs_attention";
      } else if (
        cursor.state === "failed_retryable" ||
        cursor.consecutiveFailures > 0 ||
        stale
      ) {
        health = "degraded";
      }
      overall = worst(overall, health);

      return {
        rail: cursor.rail,
        entityType: cursor.entityType,
        state: cursor.state,
        health,
        lastSuccessfulSyncAt: cursor.lastSuccessAt,
        nextAttemptAt: cursor.nextAttemptAt,
        stale,
        message: publicMessageFor(cursor.lastErrorCode),
      };
    });

    return { tenantId, health: overall, connections, keys };
  }

  // ==========================================================================
  // Outbound
  // ==========================================================================

  /**
   * Push a locally created or edited record through an execution rail and
   * fold the rail's answer (external id, status) back into the mirror.
   */
  async pushLocalChange(
    input: PushLocalChangeInput
  ): Promise<MirrorWriteResult> {
    const { tenantId, entityType, entityId } = input;
    const rail = this.deps.rails.getExecution(input.rail);
    if (rail === null || !rail.pushableTypes.includes(entityType)) {
      throw new FatalSyncError(
        `Rail ${input.rail} cannot push ${entityType} records`,
        "unsupported"
      );
    }

    const stored = await this.deps.credentials.get(tenantId, rail.name);
    if (stored === null || stored.status !== "active") {
      throw new FatalSyncError(
        `No active ${rail.name} connection for tenant`,
        "auth"
      );
    }

    const record = await this.deps.mirror.getById(
      tenantId,
      entityType,
      entityId
    );
    if (record === null || record.status === DELETED_STATUS) {
      throw new RecordNotFoundError(entityType, entityId);
    }

    let pushed: PushResult;
    try {
      const auth = await this.prepareAuth(rail, stored, input.signal);
      pushed = await this.withAuthRetry(rail, auth, input.signal, (c) =>
        rail.push({
          tenantId,
          credential: c,
          record,
          signal: input.signal,
        })
      );
    } catch (error) {
      if (error instanceof FatalSyncError && error.needsReconnection) {
        await this.deps.credentials.markNeedsReconnection(
          tenantId,
          rail.name,
          error.message
        );
      }
      throw error;
    }

    const result = await this.deps.mirror.upsert(
      tenantId,
      pushed.entity,
      {
        source: rail.name,
        occurredAt: pushed.occurredAt,
        actorId: input.actorId,
      },
      { entityId }
    );

    syncLogger.info(
      {
        tenantId,
        rail: rail.name,
        entityType,
        entityId,
        externalId: result.record.externalId,
      },
      "Pushed local change"
    );
    return result;
  }
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancelledError();
  }
}
