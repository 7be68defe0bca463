/**
 * LeaseStore - at most one sync run per (tenant, rail, entity type)
 *
 * Acquisition is a single conditional upsert: a new lease row is inserted,
 * or an expired one is taken over. Never waits on a held lease.
 */

import { randomUUID } from "node:crypto";
import { hostname } from "node:os";

import { syncLogger } from "../../logger.js";
import { syncKeyToString, type SyncKey } from "../../types/index.js";

import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface Lease {
  key: string;
  token: string;
  holder: string;
  acquiredAt: string;
  expiresAt: string;
}

// ============================================================================
// LeaseStore
// ============================================================================

export class LeaseStore {
  readonly holder: string;

  constructor(
    private db: Kysely<Database>,
    private now: () => Date = () => new Date()
  ) {
    // Unique per process so operators can tell who holds a lease
    this.holder = `${hostname()}-${String(process.pid)}-${Math.random().toString(36).slice(2, 8)}`;
  }

  /**
   * Try to take the lease for a key. Returns null when another holder has
   * an unexpired lease.
   */
  async tryAcquire(key: SyncKey, durationMs: number): Promise<Lease | null> {
    const leaseKey = syncKeyToString(key);
    const now = this.now();
    const acquiredAt = now.toISOString();
    const expiresAt = new Date(now.getTime() + durationMs).toISOString();
    const token = randomUUID();

    const row = await this.db
      .insertInto("sync_leases")
      .values({
        lease_key: leaseKey,
        token,
        holder: this.holder,
        acquired_at: acquiredAt,
        expires_at: expiresAt,
      })
      .onConflict((oc) =>
        oc
          .column("lease_key")
          .doUpdateSet({
            token,
            holder: this.holder,
            acquired_at: acquiredAt,
            expires_at: expiresAt,
          })
          .where("sync_leases.expires_at", "<=", acquiredAt)
      )
      .returning(["token"])
      .executeTakeFirst();

    if (row?.token !== token) {
      syncLogger.debug({ leaseKey }, "Lease held elsewhere");
      return null;
    }

    return {
      key: leaseKey,
      token,
      holder: this.holder,
      acquiredAt,
      expiresAt,
    };
  }

  /**
   * Release a lease we hold. A lease taken over after expiry is left alone.
   */
  async release(lease: Lease): Promise<boolean> {
    const result = await this.db
      .deleteFrom("sync_leases")
      .where("lease_key", "=", lease.key)
      .where("token", "=", lease.token)
      .executeTakeFirst();

    return Number(result.numDeletedRows) > 0;
  }

  /**
   * Drop a lease regardless of holder (watchdog, operator override)
   */
  async forceRelease(key: SyncKey): Promise<boolean> {
    const result = await this.db
      .deleteFrom("sync_leases")
      .where("lease_key", "=", syncKeyToString(key))
      .executeTakeFirst();

    return Number(result.numDeletedRows) > 0;
  }

  async get(key: SyncKey): Promise<Lease | null> {
    const row = await this.db
      .selectFrom("sync_leases")
      .selectAll()
      .where("lease_key", "=", syncKeyToString(key))
      .executeTakeFirst();

    if (row === undefined) {
      return null;
    }
    return {
      key: row.lease_key,
      token: row.token,
      holder: row.holder,
      acquiredAt: row.acquired_at,
      expiresAt: row.expires_at,
    };
  }

  /**
   * Delete every expired lease. Returns the number removed.
   */
  async sweepExpired(): Promise<number> {
    const result = await this.db
      .deleteFrom("sync_leases")
      .where("expires_at", "<=", this.now().toISOString())
      .executeTakeFirst();

    const removed = Number(result.numDeletedRows);
    if (removed > 0) {
      syncLogger.warn({ removed }, "Swept expired sync leases");
    }
    return removed;
  }
}
