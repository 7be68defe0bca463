/**
 * CredentialStore - per-tenant, per-rail access credentials
 *
 * Tokens are opaque to this service. The rail's OAuth flow refreshes them
 * and stores the result through `updateTokens`. An expired credential with
 * no refresh token reads as needing reconnection.
 */

import { syncLogger } from "../logger.js";
import {
  isRailName,
  type RailCredential,
  type RailName,
} from "../types/index.js";
import { PersistenceError } from "./sync/errors.js";

import type { Database, RailCredentialRow } from "../db/types.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface SaveCredentialInput {
  tenantId: string;
  rail: RailName;
  accessToken: string;
  refreshToken?: string | null;
  accountId?: string | null;
  expiresAt?: string | null;
}

export interface RefreshedTokens {
  accessToken: string;
  /** Null keeps the stored refresh token */
  refreshToken: string | null;
  expiresAt: string | null;
}

/** Credential listing without secrets, for status displays */
export interface CredentialSummary {
  tenantId: string;
  rail: RailName;
  accountId: string | null;
  expiresAt: string | null;
  status: RailCredential["status"];
  statusReason: string | null;
}

function rowToCredential(row: RailCredentialRow): RailCredential {
  if (!isRailName(row.rail)) {
    throw new PersistenceError(
      `Unknown rail "${row.rail}" in rail_credentials`
    );
  }
  return {
    tenantId: row.tenant_id,
    rail: row.rail,
    accessToken: row.access_token,
    refreshToken: row.refresh_token,
    accountId: row.account_id,
    expiresAt: row.expires_at,
    status: row.status,
  };
}

// ============================================================================
// CredentialStore
// ============================================================================

export class CredentialStore {
  constructor(
    private db: Kysely<Database>,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Store (or replace) a credential; saving always reactivates it
   */
  async save(input: SaveCredentialInput): Promise<void> {
    const values = {
      access_token: input.accessToken,
      refresh_token: input.refreshToken ?? null,
      account_id: input.accountId ?? null,
      expires_at: input.expiresAt ?? null,
      status: "active" as const,
      status_reason: null,
      updated_at: this.now().toISOString(),
    };

    await this.db
      .insertInto("rail_credentials")
      .values({ tenant_id: input.tenantId, rail: input.rail, ...values })
      .onConflict((oc) => oc.columns(["tenant_id", "rail"]).doUpdateSet(values))
      .execute();

    syncLogger.info(
      { tenantId: input.tenantId, rail: input.rail },
      "Rail credential saved"
    );
  }

  /**
   * Credential for a tenant and rail. An expired active credential is
   * reported as needing reconnection.
   */
  async get(tenantId: string, rail: RailName): Promise<RailCredential | null> {
    const row = await this.db
      .selectFrom("rail_credentials")
      .selectAll()
      .where("tenant_id", "=", tenantId)
      .where("rail", "=", rail)
      .executeTakeFirst();

    if (row === undefined) {
      return null;
    }
    const credential = rowToCredential(row);
    if (credential.status === "active" && this.isLapsed(credential)) {
      return { ...credential, status: "needs_reconnection" };
    }
    return credential;
  }

  /**
   * Whether the access token expires within `bufferMs` of now
   */
  expiresWithin(credential: RailCredential, bufferMs: number): boolean {
    return (
      credential.expiresAt !== null &&
      Date.parse(credential.expiresAt) - bufferMs <= this.now().getTime()
    );
  }

  /**
   * Store a refreshed token pair and return the updated credential
   */
  async updateTokens(
    credential: RailCredential,
    tokens: RefreshedTokens
  ): Promise<RailCredential> {
    const refreshToken = tokens.refreshToken ?? credential.refreshToken;
    await this.db
      .updateTable("rail_credentials")
      .set({
        access_token: tokens.accessToken,
        refresh_token: refreshToken,
        expires_at: tokens.expiresAt,
        status: "active",
        status_reason: null,
        updated_at: this.now().toISOString(),
      })
      .where("tenant_id", "=", credential.tenantId)
      .where("rail", "=", credential.rail)
      .execute();

    syncLogger.info(
      {
        tenantId: credential.tenantId,
        rail: credential.rail,
        expiresAt: tokens.expiresAt,
      },
      "Rail access token refreshed"
    );

    return {
      ...credential,
      accessToken: tokens.accessToken,
      refreshToken,
      expiresAt: tokens.expiresAt,
      status: "active",
    };
  }

  /**
   * Every active credential, optionally for one rail (scheduler input)
   */
  async listActive(rail?: RailName): Promise<RailCredential[]> {
    let query = this.db
      .selectFrom("rail_credentials")
      .selectAll()
      .where("status", "=", "active");

    if (rail !== undefined) {
      query = query.where("rail", "=", rail);
    }

    const rows = await query
      .orderBy("tenant_id", "asc")
      .orderBy("rail", "asc")
      .execute();

    return rows.map(rowToCredential).filter((c) => !this.isLapsed(c));
  }

  async list(tenantId?: string): Promise<CredentialSummary[]> {
    let query = this.db.selectFrom("rail_credentials").selectAll();
    if (tenantId !== undefined) {
      query = query.where("tenant_id", "=", tenantId);
    }
    const rows = await query
      .orderBy("tenant_id", "asc")
      .orderBy("rail", "asc")
      .execute();

    return rows.map((row) => {
      const credential = rowToCredential(row);
      const expired =
        credential.status === "active" && this.isLapsed(credential);
      return {
        tenantId: credential.tenantId,
        rail: credential.rail,
        accountId: credential.accountId,
        expiresAt: credential.expiresAt,
        status: expired ? "needs_reconnection" : credential.status,
        statusReason: expired ? "expired" : row.status_reason,
      };
    });
  }

  /**
   * Resolve a webhook's rail account id (e.g. a realm id) to its tenant
   */
  async findByAccount(
    rail: RailName,
    accountId: string
  ): Promise<RailCredential | null> {
    const row = await this.db
      .selectFrom("rail_credentials")
      .selectAll()
      .where("rail", "=", rail)
      .where("account_id", "=", accountId)
      .executeTakeFirst();

    return row === undefined ? null : rowToCredential(row);
  }

  async markNeedsReconnection(
    tenantId: string,
    rail: RailName,
    reason: string
  ): Promise<void> {
    await this.db
      .updateTable("rail_credentials")
      .set({
        status: "needs_reconnection",
        status_reason: reason,
        updated_at: this.now().toISOString(),
      })
      .where("tenant_id", "=", tenantId)
      .where("rail", "=", rail)
      .execute();

    syncLogger.warn({ tenantId, rail, reason }, "Credential needs reconnection");
  }

  async remove(tenantId: string, rail: RailName): Promise<boolean> {
    const result = await this.db
      .deleteFrom("rail_credentials")
      .where("tenant_id", "=", tenantId)
      .where("rail", "=", rail)
      .executeTakeFirst();
    return Number(result.numDeletedRows) > 0;
  }

  /** Expired with no way to refresh */
  private isLapsed(credential: RailCredential): boolean {
    return credential.refreshToken === null && this.expiresWithin(credential, 0);
  }
}
