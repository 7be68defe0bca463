/**
 * RailSyncService - one capability interface, tagged by kind
 *
 * Rails translate native payloads into canonical entities. They hold no
 * caches and never retry: the RateLimitedClient and the orchestrator own
 * those concerns.
 */

import type { RateLimitedClient } from "../../http/rate-limited-client.js";
import type {
  CanonicalEntity,
  EntityType,
  MirrorRecord,
  RailCredential,
  RailName,
} from "../../types/index.js";

// ============================================================================
// Fetch
// ============================================================================

export interface FetchPageRequest {
  tenantId: string;
  entityType: EntityType;
  /** Opaque position from a previous RailRecord.cursorAfter */
  cursor: string | null;
  pageSize: number;
  credential: RailCredential;
  signal?: AbortSignal;
}

export interface RailRecord {
  /** Null when the payload is too broken to identify */
  externalId: string | null;
  /** Rail-side modification time, used as the change's occurred_at */
  occurredAt: string | null;
  /** Position to store once this record is committed */
  cursorAfter: string | null;
  payload: unknown;
}

export interface FetchPage {
  records: RailRecord[];
  hasMore: boolean;
}

/** An entity the rail reports as removed */
export interface RemoteDeletion {
  externalId: string;
  /** Rail-side removal time when the rail reports one */
  occurredAt: string | null;
}

export interface DeletionRequest {
  tenantId: string;
  entityType: EntityType;
  /** Position the run started from; null on a first full sync */
  cursor: string | null;
  credential: RailCredential;
  signal?: AbortSignal;
}

// ============================================================================
// Credentials
// ============================================================================

export interface TokenGrant {
  accessToken: string;
  /** Null when the rail keeps the previous refresh token */
  refreshToken: string | null;
  expiresInSeconds: number | null;
}

// ============================================================================
// Push (execution rails only)
// ============================================================================

export interface PushRequest {
  tenantId: string;
  credential: RailCredential;
  record: MirrorRecord;
  signal?: AbortSignal;
}

export interface PushResult {
  entity: CanonicalEntity;
  occurredAt: string;
}

// ============================================================================
// Variants
// ============================================================================

interface RailCapabilities {
  readonly name: RailName;
  readonly entityTypes: readonly EntityType[];

  fetch(request: FetchPageRequest): Promise<FetchPage>;

  /**
   * Map one native payload; throws MappingError on an unexpected shape
   */
  map(entityType: EntityType, payload: unknown): CanonicalEntity;

  /**
   * Exchange the credential's refresh token for a new access token.
   * Rails without OAuth refresh leave this out.
   */
  refreshCredential?(
    credential: RailCredential,
    signal?: AbortSignal
  ): Promise<TokenGrant>;
}

/** Read-only source of truth (an accounting ledger) */
export interface LedgerRailService extends RailCapabilities {
  readonly kind: "ledger";

  /**
   * Entities removed since `cursor`; the incremental fetch never returns
   * them
   */
  fetchDeletions?(request: DeletionRequest): Promise<RemoteDeletion[]>;
}

/** Rail that can also carry local writes outward */
export interface ExecutionRailService extends RailCapabilities {
  readonly kind: "execution";
  readonly pushableTypes: readonly EntityType[];

  push(request: PushRequest): Promise<PushResult>;
}

export type RailSyncService = LedgerRailService | ExecutionRailService;

export interface RailContext {
  client: RateLimitedClient;
  baseUrl: string;
}

export function supportsEntity(
  rail: RailSyncService,
  entityType: EntityType
): boolean {
  return rail.entityTypes.includes(entityType);
}
