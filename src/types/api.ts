/**
 * API Request/Response Types
 */

import type { EntityType } from "./index.js";
import type { SyncRunStatus, SyncTrigger } from "../db/types.js";
import type { PaginationMeta } from "../utils/pagination.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiResponse<T> {
  data: T;
  meta?: {
    pagination?: PaginationMeta;
  };
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Sync Types
// ============================================================================

export interface SyncRunDto {
  runId: string;
  rail: string;
  entityType: EntityType;
  trigger: SyncTrigger;
  status: SyncRunStatus;
  counters: {
    fetched: number;
    created: number;
    updated: number;
    synced: number;
    deleted: number;
    unchanged: number;
    skipped: number;
    logPending: number;
  };
  /** Stable code only; raw error text stays internal */
  errorCode: string | null;
  message: string | null;
  startedAt: string;
  finishedAt: string | null;
}

export interface TriggerResponseDto {
  rail: string;
  entityType: EntityType;
  outcome: "completed" | "failed" | "cancelled" | "skipped";
  runId: string | null;
  reason: string | null;
}
