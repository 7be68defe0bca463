/**
 * Sync error taxonomy
 *
 * Every failure that crosses a component boundary is one of these. The
 * orchestrator decides retry vs. halt from the class alone; tenants only
 * ever see the stable `code`.
 */

export type SyncErrorCode =
  | "TRANSIENT"
  | "FATAL_AUTH"
  | "FATAL_VALIDATION"
  | "FATAL_NOT_FOUND"
  | "FATAL_CONFIGURATION"
  | "FATAL_UNSUPPORTED"
  | "MAPPING"
  | "PERSISTENCE"
  | "DUPLICATE_LOG_ENTRY"
  | "CANCELLED";

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Timeout, 5xx, 429 or a dropped connection that outlived its retries
 */
export class TransientSyncError extends SyncError {
  readonly code = "TRANSIENT" as const;

  constructor(
    message: string,
    readonly status: number | null = null,
    readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type FatalReason =
  | "auth"
  | "validation"
  | "not_found"
  | "configuration"
  | "unsupported";

const FATAL_CODES = {
  auth: "FATAL_AUTH",
  validation: "FATAL_VALIDATION",
  not_found: "FATAL_NOT_FOUND",
  configuration: "FATAL_CONFIGURATION",
  unsupported: "FATAL_UNSUPPORTED",
} as const satisfies Record<FatalReason, SyncErrorCode>;

export class FatalSyncError extends SyncError {
  readonly code: (typeof FATAL_CODES)[FatalReason];

  constructor(
    message: string,
    readonly reason: FatalReason,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = FATAL_CODES[reason];
  }

  get needsReconnection(): boolean {
    return this.reason === "auth";
  }
}

/**
 * A single external record could not be mapped to the canonical shape
 */
export class MappingError extends SyncError {
  readonly code = "MAPPING" as const;

  constructor(
    message: string,
    readonly externalId: string | null = null,
    readonly details: string[] = []
  ) {
    super(message);
  }
}

export class PersistenceError extends SyncError {
  readonly code = "PERSISTENCE" as const;
}

export class DuplicateLogEntryError extends SyncError {
  readonly code = "DUPLICATE_LOG_ENTRY" as const;

  constructor(
    readonly idempotencyKey: string,
    readonly existingLogId: string
  ) {
    super(`Log entry already recorded as ${existingLogId}`);
  }
}

export class CancelledError extends SyncError {
  readonly code = "CANCELLED" as const;

  constructor(message = "Sync run cancelled") {
    super(message);
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Human-safe message for a code; raw error text never leaves the service
 */
export function publicMessageFor(code: string | null): string | null {
  switch (code) {
    case null:
      return null;
    case "FATAL_AUTH":
      return "The connection to this provider needs to be re-authorized.";
    case "TRANSIENT":
      return "The provider was temporarily unavailable; a retry is scheduled.";
    case "PERSISTENCE":
      return "Changes could not be saved; a retry is scheduled.";
    case "CANCELLED":
      return "The last sync was cancelled.";
    case "TIMEOUT":
      return "The last sync took too long and was stopped.";
    default:
      return "The last sync could not complete.";
  }
}
