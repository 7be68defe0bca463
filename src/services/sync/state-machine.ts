/**
 * Per-key sync state machine
 *
 *   idle -> running -> succeeded | failed_retryable | failed_fatal
 *   failed_retryable -> idle        (backoff elapsed)
 *   failed_fatal     -> idle        (resolved by tenant/operator)
 *
 * A retryable failure that reaches the consecutive-failure limit becomes
 * failed_fatal.
 */

import type { SyncState } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicy {
  initialBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
  maxConsecutiveFailures: number;
}

export interface MachineState {
  state: SyncState;
  consecutiveFailures: number;
  nextAttemptAt: string | null;
}

export type SyncEvent =
  | { type: "start" }
  | { type: "succeed" }
  | { type: "fail"; retryable: boolean }
  | { type: "cancel" }
  | { type: "backoff_elapsed" }
  | { type: "resolve" }
  /** Lease lost without a clean finish (watchdog, crash) */
  | { type: "recover" };

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: SyncState,
    readonly event: SyncEvent["type"]
  ) {
    super(`Cannot apply "${event}" in state "${from}"`);
    this.name = "InvalidTransitionError";
  }
}

// ============================================================================
// Backoff
// ============================================================================

export function retryDelayMs(policy: RetryPolicy, failures: number): number {
  return Math.min(
    policy.initialBackoffMs *
      Math.pow(policy.backoffMultiplier, Math.max(0, failures - 1)),
    policy.maxBackoffMs
  );
}

// ============================================================================
// Transition
// ============================================================================

export function transition(
  current: MachineState,
  event: SyncEvent,
  policy: RetryPolicy,
  now: Date
): MachineState {
  const { state } = current;

  switch (event.type) {
    case "start":
      if (state === "running" || state === "failed_fatal") {
        throw new InvalidTransitionError(state, event.type);
      }
      return { ...current, state: "running" };

    case "succeed":
      if (state !== "running") {
        throw new InvalidTransitionError(state, event.type);
      }
      return { state: "succeeded", consecutiveFailures: 0, nextAttemptAt: null };

    case "fail": {
      if (state !== "running") {
        throw new InvalidTransitionError(state, event.type);
      }
      const failures = current.consecutiveFailures + 1;
      if (!event.retryable || failures >= policy.maxConsecutiveFailures) {
        return {
          state: "failed_fatal",
          consecutiveFailures: failures,
          nextAttemptAt: null,
        };
      }
      return {
        state: "failed_retryable",
        consecutiveFailures: failures,
        nextAttemptAt: new Date(
          now.getTime() + retryDelayMs(policy, failures)
        ).toISOString(),
      };
    }

    case "cancel":
      if (state !== "running") {
        throw new InvalidTransitionError(state, event.type);
      }
      // Cancellation is not a failure: the key goes back to idle untouched
      return { ...current, state: "idle" };

    case "backoff_elapsed":
      if (state !== "failed_retryable") {
        throw new InvalidTransitionError(state, event.type);
      }
      return { ...current, state: "idle", nextAttemptAt: null };

    case "resolve":
      if (state !== "failed_fatal" && state !== "failed_retryable") {
        throw new InvalidTransitionError(state, event.type);
      }
      return { state: "idle", consecutiveFailures: 0, nextAttemptAt: null };

    case "recover":
      if (state !== "running") {
        throw new InvalidTransitionError(state, event.type);
      }
      return transition(
        current,
        { type: "fail", retryable: true },
        policy,
        now
      );
  }
}

/**
 * Whether a retry backoff is still pending at `now`
 */
export function isBackingOff(current: MachineState, now: Date): boolean {
  return (
    current.state === "failed_retryable" &&
    current.nextAttemptAt !== null &&
    current.nextAttemptAt > now.toISOString()
  );
}
