/**
 * Freshness policy per entity type
 *
 * Soft TTL: a scheduled sync is skipped while the last success is younger.
 * Hard TTL: past this age the data counts as stale and health degrades.
 */

import type { EntityType } from "../../types/index.js";

export interface FreshnessTtl {
  softTtlMs: number;
  hardTtlMs: number;
}

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

export const DEFAULT_ENTITY_POLICY: Record<EntityType, FreshnessTtl> = {
  bill: { softTtlMs: 5 * MINUTE, hardTtlMs: HOUR },
  invoice: { softTtlMs: 15 * MINUTE, hardTtlMs: HOUR },
  vendor: { softTtlMs: HOUR, hardTtlMs: 24 * HOUR },
  payment: { softTtlMs: 15 * MINUTE, hardTtlMs: HOUR },
  balance: { softTtlMs: 2 * MINUTE, hardTtlMs: 10 * MINUTE },
};

export class EntityPolicy {
  constructor(
    private readonly ttls: Record<
      EntityType,
      FreshnessTtl
    > = DEFAULT_ENTITY_POLICY
  ) {}

  get(entityType: EntityType): FreshnessTtl {
    return this.ttls[entityType];
  }

  isFresh(
    entityType: EntityType,
    lastSuccessAt: string | null,
    now: Date
  ): boolean {
    if (lastSuccessAt === null) {
      return false;
    }
    const age = now.getTime() - Date.parse(lastSuccessAt);
    return age <= this.ttls[entityType].softTtlMs;
  }

  isStale(
    entityType: EntityType,
    lastSuccessAt: string | null,
    now: Date
  ): boolean {
    if (lastSuccessAt === null) {
      return true;
    }
    const age = now.getTime() - Date.parse(lastSuccessAt);
    return age > this.ttls[entityType].hardTtlMs;
  }
}
