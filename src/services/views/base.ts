/**
 * DataOrchestrator base - one subclass per consumer use case
 *
 * Views read the mirror (and their own workflow tables) only. They never
 * reach a rail, so a view is reproducible from local state at any time.
 */

import type { EntityType, MirrorRecord } from "../../types/index.js";
import type {
  MirrorQueryFilter,
  MirrorStore,
} from "../mirror/mirror-store.js";

export interface ViewEnvelope {
  tenantId: string;
  generatedAt: string;
}

export abstract class BaseDataOrchestrator<TView extends ViewEnvelope> {
  abstract readonly name: string;

  constructor(
    protected mirror: MirrorStore,
    protected now: () => Date = () => new Date()
  ) {}

  abstract getView(tenantId: string): Promise<TView>;

  /**
   * Mirror rows of several entity types, in the mirror's own order per type
   */
  protected async collect(
    tenantId: string,
    entityTypes: readonly EntityType[],
    filter: MirrorQueryFilter = {}
  ): Promise<MirrorRecord[]> {
    const batches = await Promise.all(
      entityTypes.map((type) =>
        this.mirror.query(tenantId, type, {
          limit: Number.MAX_SAFE_INTEGER,
          ...filter,
        })
      )
    );
    return batches.flat();
  }

  protected envelope(tenantId: string): ViewEnvelope {
    return { tenantId, generatedAt: this.now().toISOString() };
  }
}
