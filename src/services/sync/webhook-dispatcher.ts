/**
 * WebhookDispatcher - turn verified rail change notices into sync triggers
 *
 * The HTTP handler acknowledges immediately; the triggers run in the
 * background and are tracked so shutdown (and tests) can wait for them.
 */

import { syncLogger } from "../../logger.js";

import type { SyncOrchestrator, TriggerResult } from "./orchestrator.js";
import type { EntityType, RailName } from "../../types/index.js";
import type { CredentialStore } from "../credentials.js";
import type { RemoteDeletion } from "../rails/types.js";

export interface ChangeNotice {
  /** Rail-side account id (QuickBooks realm, bill-pay account) */
  accountId: string;
  entityTypes: EntityType[];
  /** Removals the notice reports, applied without a re-sync */
  deletions?: (RemoteDeletion & { entityType: EntityType })[];
}

export class WebhookDispatcher {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private credentials: CredentialStore,
    private orchestrator: SyncOrchestrator
  ) {}

  /**
   * Start the triggers for a batch of notices without waiting for them
   */
  enqueue(rail: RailName, notices: ChangeNotice[]): void {
    const work: Promise<void> = this.process(rail, notices)
      .catch((error: unknown) => {
        syncLogger.error({ rail, error }, "Webhook dispatch failed");
      })
      .finally(() => {
        this.inFlight.delete(work);
      });
    this.inFlight.add(work);
  }

  /**
   * Wait for every enqueued batch to finish
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  get pending(): number {
    return this.inFlight.size;
  }

  private async process(
    rail: RailName,
    notices: ChangeNotice[]
  ): Promise<void> {
    for (const notice of notices) {
      const credential = await this.credentials.findByAccount(
        rail,
        notice.accountId
      );
      if (credential === null) {
        syncLogger.warn(
          { rail, accountId: notice.accountId },
          "Webhook for unknown account ignored"
        );
        continue;
      }

      for (const deletion of notice.deletions ?? []) {
        try {
          await this.orchestrator.applyRemoteDeletion(
            credential.tenantId,
            rail,
            deletion.entityType,
            deletion
          );
        } catch (error) {
          syncLogger.error(
            {
              tenantId: credential.tenantId,
              rail,
              entityType: deletion.entityType,
              externalId: deletion.externalId,
              error,
            },
            "Webhook deletion failed"
          );
        }
      }

      const settled = await Promise.allSettled(
        notice.entityTypes.map(
          (entityType): Promise<TriggerResult> =>
            this.orchestrator.trigger(credential.tenantId, rail, entityType, {
              source: "webhook",
            })
        )
      );

      settled.forEach((result, index) => {
        const entityType = notice.entityTypes[index];
        if (result.status === "rejected") {
          syncLogger.error(
            {
              tenantId: credential.tenantId,
              rail,
              entityType,
              error: result.reason,
            },
            "Webhook-triggered sync threw"
          );
        } else {
          syncLogger.debug(
            {
              tenantId: credential.tenantId,
              rail,
              entityType,
              outcome: result.value.outcome,
            },
            "Webhook-triggered sync finished"
          );
        }
      });
    }
  }
}
