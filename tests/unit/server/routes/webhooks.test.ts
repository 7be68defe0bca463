import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  signPayload,
  verifySignature,
} from "../../../../src/server/routes/webhooks.js";
import { createTestApp, type TestApp } from "../../../helpers/app.js";

const JSON_HEADERS = { "content-type": "application/json" };

describe("Webhook Routes", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp(2);
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe("verifySignature", () => {
    it("should accept only the signature of the exact payload", () => {
      const signature = signPayload("test-secret", '{"a":1}', "hex");

      expect(verifySignature("test-secret", '{"a":1}', signature, "hex")).toBe(true);
      expect(verifySignature("test-secret", '{"a": 1}', signature, "hex")).toBe(false);
      expect(verifySignature("test-secret", '{"a":1}', undefined, "hex")).toBe(false);
      expect(verifySignature("", '{"a":1}', signature, "hex")).toBe(false);
    });
  });

  describe("POST /webhooks/quickbooks", () => {
    const body = JSON.stringify({
      eventNotifications: [
        {
          realmId: "realm-1",
          dataChangeEvent: {
            entities: [{ name: "Bill", id: "bill-1", operation: "Update" }],
          },
        },
      ],
    });

    it("should acknowledge a signed notice and sync in the background", async () => {
      const response = await ctx.app.inject({
        method: "POST",
        url: "/webhooks/quickbooks",
        headers: {
          ...JSON_HEADERS,
          "intuit-signature": signPayload("test-verifier", body, "base64"),
        },
        payload: body,
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ data: { accepted: 1 } });

      await ctx.services.webhooks.drain();

      const runs = await ctx.services.runs.list("tenant-1");
      expect(runs.map((r) => [r.entity_type, r.trigger, r.status])).toEqual([
        ["bill", "webhook", "succeeded"],
      ]);
      expect(await ctx.services.mirror.query("tenant-1", "bill")).toHaveLength(2);
    });

    it("should soft-delete a bill the ledger reports removed", async () => {
      await ctx.services.orchestrator.trigger("tenant-1", "quickbooks", "bill");
      const removal = JSON.stringify({
        eventNotifications: [
          {
            realmId: "realm-1",
            dataChangeEvent: {
              entities: [
                {
                  name: "Bill",
                  id: "bill-1",
                  operation: "Delete",
                  lastUpdated: "2026-03-02T08:30:00.000Z",
                },
              ],
            },
          },
        ],
      });

      const response = await ctx.app.inject({
        method: "POST",
        url: "/webhooks/quickbooks",
        headers: {
          ...JSON_HEADERS,
          "intuit-signature": signPayload("test-verifier", removal, "base64"),
        },
        payload: removal,
      });

      expect(response.statusCode).toBe(202);
      await ctx.services.webhooks.drain();

      const removed = await ctx.services.mirror.get("tenant-1", "bill", "bill-1");
      expect(removed).toMatchObject({ status: "deleted", syncSource: "quickbooks" });
      expect((await ctx.services.mirror.query("tenant-1", "bill")).map((r) => r.externalId)).toEqual([
        "bill-2",
      ]);
      const runs = await ctx.services.runs.list("tenant-1");
      expect(runs.map((r) => r.trigger)).toEqual(["manual"]);
    });

    it("should reject a bad signature without syncing", async () => {
      const response = await ctx.app.inject({
        method: "POST",
        url: "/webhooks/quickbooks",
        headers: { ...JSON_HEADERS, "intuit-signature": "bogus" },
        payload: body,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ error: "UNAUTHORIZED" });
      expect(ctx.services.webhooks.pending).toBe(0);
      expect(ctx.rail.fetchCalls).toBe(0);
    });

    it("should reject a signed body that is not JSON", async () => {
      const raw = "not json";
      const response = await ctx.app.inject({
        method: "POST",
        url: "/webhooks/quickbooks",
        headers: {
          ...JSON_HEADERS,
          "intuit-signature": signPayload("test-verifier", raw, "base64"),
        },
        payload: raw,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "Webhook body is not valid JSON",
      });
    });
  });

  describe("POST /webhooks/billpay", () => {
    function signed(event: Record<string, unknown>) {
      const raw = JSON.stringify(event);
      return {
        method: "POST" as const,
        url: "/webhooks/billpay",
        headers: {
          ...JSON_HEADERS,
          "x-billpay-signature": signPayload("test-secret", raw, "hex"),
        },
        payload: raw,
      };
    }

    it("should accept a mirrored event type", async () => {
      const response = await ctx.app.inject(
        signed({ type: "payment.updated", account_id: "acct-1" })
      );

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ data: { accepted: 1 } });
      await ctx.services.webhooks.drain();
    });

    it("should acknowledge and drop other event types", async () => {
      const response = await ctx.app.inject(
        signed({ type: "invoice.created", account_id: "acct-1" })
      );

      expect(response.json()).toEqual({ data: { accepted: 0 } });
      expect(ctx.services.webhooks.pending).toBe(0);
    });
  });
});
