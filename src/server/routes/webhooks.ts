/**
 * Webhook Routes
 *
 * Rails sign the raw request body with HMAC-SHA256. The body is kept as a
 * string inside this plugin scope so the signature is checked over the
 * exact bytes received; JSON parsing happens only after it matches.
 */

import { createHmac, timingSafeEqual } from "node:crypto";

import { parseBillpayWebhook } from "../../services/rails/billpay.js";
import { parseQuickbooksWebhook } from "../../services/rails/quickbooks.js";
import { UnauthorizedError, ValidationError } from "../plugins/error-handler.js";

import type { Services } from "../../services/index.js";
import type { FastifyInstance, FastifyRequest } from "fastify";

// ============================================================================
// Signatures
// ============================================================================

export function signPayload(
  secret: string,
  payload: string,
  encoding: "base64" | "hex"
): string {
  return createHmac("sha256", secret).update(payload).digest(encoding);
}

export function verifySignature(
  secret: string,
  payload: string,
  signature: string | undefined,
  encoding: "base64" | "hex"
): boolean {
  if (secret === "" || signature === undefined || signature === "") {
    return false;
  }
  const expected = Buffer.from(signPayload(secret, payload, encoding));
  const received = Buffer.from(signature);
  return (
    expected.length === received.length && timingSafeEqual(expected, received)
  );
}

function header(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function parseBody(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError("Webhook body is not valid JSON");
  }
}

// ============================================================================
// Route Registration
// ============================================================================

export async function registerWebhookRoutes(
  app: FastifyInstance,
  services: Services
): Promise<void> {
  const { quickbooks, billpay } = services.config.rails;

  await app.register((scope, _opts, done) => {
    scope.addContentTypeParser(
      "application/json",
      { parseAs: "string" },
      (_request, body, next) => {
        next(null, body);
      }
    );

    // POST /webhooks/quickbooks - intuit-signature: base64 HMAC
    scope.post<{ Body: string }>(
      "/webhooks/quickbooks",
      {
        schema: {
          summary: "QuickBooks change notification",
          tags: ["Webhooks"],
        },
      },
      async (request, reply) => {
        const raw = String(request.body);
        if (
          !verifySignature(
            quickbooks.webhookVerifierToken,
            raw,
            header(request, "intuit-signature"),
            "base64"
          )
        ) {
          throw new UnauthorizedError("Invalid webhook signature");
        }

        const notices = parseQuickbooksWebhook(parseBody(raw));
        if (notices === null) {
          throw new ValidationError("Unrecognized QuickBooks notification");
        }

        services.webhooks.enqueue(
          "quickbooks",
          notices.map((n) => ({
            accountId: n.realmId,
            entityTypes: n.entityTypes,
            deletions: n.deletions,
          }))
        );
        return reply.status(202).send({ data: { accepted: notices.length } });
      }
    );

    // POST /webhooks/billpay - x-billpay-signature: hex HMAC
    scope.post<{ Body: string }>(
      "/webhooks/billpay",
      {
        schema: {
          summary: "Bill-pay event",
          tags: ["Webhooks"],
        },
      },
      async (request, reply) => {
        const raw = String(request.body);
        if (
          !verifySignature(
            billpay.webhookSecret,
            raw,
            header(request, "x-billpay-signature"),
            "hex"
          )
        ) {
          throw new UnauthorizedError("Invalid webhook signature");
        }

        const notice = parseBillpayWebhook(parseBody(raw));
        if (notice === null) {
          // Event types we do not mirror are acknowledged and dropped
          return reply.status(202).send({ data: { accepted: 0 } });
        }

        services.webhooks.enqueue("billpay", [
          { accountId: notice.accountId, entityTypes: [notice.entityType] },
        ]);
        return reply.status(202).send({ data: { accepted: 1 } });
      }
    );

    done();
  });
}
