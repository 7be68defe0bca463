/**
 * Application configuration
 *
 * Environment variables (loaded through dotenv) are coerced and validated
 * against a TypeBox schema. Anything missing falls back to the schema default.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const EnvSchema = Type.Object({
  DATABASE_URL: Type.String({ default: "./data/ledger-sync.db" }),
  PORT: Type.Integer({ minimum: 1, maximum: 65535, default: 3000 }),
  HOST: Type.String({ default: "0.0.0.0" }),

  RATE_LIMIT_CAPACITY: Type.Integer({ minimum: 1, default: 10 }),
  RATE_LIMIT_REFILL_PER_SEC: Type.Number({ exclusiveMinimum: 0, default: 8 }),
  HTTP_TIMEOUT_MS: Type.Integer({ minimum: 100, default: 30_000 }),
  HTTP_MAX_RETRIES: Type.Integer({ minimum: 0, maximum: 10, default: 3 }),
  RESPONSE_CACHE_TTL_MS: Type.Integer({ minimum: 0, default: 30_000 }),

  SYNC_SCHEDULER_ENABLED: Type.Boolean({ default: true }),
  SYNC_INTERVAL_MINUTES: Type.Number({ exclusiveMinimum: 0, default: 15 }),
  SYNC_PAGE_SIZE: Type.Integer({ minimum: 1, maximum: 1000, default: 100 }),
  SYNC_MAX_PAGES_PER_RUN: Type.Integer({ minimum: 1, default: 50 }),
  SYNC_MAX_TASK_DURATION_MS: Type.Integer({ minimum: 1000, default: 600_000 }),
  SYNC_MAX_CONSECUTIVE_FAILURES: Type.Integer({ minimum: 1, default: 5 }),
  TOKEN_REFRESH_BUFFER_SECONDS: Type.Integer({ minimum: 0, default: 300 }),

  QUICKBOOKS_API_BASE_URL: Type.String({
    default: "https://quickbooks.api.intuit.com/v3/company",
  }),
  QUICKBOOKS_WEBHOOK_VERIFIER_TOKEN: Type.String({ default: "" }),
  QUICKBOOKS_TOKEN_URL: Type.String({
    default: "https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer",
  }),
  QUICKBOOKS_CLIENT_ID: Type.String({ default: "" }),
  QUICKBOOKS_CLIENT_SECRET: Type.String({ default: "" }),
  BILLPAY_API_BASE_URL: Type.String({
    default: "https://api.billpay.example.com/v1",
  }),
  BILLPAY_WEBHOOK_SECRET: Type.String({ default: "" }),
});

type Env = Static<typeof EnvSchema>;

export interface AppConfig {
  databaseUrl: string;
  server: { port: number; host: string };
  http: {
    rateLimitCapacity: number;
    rateLimitRefillPerSec: number;
    timeoutMs: number;
    maxRetries: number;
    cacheTtlMs: number;
  };
  sync: {
    schedulerEnabled: boolean;
    intervalMs: number;
    pageSize: number;
    maxPagesPerRun: number;
    maxTaskDurationMs: number;
    maxConsecutiveFailures: number;
    tokenRefreshBufferMs: number;
  };
  rails: {
    quickbooks: {
      baseUrl: string;
      webhookVerifierToken: string;
      /** Null when no OAuth app credentials are configured */
      oauth: { tokenUrl: string; clientId: string; clientSecret: string } | null;
    };
    billpay: { baseUrl: string; webhookSecret: string };
  };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Parse a raw environment map into the typed configuration.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Only pick keys the schema knows about; empty strings count as unset
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const withDefaults = Value.Default(EnvSchema, raw);
  const converted = Value.Convert(EnvSchema, withDefaults);

  if (!Value.Check(EnvSchema, converted)) {
    const issues = [...Value.Errors(EnvSchema, converted)].map(
      (e) => `${e.path}: ${e.message}`
    );
    throw new ConfigError("Invalid environment configuration", issues);
  }

  return toAppConfig(converted);
}

function toAppConfig(env: Env): AppConfig {
  return {
    databaseUrl: env.DATABASE_URL,
    server: { port: env.PORT, host: env.HOST },
    http: {
      rateLimitCapacity: env.RATE_LIMIT_CAPACITY,
      rateLimitRefillPerSec: env.RATE_LIMIT_REFILL_PER_SEC,
      timeoutMs: env.HTTP_TIMEOUT_MS,
      maxRetries: env.HTTP_MAX_RETRIES,
      cacheTtlMs: env.RESPONSE_CACHE_TTL_MS,
    },
    sync: {
      schedulerEnabled: env.SYNC_SCHEDULER_ENABLED,
      intervalMs: Math.round(env.SYNC_INTERVAL_MINUTES * 60_000),
      pageSize: env.SYNC_PAGE_SIZE,
      maxPagesPerRun: env.SYNC_MAX_PAGES_PER_RUN,
      maxTaskDurationMs: env.SYNC_MAX_TASK_DURATION_MS,
      maxConsecutiveFailures: env.SYNC_MAX_CONSECUTIVE_FAILURES,
      tokenRefreshBufferMs: env.TOKEN_REFRESH_BUFFER_SECONDS * 1000,
    },
    rails: {
      quickbooks: {
        baseUrl: env.QUICKBOOKS_API_BASE_URL,
        webhookVerifierToken: env.QUICKBOOKS_WEBHOOK_VERIFIER_TOKEN,
        oauth:
          env.QUICKBOOKS_CLIENT_ID === ""
            ? null
            : {
                tokenUrl: env.QUICKBOOKS_TOKEN_URL,
                clientId: env.QUICKBOOKS_CLIENT_ID,
                clientSecret: env.QUICKBOOKS_CLIENT_SECRET,
              },
      },
      billpay: {
        baseUrl: env.BILLPAY_API_BASE_URL,
        webhookSecret: env.BILLPAY_WEBHOOK_SECRET,
      },
    },
  };
}
