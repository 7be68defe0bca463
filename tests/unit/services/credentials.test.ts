import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { CredentialStore } from "../../../src/services/credentials.js";
import { createDateClock, createTestDb } from "../../helpers/db.js";

import type { Database } from "../../../src/db/types.js";
import type { Kysely } from "kysely";

describe("CredentialStore", () => {
  let db: Kysely<Database>;
  let clock: ReturnType<typeof createDateClock>;
  let credentials: CredentialStore;

  beforeEach(async () => {
    db = await createTestDb();
    clock = createDateClock();
    credentials = new CredentialStore(db, clock.now);
    await credentials.save({
      tenantId: "tenant-1",
      rail: "quickbooks",
      accessToken: "test-token",
      accountId: "realm-1",
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should return a saved credential as active", async () => {
    expect(await credentials.get("tenant-1", "quickbooks")).toEqual({
      tenantId: "tenant-1",
      rail: "quickbooks",
      accessToken: "test-token",
      refreshToken: null,
      accountId: "realm-1",
      expiresAt: null,
      status: "active",
    });
    expect(await credentials.get("tenant-1", "billpay")).toBeNull();
  });

  it("should report an expired credential as needing reconnection", async () => {
    await credentials.save({
      tenantId: "tenant-2",
      rail: "quickbooks",
      accessToken: "test-token",
      expiresAt: "2026-03-02T09:00:00.000Z",
    });

    expect((await credentials.get("tenant-2", "quickbooks"))?.status).toBe(
      "needs_reconnection"
    );
    expect((await credentials.listActive()).map((c) => c.tenantId)).toEqual([
      "tenant-1",
    ]);
    const [, expired] = await credentials.list();
    expect(expired).toMatchObject({
      tenantId: "tenant-2",
      status: "needs_reconnection",
      statusReason: "expired",
    });
  });

  it("should keep an expired credential active while it can be refreshed", async () => {
    await credentials.save({
      tenantId: "tenant-2",
      rail: "quickbooks",
      accessToken: "test-token",
      refreshToken: "test-refresh",
      expiresAt: "2026-03-02T08:00:00.000Z",
    });

    expect((await credentials.get("tenant-2", "quickbooks"))?.status).toBe("active");
  });

  it("should tell whether a token expires inside a buffer", async () => {
    const credential = await credentials.get("tenant-1", "quickbooks");
    if (credential === null) throw new Error("credential missing");
    const expiringAt = (expiresAt: string | null) => ({ ...credential, expiresAt });

    expect(credentials.expiresWithin(expiringAt(null), 300_000)).toBe(false);
    expect(credentials.expiresWithin(expiringAt("2026-03-02T09:04:00.000Z"), 300_000)).toBe(true);
    expect(credentials.expiresWithin(expiringAt("2026-03-02T09:06:00.000Z"), 300_000)).toBe(false);
  });

  it("should store refreshed tokens and reactivate the credential", async () => {
    await credentials.save({
      tenantId: "tenant-1",
      rail: "quickbooks",
      accessToken: "test-token",
      refreshToken: "test-refresh",
      accountId: "realm-1",
    });
    await credentials.markNeedsReconnection("tenant-1", "quickbooks", "401 from rail");
    const stored = await credentials.get("tenant-1", "quickbooks");
    if (stored === null) throw new Error("credential missing");

    const updated = await credentials.updateTokens(stored, {
      accessToken: "test-token-2",
      refreshToken: null,
      expiresAt: "2026-03-02T10:00:00.000Z",
    });

    const expected = {
      tenantId: "tenant-1",
      rail: "quickbooks",
      accessToken: "test-token-2",
      refreshToken: "test-refresh",
      accountId: "realm-1",
      expiresAt: "2026-03-02T10:00:00.000Z",
      status: "active",
    };
    expect(updated).toEqual(expected);
    expect(await credentials.get("tenant-1", "quickbooks")).toEqual(expected);
  });

  it("should flag and then reactivate on save", async () => {
    await credentials.markNeedsReconnection("tenant-1", "quickbooks", "401 from rail");

    expect(await credentials.listActive()).toEqual([]);
    expect(await credentials.list("tenant-1")).toEqual([
      {
        tenantId: "tenant-1",
        rail: "quickbooks",
        accountId: "realm-1",
        expiresAt: null,
        status: "needs_reconnection",
        statusReason: "401 from rail",
      },
    ]);

    await credentials.save({
      tenantId: "tenant-1",
      rail: "quickbooks",
      accessToken: "test-token-2",
      accountId: "realm-1",
    });
    expect((await credentials.get("tenant-1", "quickbooks"))?.status).toBe("active");
  });

  it("should resolve a rail account to its tenant", async () => {
    const found = await credentials.findByAccount("quickbooks", "realm-1");
    expect(found?.tenantId).toBe("tenant-1");
    expect(await credentials.findByAccount("billpay", "realm-1")).toBeNull();
  });

  it("should remove a credential", async () => {
    expect(await credentials.remove("tenant-1", "quickbooks")).toBe(true);
    expect(await credentials.remove("tenant-1", "quickbooks")).toBe(false);
  });
});
