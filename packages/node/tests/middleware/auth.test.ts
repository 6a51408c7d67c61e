/**
 * Tests for authentication middleware.
 */

import { describe, it, expect } from "vitest";
import { ALICE, OWNER, createTestApp, jsonRequest } from "../setup.js";

const secured = () =>
  createTestApp({ auth: { apiKeys: new Map([["test-key", OWNER]]) } });

describe("authMiddleware (secured)", () => {
  it("returns 401 without an API key", async () => {
    const { app } = secured();

    const res = await app.request(jsonRequest("/api/v1/vault"));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHENTICATED", message: "Authentication required" },
    });
  });

  it("returns 401 for an unknown API key", async () => {
    const { app } = secured();

    const res = await app.request(
      jsonRequest("/api/v1/vault/pause", "POST", undefined, { "X-Api-Key": "wrong-key" }),
    );

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHENTICATED", message: "Invalid API key" },
    });
  });

  it("acts as the key's account", async () => {
    const { app } = secured();

    const res = await app.request(
      jsonRequest("/api/v1/vault/pause", "POST", undefined, { "X-Api-Key": "test-key" }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { paused: true } });
  });

  it("ignores X-Caller in secured mode", async () => {
    const { app } = secured();

    const res = await app.request(
      jsonRequest("/api/v1/vault/pause", "POST", undefined, { "X-Caller": OWNER }),
    );

    expect(res.status).toBe(401);
  });

  it("leaves health routes open", async () => {
    const { app } = secured();

    const res = await app.request("/health");

    expect(res.status).toBe(200);
  });
});

describe("authMiddleware (unsecured)", () => {
  it("serves reads without a caller", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/vault"));

    expect(res.status).toBe(200);
  });

  it("treats a blank X-Caller as missing", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/vault/pause", "POST", undefined, { "X-Caller": "  " }),
    );

    expect(res.status).toBe(401);
  });

  it("lets the vault decide what the caller may do", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/vault/pause", "POST", undefined, { "X-Caller": ALICE }),
    );

    expect(res.status).toBe(403);
  });
});
