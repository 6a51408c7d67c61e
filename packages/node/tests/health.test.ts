/**
 * Tests for health routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns ok", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });

  it("echoes an incoming request id", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-42" }));

    expect(res.headers.get("X-Request-Id")).toBe("req-42");
  });

  it("generates a request id when none is sent", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("GET /ready", () => {
  it("is ready while the event chain verifies", async () => {
    const { app } = createTestApp();

    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ready", events: 0, errors: 0 });
  });
});

describe("unknown routes", () => {
  it("return a 404 envelope", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/nothing-here");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "Route not found" },
    });
  });
});
