/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { ALICE, callerRequest, createTestApp } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      new Request("http://localhost/health", { headers: { "X-Request-Id": "req-1" } }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs the status of a rejected request", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(callerRequest(ALICE, "/api/v1/vault/pause", "POST"));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "POST",
      path: "/api/v1/vault/pause",
      status: 403,
    });
  });
});
