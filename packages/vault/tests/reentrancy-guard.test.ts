import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "../src/reentrancy-guard.js";
import { codeOf } from "./fixtures.js";

describe("ReentrancyGuard", () => {
  it("rejects a nested synchronous entry", () => {
    const guard = new ReentrancyGuard();

    const code = guard.run(() => codeOf(() => guard.run(() => 1)));

    expect(code).toBe("REENTRANT_CALL");
    expect(guard.held).toBe(false);
  });

  it("releases after a synchronous failure", () => {
    const guard = new ReentrancyGuard();

    expect(() =>
      guard.run(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.held).toBe(false);
  });

  it("is held from the call until async work settles", async () => {
    const guard = new ReentrancyGuard();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const pending = guard.runAsync(() => gate);
    expect(guard.held).toBe(true);
    await expect(guard.runAsync(async () => 1)).rejects.toHaveProperty("code", "REENTRANT_CALL");

    release();
    await pending;
    expect(guard.held).toBe(false);
  });

  it("releases after an async failure", async () => {
    const guard = new ReentrancyGuard();

    await expect(guard.runAsync(async () => Promise.reject(new Error("late")))).rejects.toThrow("late");
    expect(guard.held).toBe(false);
  });
});
