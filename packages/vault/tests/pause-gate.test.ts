import { describe, it, expect } from "vitest";
import { AccessRegistry } from "../src/access-registry.js";
import { PauseGate } from "../src/pause-gate.js";
import { ALICE, OPERATOR, OWNER, codeOf } from "./fixtures.js";

function createGate(): PauseGate {
  const access = new AccessRegistry(OWNER);
  access.addOperator(OWNER, OPERATOR);
  return new PauseGate(access);
}

describe("PauseGate", () => {
  it("starts active", () => {
    const gate = createGate();

    expect(gate.paused).toBe(false);
    expect(() => gate.requireActive()).not.toThrow();
  });

  it("reports whether a toggle changed anything", () => {
    const gate = createGate();

    expect(gate.pause(OPERATOR)).toBe(true);
    expect(gate.pause(OPERATOR)).toBe(false);
    expect(gate.unpause(OWNER)).toBe(true);
    expect(gate.unpause(OWNER)).toBe(false);
  });

  it("rejects work while paused", () => {
    const gate = createGate();
    gate.pause(OWNER);

    expect(codeOf(() => gate.requireActive())).toBe("PAUSED");
  });

  it("checks roles even for a no-op", () => {
    const gate = createGate();

    expect(codeOf(() => gate.pause(ALICE))).toBe("UNAUTHORIZED");
    expect(codeOf(() => gate.unpause(OPERATOR))).toBe("UNAUTHORIZED");
  });
});
