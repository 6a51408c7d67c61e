import { describe, it, expect } from "vitest";
import { AccessRegistry } from "../src/access-registry.js";
import { ALICE, BOB, OPERATOR, OWNER, ZERO, codeOf } from "./fixtures.js";

describe("AccessRegistry", () => {
  it("makes the deployer owner and first operator", () => {
    const registry = new AccessRegistry(OWNER);

    expect(registry.owner).toBe(OWNER);
    expect(registry.isOwner(OWNER)).toBe(true);
    expect(registry.isOperator(OWNER)).toBe(true);
    expect(registry.operators()).toEqual([OWNER]);
  });

  it("rejects the zero address as owner", () => {
    expect(codeOf(() => new AccessRegistry(ZERO))).toBe("INVALID_ADDRESS");
  });

  it("rejects the zero address as operator", () => {
    const registry = new AccessRegistry(OWNER);

    expect(codeOf(() => registry.addOperator(OWNER, ZERO))).toBe("INVALID_ADDRESS");
  });

  it("checks authorization before membership", () => {
    const registry = new AccessRegistry(OWNER);

    expect(codeOf(() => registry.addOperator(ALICE, OWNER))).toBe("UNAUTHORIZED");
    expect(codeOf(() => registry.removeOperator(ALICE, BOB))).toBe("UNAUTHORIZED");
  });

  it("keeps the new owner out of the explicit set", () => {
    const registry = new AccessRegistry(OWNER);

    expect(registry.transferOwnership(OWNER, BOB)).toBe(OWNER);
    expect(registry.operators()).toEqual([OWNER]);
    expect(registry.isOperator(BOB)).toBe(true);
  });

  it("treats the new owner as an implicit operator", () => {
    const registry = new AccessRegistry(OWNER);
    registry.transferOwnership(OWNER, BOB);

    expect(codeOf(() => registry.addOperator(BOB, BOB))).toBe("ALREADY_OPERATOR");
    expect(codeOf(() => registry.removeOperator(BOB, BOB))).toBe("CANNOT_REMOVE_OWNER");
    expect(registry.operators()).toEqual([OWNER]);
  });

  it("restores a saved state", () => {
    const registry = new AccessRegistry(OWNER);
    registry.addOperator(OWNER, OPERATOR);
    const saved = registry.snapshot();

    registry.removeOperator(OWNER, OPERATOR);
    registry.transferOwnership(OWNER, ALICE);
    registry.restore(saved);

    expect(registry.snapshot()).toEqual({ owner: OWNER, operators: [OPERATOR, OWNER] });
  });
});
