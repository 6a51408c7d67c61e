/**
 * Tests for EventCatalog and the vault event catalog.
 */

import { describe, it, expect } from "vitest";
import type { EventSchema } from "../src/catalog.js";
import { EventCatalog, CatalogError } from "../src/catalog.js";
import { VAULT_EVENTS, createVaultCatalog } from "../src/vault-events.js";

function makeSchema(type: string, version = 1): EventSchema {
  return {
    type,
    version,
    description: `Test schema for ${type}`,
    source: "vault",
    validate: (p) => typeof p === "object" && p !== null && "id" in p,
  };
}

// =============================================================================
// EventCatalog
// =============================================================================

describe("EventCatalog", () => {
  it("registers and looks up schemas", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created"));

    expect(catalog.has("test.created")).toBe(true);
    expect(catalog.getSchema("test.created")?.version).toBe(1);
    expect(catalog.getSchema("test.missing")).toBeUndefined();
    expect(catalog.size).toBe(1);
  });

  it("replaces a schema registered at a new version", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created", 1));
    catalog.register(makeSchema("test.created", 2));

    expect(catalog.getSchema("test.created")?.version).toBe(2);
    expect(catalog.size).toBe(1);
  });

  it("rejects a non-positive version", () => {
    const catalog = new EventCatalog();

    expect(() => catalog.register(makeSchema("test.created", 0))).toThrow(CatalogError);
  });

  it("validates payloads and rejects unregistered types", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created"));

    expect(catalog.validate("test.created", { id: "1" })).toBe(true);
    expect(catalog.validate("test.created", { name: "x" })).toBe(false);
    expect(catalog.validate("test.unknown", { id: "1" })).toBe(false);
  });

  it("lists types sorted", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("b.event"));
    catalog.register(makeSchema("a.event"));

    expect(catalog.listTypes()).toEqual(["a.event", "b.event"]);
  });
});

// =============================================================================
// Vault catalog
// =============================================================================

describe("createVaultCatalog", () => {
  const catalog = createVaultCatalog();

  it("registers every vault event type", () => {
    expect(catalog.size).toBe(12);
    for (const type of Object.values(VAULT_EVENTS)) {
      expect(catalog.has(type)).toBe(true);
    }
  });

  it("groups schemas by source", () => {
    expect(catalog.listBySource("vault")).toHaveLength(7);
    expect(catalog.listBySource("access")).toHaveLength(3);
    expect(catalog.listBySource("gate")).toHaveLength(2);
  });

  it("accepts a well-formed deposit payload", () => {
    expect(
      catalog.validate(VAULT_EVENTS.DEPOSITED, { depositor: "alice", amount: "1000", timestamp: 0 }),
    ).toBe(true);
  });

  it("rejects a numeric deposit amount", () => {
    expect(
      catalog.validate(VAULT_EVENTS.DEPOSITED, { depositor: "alice", amount: 1000, timestamp: 0 }),
    ).toBe(false);
  });

  it("rejects a fee above 10000 basis points", () => {
    expect(catalog.validate(VAULT_EVENTS.FEE_UPDATED, { old: 0, new: 100 })).toBe(true);
    expect(catalog.validate(VAULT_EVENTS.FEE_UPDATED, { old: 0, new: 10_001 })).toBe(false);
  });

  it("rejects the zero address as an operator", () => {
    expect(
      catalog.validate(VAULT_EVENTS.OPERATOR_ADDED, {
        address: "0x0000000000000000000000000000000000000000",
      }),
    ).toBe(false);
  });

  it("validates ownership transfers", () => {
    expect(
      catalog.validate(VAULT_EVENTS.OWNERSHIP_TRANSFERRED, { previousOwner: "alice", newOwner: "bob" }),
    ).toBe(true);
  });
});
