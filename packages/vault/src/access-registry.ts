/**
 * Access Registry - one owner, a set of operators.
 *
 * Rules:
 * - The owner is always an operator, whether or not it is in the explicit set
 * - The deployer is the first owner and the first explicit operator
 * - Only the owner manages operators or hands over ownership
 * - The owner can never be removed from the operator role
 */

import type { Address } from "@coffer/types";
import { isAddress } from "@coffer/types";
import { VaultError } from "./errors.js";

export interface AccessRegistryState {
  readonly owner: Address;
  /** Explicit operator set, sorted */
  readonly operators: readonly Address[];
}

export class AccessRegistry {
  private _owner: Address;
  private readonly _operators = new Set<Address>();

  constructor(owner: Address) {
    assertAddress(owner, "owner");
    this._owner = owner;
    this._operators.add(owner);
  }

  get owner(): Address {
    return this._owner;
  }

  isOwner(caller: Address): boolean {
    return caller === this._owner;
  }

  isOperator(caller: Address): boolean {
    return this.isOwner(caller) || this._operators.has(caller);
  }

  /** The explicit operator set. The owner may be absent after a transfer. */
  operators(): readonly Address[] {
    return [...this._operators].sort();
  }

  requireOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new VaultError("UNAUTHORIZED", `Caller "${caller}" is not the owner`, { caller });
    }
  }

  requireOperator(caller: Address): void {
    if (!this.isOperator(caller)) {
      throw new VaultError("UNAUTHORIZED", `Caller "${caller}" is not an operator`, { caller });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  addOperator(caller: Address, target: Address): void {
    this.requireOwner(caller);
    assertAddress(target, "operator");

    if (this.isOperator(target)) {
      throw new VaultError("ALREADY_OPERATOR", `"${target}" is already an operator`, { address: target });
    }
    this._operators.add(target);
  }

  removeOperator(caller: Address, target: Address): void {
    this.requireOwner(caller);

    if (target === this._owner) {
      throw new VaultError("CANNOT_REMOVE_OWNER", "The owner cannot be removed from the operator role");
    }
    if (!this._operators.has(target)) {
      throw new VaultError("NOT_OPERATOR", `"${target}" is not an operator`, { address: target });
    }
    this._operators.delete(target);
  }

  /**
   * Single-step handover. The previous owner keeps its explicit operator
   * entry, if it has one; the new owner is not added to the set.
   *
   * @returns The previous owner
   */
  transferOwnership(caller: Address, newOwner: Address): Address {
    this.requireOwner(caller);
    assertAddress(newOwner, "new owner");

    const previousOwner = this._owner;
    this._owner = newOwner;
    return previousOwner;
  }

  // ───────────────────────────────────────────────────────────────────────
  // State
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): AccessRegistryState {
    return { owner: this._owner, operators: this.operators() };
  }

  restore(state: AccessRegistryState): void {
    assertAddress(state.owner, "owner");
    for (const operator of state.operators) {
      assertAddress(operator, "operator");
    }

    this._owner = state.owner;
    this._operators.clear();
    for (const operator of state.operators) {
      this._operators.add(operator);
    }
  }
}

export function assertAddress(value: string, role: string): void {
  if (!isAddress(value)) {
    throw new VaultError("INVALID_ADDRESS", `Invalid ${role} address: "${value}"`, { role, address: value });
  }
}
