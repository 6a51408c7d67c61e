/**
 * Pause Gate - circuit breaker for deposits and withdrawals.
 *
 * Any operator may pause; only the owner may resume. Nothing else in the
 * vault looks at the gate.
 */

import type { Address } from "@coffer/types";
import type { AccessRegistry } from "./access-registry.js";
import { VaultError } from "./errors.js";

export class PauseGate {
  private _paused = false;

  constructor(private readonly access: AccessRegistry) {}

  get paused(): boolean {
    return this._paused;
  }

  /**
   * @returns true if the gate closed, false if it was already paused
   */
  pause(caller: Address): boolean {
    this.access.requireOperator(caller);
    if (this._paused) {
      return false;
    }
    this._paused = true;
    return true;
  }

  /**
   * @returns true if the gate opened, false if it was already active
   */
  unpause(caller: Address): boolean {
    this.access.requireOwner(caller);
    if (!this._paused) {
      return false;
    }
    this._paused = false;
    return true;
  }

  requireActive(): void {
    if (this._paused) {
      throw new VaultError("PAUSED", "Deposits and withdrawals are paused");
    }
  }

  restore(paused: boolean): void {
    this._paused = paused;
  }
}
