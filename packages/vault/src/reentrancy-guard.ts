/**
 * Call-scoped exclusive guard.
 *
 * Held for the whole of a mutating vault call, including while it awaits
 * the token ledger. A second call arriving in that window is rejected,
 * never queued.
 */

import { VaultError } from "./errors.js";

export class ReentrancyGuard {
  private _held = false;

  get held(): boolean {
    return this._held;
  }

  /**
   * @throws VaultError REENTRANT_CALL if the guard is already held
   */
  enter(): void {
    if (this._held) {
      throw new VaultError("REENTRANT_CALL", "A vault operation is already in progress");
    }
    this._held = true;
  }

  exit(): void {
    this._held = false;
  }

  /** Run synchronous work while holding the guard. */
  run<T>(work: () => T): T {
    this.enter();
    try {
      return work();
    } finally {
      this.exit();
    }
  }

  /**
   * Run async work while holding the guard. The guard is taken before the
   * first await and released once the work settles.
   */
  async runAsync<T>(work: () => Promise<T>): Promise<T> {
    this.enter();
    try {
      return await work();
    } finally {
      this.exit();
    }
  }
}
