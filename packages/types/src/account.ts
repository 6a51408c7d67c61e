/**
 * Account Types
 *
 * Identities on the external token ledger and the token the vault custodies.
 *
 * Rules:
 * - Addresses are opaque strings; the vault never interprets their format
 * - The zero address and the empty string both mean "no account"
 * - Token amounts are integers in base units (no decimals inside the core)
 */

/**
 * An account identifier on the token ledger (a wallet, the vault itself,
 * a fee collector).
 */
export type Address = string;

/**
 * The conventional "null" account. Never a valid owner, operator,
 * fee collector or vault address.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Reference to the fungible token a vault custodies.
 */
export interface TokenRef {
  /** Identifier of the external ledger that owns balances for this token */
  readonly ledgerId: string;

  /** Token symbol (e.g., "USDC", "WETH") */
  readonly symbol: string;

  /**
   * Decimal places used for display. Amounts are always carried in
   * base units; 1 USDC = 10^6 base units, 1 WETH = 10^18.
   */
  readonly decimals: number;
}
