/**
 * Decimal ↔ base-unit conversion for display and input.
 *
 * Token amounts are bigint base units everywhere inside the vault; these
 * helpers exist for the edges where humans type "1000" meaning 1000 tokens.
 */

import { VaultError } from "./errors.js";

/**
 * Parse a non-negative decimal string into base units.
 *
 * "100.5" with decimals=2 → 10050n
 * "1000" with decimals=18 → 1000000000000000000000n
 */
export function parseUnits(amount: string, decimals: number): bigint {
  assertDecimals(decimals);
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new VaultError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${fracPart.length} decimal places, but the token allows ${decimals}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Format base units as a decimal string with every decimal place shown.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=0 → "5"
 */
export function formatUnits(value: bigint, decimals: number): string {
  assertDecimals(decimals);
  if (decimals === 0) {
    return value.toString();
  }

  const negative = value < 0n;
  const abs = negative ? -value : value;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new VaultError("INVALID_ARGUMENT", `Decimals must be a non-negative integer, got ${decimals}`);
  }
}
