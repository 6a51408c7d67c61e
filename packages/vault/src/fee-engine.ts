/**
 * Fee Engine - proportional withdrawal fees in basis points.
 *
 * Pure arithmetic, no state. All amounts are bigint base units.
 */

import { VaultError } from "./errors.js";

/** 10 000 basis points = 100% */
export const BPS_DENOMINATOR = 10_000;

/** Highest fee the vault accepts: 500 bps = 5% */
export const MAX_FEE = 500;

export interface FeeBreakdown {
  readonly fee: bigint;
  readonly net: bigint;
}

/**
 * Split a gross amount into fee and net.
 *
 * fee = floor(amount × feePercentage / 10 000), net = amount − fee.
 * The rate is not checked against MAX_FEE here.
 *
 * 500n at 100 bps → { fee: 5n, net: 495n }
 * 99n at 100 bps → { fee: 0n, net: 99n }
 */
export function computeFee(amount: bigint, feePercentage: number): FeeBreakdown {
  const fee = (amount * BigInt(feePercentage)) / BigInt(BPS_DENOMINATOR);
  return { fee, net: amount - fee };
}

/**
 * @throws VaultError FEE_EXCEEDS_MAXIMUM unless the rate is an integer in [0, MAX_FEE]
 */
export function assertValidFee(feePercentage: number): void {
  if (!Number.isInteger(feePercentage) || feePercentage < 0 || feePercentage > MAX_FEE) {
    throw new VaultError(
      "FEE_EXCEEDS_MAXIMUM",
      `Fee must be an integer between 0 and ${MAX_FEE} basis points, got ${feePercentage}`,
      { feePercentage, maximum: MAX_FEE },
    );
  }
}
