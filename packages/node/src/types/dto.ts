/**
 * Request DTOs with Zod schemas.
 *
 * Amounts travel as decimal strings of base units and are turned into
 * bigint here, so handlers never see a lossy JSON number.
 */

import { z } from "zod";

// =============================================================================
// Shared
// =============================================================================

const BaseUnits = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "Must be an integer amount of base units, as a string")
  .transform((v) => BigInt(v));

const AccountAddress = z.string().trim().min(1);

// =============================================================================
// Funds
// =============================================================================

export const AmountSchema = z.object({
  amount: BaseUnits,
});

export type AmountBody = z.infer<typeof AmountSchema>;

// =============================================================================
// Settings
// =============================================================================

export const FeePercentageSchema = z.object({
  feePercentage: z.number().int().min(0),
});

export const FeeCollectorSchema = z.object({
  feeCollector: AccountAddress,
});

export const WithdrawalLimitSchema = z.object({
  withdrawalLimit: BaseUnits,
});

export const WithdrawalTimelockSchema = z.object({
  withdrawalTimelock: z.number().int().min(0),
});

// =============================================================================
// Access
// =============================================================================

export const OperatorSchema = z.object({
  address: AccountAddress,
});

export const OwnerSchema = z.object({
  owner: AccountAddress,
});

// =============================================================================
// Event queries
// =============================================================================

export const EventQuerySchema = z.object({
  type: z.string().min(1).optional(),
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type EventQuery = z.infer<typeof EventQuerySchema>;
