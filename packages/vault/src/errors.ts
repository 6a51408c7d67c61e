/**
 * Vault errors.
 *
 * Every rejected operation throws a VaultError whose `code` names the
 * rule that failed. Token ledger failures are not wrapped; they surface
 * as TokenLedgerError.
 */

export type VaultErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_ARGUMENT"
  | "FEE_EXCEEDS_MAXIMUM"
  | "WITHDRAWAL_LIMIT_EXCEEDED"
  | "WITHDRAWAL_TOO_SOON"
  | "INSUFFICIENT_BALANCE"
  | "UNAUTHORIZED"
  | "ALREADY_OPERATOR"
  | "NOT_OPERATOR"
  | "CANNOT_REMOVE_OWNER"
  | "PAUSED"
  | "REENTRANT_CALL"
  | "INVALID_SNAPSHOT"
  | "INVALID_EVENT";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: VaultErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "VaultError";
    this.code = code;
    this.details = details;
  }
}
