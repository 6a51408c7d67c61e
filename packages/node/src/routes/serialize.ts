/**
 * JSON views of vault receipts. Amounts leave the node as decimal strings.
 */

import type {
  DepositReceipt,
  EmergencyWithdrawalReceipt,
  WithdrawalReceipt,
} from "@coffer/vault";

export function depositJson(receipt: DepositReceipt) {
  return {
    amount: receipt.amount.toString(),
    totalDeposited: receipt.totalDeposited.toString(),
    timestamp: receipt.timestamp,
  };
}

export function withdrawalJson(receipt: WithdrawalReceipt) {
  return {
    grossAmount: receipt.grossAmount.toString(),
    fee: receipt.fee.toString(),
    net: receipt.net.toString(),
    totalDeposited: receipt.totalDeposited.toString(),
    timestamp: receipt.timestamp,
  };
}

export function emergencyWithdrawalJson(receipt: EmergencyWithdrawalReceipt) {
  return {
    amount: receipt.amount.toString(),
    totalDeposited: receipt.totalDeposited.toString(),
  };
}
