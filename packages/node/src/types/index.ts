export type { AppEnv } from "./api-contract.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";
export { createErrorEnvelope } from "./error.js";
export {
  AmountSchema,
  FeePercentageSchema,
  FeeCollectorSchema,
  WithdrawalLimitSchema,
  WithdrawalTimelockSchema,
  OperatorSchema,
  OwnerSchema,
  EventQuerySchema,
} from "./dto.js";
export type { AmountBody, EventQuery } from "./dto.js";
