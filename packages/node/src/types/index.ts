/**
 * Type barrel — re-exports all public types from @bridge-core/node.
 */

// DTOs
export {
  Hex32Schema,
  SignatureHexSchema,
  AmountSchema,
  TransferPayloadSchema,
  ContentLeafSchema,
  VerifyWithdrawalSchema,
} from "./dto.js";
export type {
  TransferPayloadDto,
  ContentLeafDto,
  VerifyWithdrawalDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
