/**
 * @bridge-core/bridge — Bridge state machine and request processor.
 *
 * Admin key custody, one-time withdrawal records, commission
 * enforcement and the deposit / withdrawal flows, written against
 * capability interfaces so any host that provides atomic units can run
 * them. Ships an in-memory host for tests and local services.
 *
 * @packageDocumentation
 */

// Capabilities and requests
export type {
  AddressDeriver,
  AccountStore,
  AssetLedger,
  MintInfo,
  TokenMetadata,
  PrecedingOperation,
  CoTransactionInspector,
  ExecutionUnit,
  AdminScoped,
  InitializeAdminRequest,
  RotateKeyRequest,
  DepositBase,
  DepositNativeRequest,
  DepositTokenBase,
  DepositFungibleRequest,
  DepositNonFungibleRequest,
  SignedTokenMetadata,
  WithdrawAuthorization,
  WithdrawNativeRequest,
  WithdrawTokenBase,
  WithdrawFungibleRequest,
  WithdrawNonFungibleRequest,
  MintCollectionRequest,
  DepositReceipt,
} from "./types.js";

// Records
export {
  ADMIN_RECORD_SIZE,
  WITHDRAW_RECORD_SIZE,
  encodeAdminRecord,
  decodeAdminRecord,
  encodeWithdrawRecord,
  decodeWithdrawRecord,
} from "./records.js";

// Addresses
export {
  ProgramAddressDeriver,
  HashAddressDeriver,
  MAX_SEED_LENGTH,
  MAX_SEEDS,
} from "./address.js";

// State machines
export { AdminKeyStore } from "./admin-key-store.js";
export { ReplayGuard, WITHDRAW_SEED } from "./replay-guard.js";
export {
  CommissionChecker,
  COMMISSION_ADMIN_SEED,
  encodeChargeCommission,
  decodeChargeCommission,
  commissionAccountFor,
} from "./commission.js";
export type { ChargeCommission } from "./commission.js";

// Authorization
export { authorizeWithdrawal } from "./withdrawal-authorization.js";
export type { WithdrawalProof, AuthorizedWithdrawal } from "./withdrawal-authorization.js";

// Validation
export {
  MAX_NETWORK_SIZE,
  MAX_ADDRESS_SIZE,
  MAX_NAME_SIZE,
  MAX_SYMBOL_SIZE,
  MAX_URI_SIZE,
  validateDepositTarget,
  validateMetadata,
} from "./validation.js";

// Processor
export { BridgeProgram } from "./bridge-program.js";
export type { BridgeProgramConfig } from "./bridge-program.js";

// In-memory host
export {
  InMemoryPlatform,
  chargeCommissionOperation,
  TOKEN_PROGRAM_ID,
  ASSOCIATED_TOKEN_PROGRAM_ID,
} from "./in-memory-platform.js";
export type { PlatformOperation, InMemoryPlatformOptions } from "./in-memory-platform.js";
