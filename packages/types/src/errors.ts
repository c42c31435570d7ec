/**
 * Bridge error taxonomy.
 *
 * Every rejection raised by the authorization core is a `BridgeError`.
 * Errors abort the enclosing atomic unit; nothing is applied partially
 * and nothing is retried inside the core.
 *
 * The same input against the same persisted state always yields the same
 * code, so relayers can retry safely once the condition is corrected.
 */

// =============================================================================
// Codes
// =============================================================================

/** Broad class of a failure, used for routing and HTTP status mapping. */
export type BridgeErrorCategory =
  | "config"
  | "state"
  | "auth"
  | "data"
  | "resource";

export type BridgeErrorCode =
  // config
  | "WRONG_SEEDS"
  | "ADDRESS_MISMATCH"
  | "WRONG_TOKEN_ACCOUNT"
  | "WRONG_METADATA_ACCOUNT"
  | "WRONG_TOKEN_SEED"
  // state
  | "ALREADY_IN_USE"
  | "NOT_INITIALIZED"
  // auth
  | "INVALID_SIGNATURE"
  | "WRONG_SIGNATURE"
  | "WRONG_COMMISSION_PROGRAM"
  | "WRONG_COMMISSION_ACCOUNT"
  | "WRONG_COMMISSION_ARGUMENTS"
  // data
  | "MALFORMED_PROOF"
  | "MALFORMED_PAYLOAD"
  // resource
  | "INSUFFICIENT_BALANCE";

export const ERROR_CATEGORIES: Readonly<Record<BridgeErrorCode, BridgeErrorCategory>> = {
  WRONG_SEEDS: "config",
  ADDRESS_MISMATCH: "config",
  WRONG_TOKEN_ACCOUNT: "config",
  WRONG_METADATA_ACCOUNT: "config",
  WRONG_TOKEN_SEED: "config",
  ALREADY_IN_USE: "state",
  NOT_INITIALIZED: "state",
  INVALID_SIGNATURE: "auth",
  WRONG_SIGNATURE: "auth",
  WRONG_COMMISSION_PROGRAM: "auth",
  WRONG_COMMISSION_ACCOUNT: "auth",
  WRONG_COMMISSION_ARGUMENTS: "auth",
  MALFORMED_PROOF: "data",
  MALFORMED_PAYLOAD: "data",
  INSUFFICIENT_BALANCE: "resource",
};

// =============================================================================
// Error
// =============================================================================

/**
 * Structured error from the bridge core.
 * Always thrown, never returned as a status value.
 */
export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly category: BridgeErrorCategory;

  constructor(code: BridgeErrorCode, message: string) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}

export function isBridgeError(value: unknown): value is BridgeError {
  return value instanceof BridgeError;
}
