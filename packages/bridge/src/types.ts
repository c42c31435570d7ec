/**
 * @bridge-core/bridge — Capabilities and request types.
 *
 * The bridge core never moves value or allocates storage itself. It
 * drives these capabilities, which the host platform binds to one atomic
 * unit of execution: either every effect of a request lands, or none.
 */

import type { Address, Bytes32, PublicKey64, TokenKind } from "@bridge-core/types";
import type { MerklePath } from "@bridge-core/proof";

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Deterministic address derivation from seeds and a program id.
 */
export interface AddressDeriver {
  deriveAddress(seeds: readonly Uint8Array[], programId: Address): Address;
}

/**
 * Program-owned data accounts.
 */
export interface AccountStore {
  /**
   * Allocate a zero-filled account. Exclusive: returns false, and changes
   * nothing, when the address is already occupied.
   */
  createAccountAt(address: Address, size: number, owner: Address, payer: Address): boolean;
  readAccount(address: Address): Uint8Array | null;
  writeAccount(address: Address, data: Uint8Array): void;
}

export interface MintInfo {
  readonly decimals: number;
  /** Account allowed to mint new units; null once fixed */
  readonly mintAuthority: Address | null;
  readonly supply: bigint;
}

/**
 * Token metadata as stored on chain. Fields may carry NUL padding.
 */
export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
  /** Verified collection mint, for non-fungible tokens */
  readonly collection: Address | null;
}

/**
 * Native value, token mints, token accounts and metadata.
 *
 * Token accounts are addressed directly; `associatedAddress` gives the
 * canonical account for an (owner, mint) pair.
 */
export interface AssetLedger {
  nativeBalance(account: Address): bigint;
  transferNative(from: Address, to: Address, amount: bigint): void;

  createMint(mint: Address, decimals: number, authority: Address, payer: Address): void;
  readMint(mint: Address): MintInfo | null;
  mintAsset(mint: Address, destination: Address, amount: bigint, authority: Address): void;

  associatedAddress(owner: Address, mint: Address): Address;
  createAssociatedAccount(owner: Address, mint: Address, payer: Address): Address;
  accountExists(address: Address): boolean;
  assetBalance(account: Address): bigint;
  transferAsset(source: Address, destination: Address, amount: bigint, authority: Address): void;
  burnAsset(account: Address, mint: Address, amount: bigint, authority: Address): void;

  createMetadataRecord(mint: Address, metadata: TokenMetadata, authority: Address, payer: Address): void;
  readMetadata(mint: Address): TokenMetadata | null;
}

/**
 * An operation that ran earlier in the same atomic unit.
 */
export interface PrecedingOperation {
  readonly programId: Address;
  readonly accounts: readonly Address[];
  readonly payload: Uint8Array;
}

export interface CoTransactionInspector {
  /** The operation immediately before the current one, if any */
  precedingOperation(): PrecedingOperation | null;
}

/**
 * Capabilities bound to one atomic unit.
 */
export interface ExecutionUnit {
  readonly accounts: AccountStore;
  readonly ledger: AssetLedger;
  readonly inspector: CoTransactionInspector;
}

// =============================================================================
// Requests
// =============================================================================

/** Every request names the admin seed it expects to operate on. */
export interface AdminScoped {
  readonly seeds: Bytes32;
}

export interface InitializeAdminRequest extends AdminScoped {
  readonly authorityKey: PublicKey64;
  readonly commissionProgram: Address;
  readonly payer: Address;
}

export interface RotateKeyRequest extends AdminScoped {
  readonly newKey: PublicKey64;
  readonly signature: Uint8Array;
  readonly recoveryId: number;
}

export interface DepositBase extends AdminScoped {
  /** Destination network name */
  readonly networkTo: string;
  /** Receiver on the destination network, in its own address format */
  readonly receiverAddress: string;
  /** Signer whose value leaves this chain */
  readonly owner: Address;
}

export interface DepositNativeRequest extends DepositBase {
  readonly amount: bigint;
}

export interface DepositTokenBase extends DepositBase {
  readonly mint: Address;
  /** Owner's token account the deposit is taken from */
  readonly ownerAccount: Address;
  /** Bridge's associated account for the mint */
  readonly bridgeAccount: Address;
  /** Set for wrapped assets minted by the bridge; those are burned */
  readonly tokenSeed?: Bytes32 | null;
}

export interface DepositFungibleRequest extends DepositTokenBase {
  readonly amount: bigint;
}

export type DepositNonFungibleRequest = DepositTokenBase;

/**
 * Metadata the authority signed over, used to create a wrapped mint the
 * first time it is withdrawn.
 */
export interface SignedTokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
  readonly decimals: number;
}

export interface WithdrawAuthorization extends AdminScoped {
  readonly signature: Uint8Array;
  readonly recoveryId: number;
  readonly path: MerklePath;
  readonly origin: Bytes32;
  readonly receiver: Address;
  /** Funds account creation */
  readonly payer: Address;
  /** Withdraw record address; checked against the derived one when given */
  readonly withdrawAccount?: Address | null;
}

export interface WithdrawNativeRequest extends WithdrawAuthorization {
  readonly amount: bigint;
}

export interface WithdrawTokenBase extends WithdrawAuthorization {
  readonly mint: Address;
  readonly tokenSeed?: Bytes32 | null;
  readonly signedMetadata?: SignedTokenMetadata | null;
  /** Checked against the associated addresses when given */
  readonly bridgeAccount?: Address | null;
  readonly receiverAccount?: Address | null;
}

export interface WithdrawFungibleRequest extends WithdrawTokenBase {
  readonly amount: bigint;
}

export type WithdrawNonFungibleRequest = WithdrawTokenBase;

export interface MintCollectionRequest extends AdminScoped {
  readonly mint: Address;
  readonly tokenSeed: Bytes32;
  readonly metadata: Omit<SignedTokenMetadata, "decimals">;
  readonly payer: Address;
}

// =============================================================================
// Results
// =============================================================================

/**
 * What a deposit locked or burned on this chain, for relayers to
 * carry to the destination network.
 */
export interface DepositReceipt {
  readonly tokenKind: TokenKind;
  readonly mint: Address | null;
  readonly amount: bigint;
  readonly owner: Address;
  readonly networkTo: string;
  readonly receiverAddress: string;
  /** True when a wrapped asset was burned rather than locked */
  readonly burned: boolean;
}
