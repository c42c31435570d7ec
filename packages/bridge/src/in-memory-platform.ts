/**
 * In-memory platform.
 *
 * Hosts the bridge without a chain: program accounts, native balances,
 * token mints, token accounts and metadata live in maps. A list of
 * operations runs as one atomic unit over a copy of the state, and the
 * copy replaces the committed state only if every operation succeeds.
 *
 * Token accounts follow the associated-account convention: the account
 * of (owner, mint) lives at the address derived from
 * [owner, token program, mint] under the associated-token program.
 */

import { PublicKey } from "@solana/web3.js";
import type { Address, TokenKind } from "@bridge-core/types";
import { BridgeError, assertU64, toHex } from "@bridge-core/types";
import { ProgramAddressDeriver } from "./address.js";
import { encodeChargeCommission } from "./commission.js";
import type {
  AccountStore,
  AddressDeriver,
  AssetLedger,
  CoTransactionInspector,
  ExecutionUnit,
  MintInfo,
  PrecedingOperation,
  TokenMetadata,
} from "./types.js";

export const TOKEN_PROGRAM_ID: Address = Uint8Array.from(
  new PublicKey("TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA").toBytes(),
);
export const ASSOCIATED_TOKEN_PROGRAM_ID: Address = Uint8Array.from(
  new PublicKey("ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL").toBytes(),
);

const MINT_SIZE = 82;
const TOKEN_ACCOUNT_SIZE = 165;
const METADATA_SIZE = 679;

// =============================================================================
// State
// =============================================================================

interface StoredAccount {
  readonly owner: Address;
  data: Uint8Array;
}

interface StoredMint {
  readonly decimals: number;
  readonly mintAuthority: Address | null;
  supply: bigint;
}

interface StoredTokenAccount {
  readonly mint: Address;
  readonly owner: Address;
  amount: bigint;
}

interface PlatformState {
  readonly accounts: Map<string, StoredAccount>;
  readonly native: Map<string, bigint>;
  readonly mints: Map<string, StoredMint>;
  readonly tokenAccounts: Map<string, StoredTokenAccount>;
  readonly metadata: Map<string, TokenMetadata>;
}

function emptyState(): PlatformState {
  return {
    accounts: new Map(),
    native: new Map(),
    mints: new Map(),
    tokenAccounts: new Map(),
    metadata: new Map(),
  };
}

function cloneState(state: PlatformState): PlatformState {
  const copy = <V>(map: Map<string, V>, f: (v: V) => V): Map<string, V> =>
    new Map([...map].map(([k, v]) => [k, f(v)]));
  return {
    accounts: copy(state.accounts, (a) => ({ owner: a.owner, data: Uint8Array.from(a.data) })),
    native: new Map(state.native),
    mints: copy(state.mints, (m) => ({ ...m })),
    tokenAccounts: copy(state.tokenAccounts, (t) => ({ ...t })),
    metadata: new Map(state.metadata),
  };
}

// =============================================================================
// Operations
// =============================================================================

/**
 * One step of an atomic unit. `programId`, `accounts` and `payload`
 * describe the step to whatever runs after it; `run` applies its effects.
 */
export interface PlatformOperation extends PrecedingOperation {
  readonly run?: (unit: ExecutionUnit) => void;
}

/**
 * A commission-program charge, to place directly before a deposit.
 * The charge itself has no effect here; only its description is checked.
 */
export function chargeCommissionOperation(
  commissionProgram: Address,
  commissionAccount: Address,
  tokenKind: TokenKind,
  amount: bigint,
): PlatformOperation {
  return {
    programId: commissionProgram,
    accounts: [commissionAccount],
    payload: encodeChargeCommission(tokenKind, amount),
  };
}

export interface InMemoryPlatformOptions {
  readonly deriver?: AddressDeriver;
  /** Native units a new account takes from its payer per byte of storage */
  readonly rentPerByte?: bigint;
}

// =============================================================================
// Execution unit
// =============================================================================

class InMemoryUnit implements AccountStore, AssetLedger, CoTransactionInspector {
  constructor(
    private readonly state: PlatformState,
    private readonly deriver: AddressDeriver,
    private readonly rentPerByte: bigint,
    private readonly preceding: PrecedingOperation | null,
  ) {}

  // ─── Inspector ─────────────────────────────────────────────────────

  precedingOperation(): PrecedingOperation | null {
    if (this.preceding === null) return null;
    return {
      programId: this.preceding.programId,
      accounts: [...this.preceding.accounts],
      payload: Uint8Array.from(this.preceding.payload),
    };
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  createAccountAt(address: Address, size: number, owner: Address, payer: Address): boolean {
    if (this.accountExists(address)) return false;
    this.chargeRent(payer, address, size);
    this.state.accounts.set(toHex(address), { owner, data: new Uint8Array(size) });
    return true;
  }

  readAccount(address: Address): Uint8Array | null {
    const account = this.state.accounts.get(toHex(address));
    return account === undefined ? null : Uint8Array.from(account.data);
  }

  writeAccount(address: Address, data: Uint8Array): void {
    const account = this.state.accounts.get(toHex(address));
    if (account === undefined) {
      throw new Error(`Account ${toHex(address)} does not exist`);
    }
    if (account.data.length !== data.length) {
      throw new Error(
        `Account ${toHex(address)} holds ${account.data.length} bytes, got ${data.length}`,
      );
    }
    account.data = Uint8Array.from(data);
  }

  accountExists(address: Address): boolean {
    const key = toHex(address);
    return (
      this.state.accounts.has(key) ||
      this.state.mints.has(key) ||
      this.state.tokenAccounts.has(key)
    );
  }

  // ─── Native ────────────────────────────────────────────────────────

  nativeBalance(account: Address): bigint {
    return this.state.native.get(toHex(account)) ?? 0n;
  }

  transferNative(from: Address, to: Address, amount: bigint): void {
    assertU64(amount, "amount");
    this.debitNative(from, amount);
    this.creditNative(to, amount);
  }

  // ─── Mints ─────────────────────────────────────────────────────────

  createMint(mint: Address, decimals: number, authority: Address, payer: Address): void {
    if (this.accountExists(mint)) {
      throw new BridgeError("ALREADY_IN_USE", `Mint address ${toHex(mint)} is occupied`);
    }
    this.chargeRent(payer, mint, MINT_SIZE);
    this.state.mints.set(toHex(mint), { decimals, mintAuthority: authority, supply: 0n });
  }

  readMint(mint: Address): MintInfo | null {
    const stored = this.state.mints.get(toHex(mint));
    return stored === undefined ? null : { ...stored };
  }

  mintAsset(mint: Address, destination: Address, amount: bigint, authority: Address): void {
    assertU64(amount, "amount");
    const stored = this.mintAt(mint);
    if (stored.mintAuthority === null || toHex(stored.mintAuthority) !== toHex(authority)) {
      throw new BridgeError("WRONG_TOKEN_ACCOUNT", `Not the mint authority of ${toHex(mint)}`);
    }
    const account = this.tokenAccountAt(destination, mint);
    stored.supply += amount;
    account.amount += amount;
  }

  // ─── Token accounts ────────────────────────────────────────────────

  associatedAddress(owner: Address, mint: Address): Address {
    return this.deriver.deriveAddress([owner, TOKEN_PROGRAM_ID, mint], ASSOCIATED_TOKEN_PROGRAM_ID);
  }

  createAssociatedAccount(owner: Address, mint: Address, payer: Address): Address {
    this.mintAt(mint);
    const address = this.associatedAddress(owner, mint);
    if (this.accountExists(address)) {
      throw new BridgeError("ALREADY_IN_USE", `Token account ${toHex(address)} exists`);
    }
    this.chargeRent(payer, address, TOKEN_ACCOUNT_SIZE);
    this.state.tokenAccounts.set(toHex(address), { mint, owner, amount: 0n });
    return address;
  }

  assetBalance(account: Address): bigint {
    return this.state.tokenAccounts.get(toHex(account))?.amount ?? 0n;
  }

  transferAsset(source: Address, destination: Address, amount: bigint, authority: Address): void {
    assertU64(amount, "amount");
    const from = this.ownedTokenAccount(source, authority);
    const to = this.tokenAccountAt(destination, from.mint);
    if (from.amount < amount) {
      throw new BridgeError(
        "INSUFFICIENT_BALANCE",
        `Token account ${toHex(source)} holds ${from.amount}, needs ${amount}`,
      );
    }
    from.amount -= amount;
    to.amount += amount;
  }

  burnAsset(account: Address, mint: Address, amount: bigint, authority: Address): void {
    assertU64(amount, "amount");
    const stored = this.mintAt(mint);
    const from = this.ownedTokenAccount(account, authority);
    if (toHex(from.mint) !== toHex(mint)) {
      throw new BridgeError("WRONG_TOKEN_ACCOUNT", `Token account ${toHex(account)} is for another mint`);
    }
    if (from.amount < amount) {
      throw new BridgeError(
        "INSUFFICIENT_BALANCE",
        `Token account ${toHex(account)} holds ${from.amount}, cannot burn ${amount}`,
      );
    }
    from.amount -= amount;
    stored.supply -= amount;
  }

  // ─── Metadata ──────────────────────────────────────────────────────

  createMetadataRecord(
    mint: Address,
    metadata: TokenMetadata,
    authority: Address,
    payer: Address,
  ): void {
    const stored = this.mintAt(mint);
    if (stored.mintAuthority === null || toHex(stored.mintAuthority) !== toHex(authority)) {
      throw new BridgeError("WRONG_METADATA_ACCOUNT", `Not the mint authority of ${toHex(mint)}`);
    }
    if (this.state.metadata.has(toHex(mint))) {
      throw new BridgeError("ALREADY_IN_USE", `Metadata for ${toHex(mint)} exists`);
    }
    this.chargeRent(payer, null, METADATA_SIZE);
    this.state.metadata.set(toHex(mint), { ...metadata });
  }

  readMetadata(mint: Address): TokenMetadata | null {
    const metadata = this.state.metadata.get(toHex(mint));
    return metadata === undefined ? null : { ...metadata };
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private creditNative(account: Address, amount: bigint): void {
    this.state.native.set(toHex(account), this.nativeBalance(account) + amount);
  }

  private debitNative(account: Address, amount: bigint): void {
    const balance = this.nativeBalance(account);
    if (balance < amount) {
      throw new BridgeError(
        "INSUFFICIENT_BALANCE",
        `Account ${toHex(account)} holds ${balance}, needs ${amount}`,
      );
    }
    this.state.native.set(toHex(account), balance - amount);
  }

  private chargeRent(payer: Address, recipient: Address | null, size: number): void {
    const rent = BigInt(size) * this.rentPerByte;
    if (rent === 0n) return;
    this.debitNative(payer, rent);
    if (recipient !== null) this.creditNative(recipient, rent);
  }

  private mintAt(mint: Address): StoredMint {
    const stored = this.state.mints.get(toHex(mint));
    if (stored === undefined) {
      throw new BridgeError("WRONG_TOKEN_ACCOUNT", `Mint ${toHex(mint)} does not exist`);
    }
    return stored;
  }

  private tokenAccountAt(address: Address, mint: Address): StoredTokenAccount {
    const account = this.state.tokenAccounts.get(toHex(address));
    if (account === undefined || toHex(account.mint) !== toHex(mint)) {
      throw new BridgeError(
        "WRONG_TOKEN_ACCOUNT",
        `No token account for mint ${toHex(mint)} at ${toHex(address)}`,
      );
    }
    return account;
  }

  private ownedTokenAccount(address: Address, authority: Address): StoredTokenAccount {
    const account = this.state.tokenAccounts.get(toHex(address));
    if (account === undefined) {
      throw new BridgeError("WRONG_TOKEN_ACCOUNT", `No token account at ${toHex(address)}`);
    }
    if (toHex(account.owner) !== toHex(authority)) {
      throw new BridgeError(
        "WRONG_TOKEN_ACCOUNT",
        `Token account ${toHex(address)} is not owned by the signer`,
      );
    }
    return account;
  }
}

// =============================================================================
// Platform
// =============================================================================

export class InMemoryPlatform {
  readonly deriver: AddressDeriver;
  private readonly rentPerByte: bigint;
  private state: PlatformState = emptyState();

  constructor(options: InMemoryPlatformOptions = {}) {
    this.deriver = options.deriver ?? new ProgramAddressDeriver();
    this.rentPerByte = options.rentPerByte ?? 0n;
  }

  /**
   * Run operations as one atomic unit. Each operation sees the one
   * before it through the inspector. On the first failure nothing is
   * committed and the error is rethrown.
   */
  execute(operations: readonly PlatformOperation[]): void {
    const working = cloneState(this.state);
    let preceding: PrecedingOperation | null = null;
    for (const operation of operations) {
      operation.run?.(this.unitOver(working, preceding));
      preceding = operation;
    }
    this.state = working;
  }

  /**
   * Run one call on behalf of `programId`, after `preceding` in the
   * same unit, and return its result.
   */
  invoke<T>(
    programId: Address,
    call: (unit: ExecutionUnit) => T,
    preceding: readonly PlatformOperation[] = [],
  ): T {
    const results: T[] = [];
    this.execute([
      ...preceding,
      {
        programId,
        accounts: [],
        payload: new Uint8Array(0),
        run: (unit) => {
          results.push(call(unit));
        },
      },
    ]);
    return results[0];
  }

  /**
   * Read through a throwaway copy of the committed state.
   */
  inspect<T>(read: (unit: ExecutionUnit) => T): T {
    return read(this.unitOver(cloneState(this.state), null));
  }

  // ─── Setup ─────────────────────────────────────────────────────────

  /** Credit native units out of thin air. */
  fund(account: Address, amount: bigint): void {
    assertU64(amount, "amount");
    const key = toHex(account);
    this.state.native.set(key, (this.state.native.get(key) ?? 0n) + amount);
  }

  /**
   * Register a mint controlled by someone other than the bridge, with
   * optional metadata.
   */
  createExternalMint(
    mint: Address,
    decimals: number,
    authority: Address,
    metadata: TokenMetadata | null = null,
  ): void {
    this.invoke(new Uint8Array(32), (unit) => {
      unit.ledger.createMint(mint, decimals, authority, authority);
      if (metadata !== null) {
        unit.ledger.createMetadataRecord(mint, metadata, authority, authority);
      }
    });
  }

  /**
   * Mint `amount` into the associated account of `owner`, creating it
   * when missing. `authority` must control the mint.
   */
  creditTokens(owner: Address, mint: Address, amount: bigint, authority: Address): Address {
    return this.invoke(new Uint8Array(32), (unit) => {
      const address = unit.ledger.associatedAddress(owner, mint);
      if (!unit.ledger.accountExists(address)) {
        unit.ledger.createAssociatedAccount(owner, mint, authority);
      }
      unit.ledger.mintAsset(mint, address, amount, authority);
      return address;
    });
  }

  private unitOver(state: PlatformState, preceding: PrecedingOperation | null): ExecutionUnit {
    const unit = new InMemoryUnit(state, this.deriver, this.rentPerByte, preceding);
    return { accounts: unit, ledger: unit, inspector: unit };
  }
}
