/**
 * BridgeProgram — request processor for the bridge.
 *
 * Every operation runs against one ExecutionUnit and either completes
 * or throws a BridgeError; the host discards the unit's effects on
 * failure. Each operation checks, in order:
 *
 * 1. the request's admin seed derives the configured admin address
 * 2. the admin record is initialized (except initializeAdmin)
 * 3. argument sizes
 * 4. operation-specific authorization (commission charge for deposits,
 *    leaf → root → signature for withdrawals)
 *
 * and only then moves value or writes records.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type {
  Address,
  AdminRecord,
  Bytes32,
  ContentLeaf,
  TokenKind,
  WithdrawRecord,
} from "@bridge-core/types";
import {
  BridgeError,
  assertBytes32,
  assertPublicKey,
  assertU64,
  bytesEqual,
  toHex,
} from "@bridge-core/types";
import { stripNulPadding } from "@bridge-core/proof";
import { ProgramAddressDeriver } from "./address.js";
import { AdminKeyStore } from "./admin-key-store.js";
import { CommissionChecker } from "./commission.js";
import { ReplayGuard } from "./replay-guard.js";
import type {
  AccountStore,
  AddressDeriver,
  DepositFungibleRequest,
  DepositNativeRequest,
  DepositNonFungibleRequest,
  DepositReceipt,
  DepositTokenBase,
  ExecutionUnit,
  InitializeAdminRequest,
  MintCollectionRequest,
  MintInfo,
  RotateKeyRequest,
  TokenMetadata,
  WithdrawFungibleRequest,
  WithdrawNativeRequest,
  WithdrawNonFungibleRequest,
  WithdrawTokenBase,
} from "./types.js";
import {
  validateDecimals,
  validateDepositTarget,
  validateMetadata,
  validateSignature,
} from "./validation.js";
import { authorizeWithdrawal } from "./withdrawal-authorization.js";
import type { WithdrawalProof } from "./withdrawal-authorization.js";

// =============================================================================
// Configuration
// =============================================================================

export interface BridgeProgramConfig {
  /** This bridge's program id; hashed into every content leaf */
  readonly programId: Address;
  /** Seed of the admin address */
  readonly adminSeed: Bytes32;
  /** Defaults to Solana program-derived addresses */
  readonly deriver?: AddressDeriver;
  /** Defaults to a silent logger */
  readonly logger?: Logger;
}

// =============================================================================
// Program
// =============================================================================

export class BridgeProgram {
  readonly programId: Address;
  readonly adminAddress: Address;
  readonly deriver: AddressDeriver;
  private readonly logger: Logger;

  constructor(config: BridgeProgramConfig) {
    this.programId = assertBytes32(config.programId, "programId");
    this.deriver = config.deriver ?? new ProgramAddressDeriver();
    this.adminAddress = this.deriver.deriveAddress(
      [assertBytes32(config.adminSeed, "adminSeed")],
      this.programId,
    );
    this.logger = (config.logger ?? pino({ level: "silent" })).child({
      component: "bridge-program",
    });
  }

  adminStore(accounts: AccountStore): AdminKeyStore {
    return new AdminKeyStore(accounts, this.adminAddress, this.programId);
  }

  replayGuard(accounts: AccountStore): ReplayGuard {
    return new ReplayGuard(accounts, this.deriver, this.programId);
  }

  // ─── Admin ─────────────────────────────────────────────────────────

  initializeAdmin(unit: ExecutionUnit, request: InitializeAdminRequest): AdminRecord {
    return this.instruction("initialize_admin", {}, () => {
      this.assertSeeds(request.seeds);
      return this.adminStore(unit.accounts).initialize(
        request.authorityKey,
        request.commissionProgram,
        request.payer,
      );
    });
  }

  rotateKey(unit: ExecutionUnit, request: RotateKeyRequest): AdminRecord {
    return this.instruction("rotate_key", {}, () => {
      this.assertSeeds(request.seeds);
      assertPublicKey(request.newKey, "newKey");
      validateSignature(request.signature, request.recoveryId);
      return this.adminStore(unit.accounts).rotateKey(
        request.newKey,
        request.signature,
        request.recoveryId,
      );
    });
  }

  // ─── Deposits ──────────────────────────────────────────────────────

  depositNative(unit: ExecutionUnit, request: DepositNativeRequest): DepositReceipt {
    return this.instruction("deposit_native", { amount: String(request.amount) }, () => {
      const admin = this.loadAdmin(unit, request.seeds);
      validateDepositTarget(request.networkTo, request.receiverAddress);
      assertU64(request.amount, "amount");

      this.commission(unit).assertCharged(admin, this.adminAddress, "native", request.amount);
      unit.ledger.transferNative(request.owner, this.adminAddress, request.amount);

      return {
        tokenKind: "native",
        mint: null,
        amount: request.amount,
        owner: request.owner,
        networkTo: request.networkTo,
        receiverAddress: request.receiverAddress,
        burned: false,
      };
    });
  }

  depositFungible(unit: ExecutionUnit, request: DepositFungibleRequest): DepositReceipt {
    return this.instruction("deposit_ft", { amount: String(request.amount) }, () =>
      this.depositToken(unit, request, "fungible", assertU64(request.amount, "amount")),
    );
  }

  depositNonFungible(unit: ExecutionUnit, request: DepositNonFungibleRequest): DepositReceipt {
    return this.instruction("deposit_nft", {}, () =>
      this.depositToken(unit, request, "non_fungible", 1n),
    );
  }

  // ─── Withdrawals ───────────────────────────────────────────────────

  withdrawNative(unit: ExecutionUnit, request: WithdrawNativeRequest): WithdrawRecord {
    return this.instruction("withdraw_native", { origin: toHex(request.origin) }, () => {
      const admin = this.loadAdmin(unit, request.seeds);
      assertU64(request.amount, "amount");
      validateSignature(request.signature, request.recoveryId);

      this.authorize(admin, {
        origin: request.origin,
        receiver: request.receiver,
        destinationProgram: this.programId,
        payload: { kind: "native", amount: request.amount },
      }, request);

      const available = unit.ledger.nativeBalance(this.adminAddress);
      if (available < request.amount) {
        throw new BridgeError(
          "INSUFFICIENT_BALANCE",
          `Bridge holds ${available}, withdrawal needs ${request.amount}`,
        );
      }

      const guard = this.replayGuard(unit.accounts);
      guard.claim(request.origin, request.payer, request.withdrawAccount);
      unit.ledger.transferNative(this.adminAddress, request.receiver, request.amount);

      const record: WithdrawRecord = {
        initialized: true,
        tokenKind: "native",
        origin: request.origin,
        mint: null,
        amount: request.amount,
        receiver: request.receiver,
      };
      guard.finalize(record);
      return record;
    });
  }

  withdrawFungible(unit: ExecutionUnit, request: WithdrawFungibleRequest): WithdrawRecord {
    return this.instruction("withdraw_ft", { origin: toHex(request.origin) }, () => {
      const admin = this.loadAdmin(unit, request.seeds);
      assertU64(request.amount, "amount");
      validateSignature(request.signature, request.recoveryId);

      this.ensureWrappedMint(unit, request);
      const mintInfo = this.requireMint(unit, request.mint);
      const metadata = this.requireMetadata(unit, request.mint);

      this.authorize(admin, {
        origin: request.origin,
        receiver: request.receiver,
        destinationProgram: this.programId,
        payload: {
          kind: "fungible",
          mint: request.mint,
          amount: request.amount,
          name: stripNulPadding(metadata.name),
          symbol: stripNulPadding(metadata.symbol),
          uri: stripNulPadding(metadata.uri),
          decimals: mintInfo.decimals,
        },
      }, request);

      return this.releaseToken(unit, request, mintInfo, "fungible", request.amount);
    });
  }

  withdrawNonFungible(unit: ExecutionUnit, request: WithdrawNonFungibleRequest): WithdrawRecord {
    return this.instruction("withdraw_nft", { origin: toHex(request.origin) }, () => {
      const admin = this.loadAdmin(unit, request.seeds);
      validateSignature(request.signature, request.recoveryId);

      this.ensureWrappedMint(unit, request);
      const mintInfo = this.requireMint(unit, request.mint);
      const metadata = this.requireMetadata(unit, request.mint);

      // Collection members are named after their collection
      let { name, symbol } = metadata;
      if (metadata.collection !== null) {
        const collectionMetadata = this.requireMetadata(unit, metadata.collection);
        name = collectionMetadata.name;
        symbol = collectionMetadata.symbol;
      }

      this.authorize(admin, {
        origin: request.origin,
        receiver: request.receiver,
        destinationProgram: this.programId,
        payload: {
          kind: "non_fungible",
          mint: request.mint,
          collection: metadata.collection,
          name: stripNulPadding(name),
          symbol: stripNulPadding(symbol),
          uri: stripNulPadding(metadata.uri),
        },
      }, request);

      return this.releaseToken(unit, request, mintInfo, "non_fungible", 1n);
    });
  }

  // ─── Collections ───────────────────────────────────────────────────

  /**
   * Create a bridge-owned collection mint holding a single unit.
   */
  mintCollection(unit: ExecutionUnit, request: MintCollectionRequest): Address {
    return this.instruction("mint_collection", { mint: toHex(request.mint) }, () => {
      this.loadAdmin(unit, request.seeds);
      validateMetadata(request.metadata);
      this.assertTokenSeed(request.mint, request.tokenSeed);

      if (unit.ledger.readMint(request.mint) !== null) {
        throw new BridgeError("ALREADY_IN_USE", `Mint ${toHex(request.mint)} already exists`);
      }

      const { ledger } = unit;
      ledger.createMint(request.mint, 0, this.adminAddress, request.payer);
      const bridgeAccount = ledger.createAssociatedAccount(
        this.adminAddress,
        request.mint,
        request.payer,
      );
      ledger.mintAsset(request.mint, bridgeAccount, 1n, this.adminAddress);
      ledger.createMetadataRecord(
        request.mint,
        { ...request.metadata, collection: null },
        this.adminAddress,
        request.payer,
      );
      return request.mint;
    });
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private instruction<T>(name: string, context: Record<string, string>, run: () => T): T {
    const log = this.logger.child({ instruction: name, ...context });
    log.debug("Processing instruction");
    try {
      const result = run();
      log.info("Instruction succeeded");
      return result;
    } catch (err) {
      if (err instanceof BridgeError) {
        log.warn({ code: err.code }, err.message);
      } else {
        log.error({ err }, "Instruction failed");
      }
      throw err;
    }
  }

  private assertSeeds(seeds: Bytes32): void {
    const derived = this.deriver.deriveAddress([assertBytes32(seeds, "seeds")], this.programId);
    if (!bytesEqual(derived, this.adminAddress)) {
      throw new BridgeError("WRONG_SEEDS", "Seeds do not derive the bridge admin address");
    }
  }

  private loadAdmin(unit: ExecutionUnit, seeds: Bytes32): AdminRecord {
    this.assertSeeds(seeds);
    return this.adminStore(unit.accounts).load();
  }

  private commission(unit: ExecutionUnit): CommissionChecker {
    return new CommissionChecker(unit.inspector, this.deriver);
  }

  private authorize(admin: AdminRecord, leaf: ContentLeaf, proof: WithdrawalProof): void {
    const { root } = authorizeWithdrawal(admin.authorityKey, leaf, proof);
    this.logger.debug({ root: toHex(root) }, "Withdrawal root authorized");
  }

  private assertTokenSeed(mint: Address, tokenSeed: Bytes32): void {
    const expected = this.deriver.deriveAddress([tokenSeed], this.programId);
    if (!bytesEqual(expected, mint)) {
      throw new BridgeError(
        "WRONG_TOKEN_SEED",
        `Mint ${toHex(mint)} is not derived from the token seed`,
      );
    }
  }

  private requireMint(unit: ExecutionUnit, mint: Address): MintInfo {
    const info = unit.ledger.readMint(mint);
    if (info === null) {
      throw new BridgeError("WRONG_TOKEN_ACCOUNT", `Mint ${toHex(mint)} does not exist`);
    }
    return info;
  }

  private requireMetadata(unit: ExecutionUnit, mint: Address): TokenMetadata {
    const metadata = unit.ledger.readMetadata(mint);
    if (metadata === null) {
      throw new BridgeError(
        "WRONG_METADATA_ACCOUNT",
        `No metadata record for mint ${toHex(mint)}`,
      );
    }
    return metadata;
  }

  /**
   * The associated account of `owner` for `mint`, created when missing.
   */
  private ensureAssociated(
    unit: ExecutionUnit,
    owner: Address,
    mint: Address,
    payer: Address,
    supplied?: Address | null,
  ): Address {
    const address = unit.ledger.associatedAddress(owner, mint);
    if (supplied != null && !bytesEqual(supplied, address)) {
      throw new BridgeError(
        "WRONG_TOKEN_ACCOUNT",
        `Expected associated account ${toHex(address)}`,
      );
    }
    if (!unit.ledger.accountExists(address)) {
      unit.ledger.createAssociatedAccount(owner, mint, payer);
    }
    return address;
  }

  /**
   * Wrapped assets only: create the mint and its metadata the first time
   * it is withdrawn. The metadata is the one the authority signed over.
   */
  private ensureWrappedMint(unit: ExecutionUnit, request: WithdrawTokenBase): void {
    const { mint, tokenSeed } = request;
    if (tokenSeed == null) return;
    this.assertTokenSeed(mint, tokenSeed);

    const signed = request.signedMetadata;
    if (signed == null) {
      throw new BridgeError(
        "MALFORMED_PAYLOAD",
        "Signed token metadata is required for wrapped assets",
      );
    }
    validateMetadata(signed);
    validateDecimals(signed.decimals);

    if (unit.ledger.readMint(mint) !== null) return;

    this.logger.info({ mint: toHex(mint) }, "Creating wrapped mint");
    unit.ledger.createMint(mint, signed.decimals, this.adminAddress, request.payer);
    unit.ledger.createMetadataRecord(
      mint,
      { name: signed.name, symbol: signed.symbol, uri: signed.uri, collection: null },
      this.adminAddress,
      request.payer,
    );
  }

  private depositToken(
    unit: ExecutionUnit,
    request: DepositTokenBase,
    kind: TokenKind,
    amount: bigint,
  ): DepositReceipt {
    const admin = this.loadAdmin(unit, request.seeds);
    validateDepositTarget(request.networkTo, request.receiverAddress);

    this.commission(unit).assertCharged(admin, this.adminAddress, kind, amount);

    const bridgeAccount = this.ensureAssociated(
      unit,
      this.adminAddress,
      request.mint,
      request.owner,
      request.bridgeAccount,
    );

    const { tokenSeed } = request;
    const burned = tokenSeed != null;
    if (tokenSeed != null) {
      this.assertTokenSeed(request.mint, tokenSeed);
      unit.ledger.burnAsset(request.ownerAccount, request.mint, amount, request.owner);
    } else {
      unit.ledger.transferAsset(request.ownerAccount, bridgeAccount, amount, request.owner);
    }

    return {
      tokenKind: kind,
      mint: request.mint,
      amount,
      owner: request.owner,
      networkTo: request.networkTo,
      receiverAddress: request.receiverAddress,
      burned,
    };
  }

  /**
   * Pay a token withdrawal out of the bridge's associated account,
   * minting the shortfall when the bridge controls the mint, then
   * record the origin as redeemed.
   */
  private releaseToken(
    unit: ExecutionUnit,
    request: WithdrawTokenBase,
    mintInfo: MintInfo,
    kind: "fungible" | "non_fungible",
    amount: bigint,
  ): WithdrawRecord {
    const { ledger } = unit;
    const guard = this.replayGuard(unit.accounts);
    guard.claim(request.origin, request.payer, request.withdrawAccount);

    const bridgeAccount = this.ensureAssociated(
      unit,
      this.adminAddress,
      request.mint,
      request.payer,
      request.bridgeAccount,
    );
    const receiverAccount = this.ensureAssociated(
      unit,
      request.receiver,
      request.mint,
      request.payer,
      request.receiverAccount,
    );

    const held = ledger.assetBalance(bridgeAccount);
    if (held < amount) {
      const canMint =
        mintInfo.mintAuthority !== null && bytesEqual(mintInfo.mintAuthority, this.adminAddress);
      if (!canMint) {
        throw new BridgeError(
          "INSUFFICIENT_BALANCE",
          `Bridge holds ${held} of mint ${toHex(request.mint)}, withdrawal needs ${amount}`,
        );
      }
      ledger.mintAsset(request.mint, bridgeAccount, amount - held, this.adminAddress);
    }
    ledger.transferAsset(bridgeAccount, receiverAccount, amount, this.adminAddress);

    const record: WithdrawRecord = {
      initialized: true,
      tokenKind: kind,
      origin: request.origin,
      mint: request.mint,
      amount,
      receiver: request.receiver,
    };
    guard.finalize(record);
    return record;
  }
}
