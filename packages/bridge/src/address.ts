/**
 * Address derivation.
 *
 * `ProgramAddressDeriver` produces Solana program-derived addresses: the
 * first off-curve sha-256 of (seeds, bump, program id, marker), searched
 * from bump 255 down. `HashAddressDeriver` is a plain keccak-256 over the
 * program id and length-prefixed seeds, for hosts without that rule.
 */

import { PublicKey } from "@solana/web3.js";
import { keccak_256 } from "@noble/hashes/sha3";
import type { Address } from "@bridge-core/types";
import { BridgeError, assertBytes32, concatBytes } from "@bridge-core/types";
import type { AddressDeriver } from "./types.js";

/** Per-seed limit imposed by program address derivation */
export const MAX_SEED_LENGTH = 32;
export const MAX_SEEDS = 16;

function assertSeeds(seeds: readonly Uint8Array[]): void {
  if (seeds.length > MAX_SEEDS) {
    throw new BridgeError("MALFORMED_PAYLOAD", `At most ${MAX_SEEDS} seeds, got ${seeds.length}`);
  }
  seeds.forEach((seed, i) => {
    if (seed.length > MAX_SEED_LENGTH) {
      throw new BridgeError(
        "MALFORMED_PAYLOAD",
        `Seed ${i} exceeds ${MAX_SEED_LENGTH} bytes: ${seed.length}`,
      );
    }
  });
}

export class ProgramAddressDeriver implements AddressDeriver {
  deriveAddress(seeds: readonly Uint8Array[], programId: Address): Address {
    assertSeeds(seeds);
    const [address] = PublicKey.findProgramAddressSync(
      [...seeds],
      new PublicKey(assertBytes32(programId, "programId")),
    );
    return Uint8Array.from(address.toBytes());
  }
}

export class HashAddressDeriver implements AddressDeriver {
  deriveAddress(seeds: readonly Uint8Array[], programId: Address): Address {
    assertSeeds(seeds);
    const parts = seeds.flatMap((seed) => [Uint8Array.of(seed.length), seed]);
    return keccak_256(concatBytes(assertBytes32(programId, "programId"), ...parts));
  }
}
