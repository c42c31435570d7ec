/**
 * Relayer-side signer for batch roots and key rotations.
 *
 * Holds one secp256k1 private key in memory. Signatures are
 * deterministic (RFC 6979) and low-s normalized.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import type { Bytes32, PublicKey64 } from "@bridge-core/types";
import { BridgeError, assertBytes32 } from "@bridge-core/types";
import { keyRotationMessage } from "./signature.js";
import type { RecoverableSignature } from "./types.js";

export class AuthoritySigner {
  /** Uncompressed public key without the 0x04 prefix */
  readonly publicKey: PublicKey64;
  private readonly privateKey: Uint8Array;

  constructor(privateKey: Uint8Array) {
    if (!secp256k1.utils.isValidPrivateKey(privateKey)) {
      throw new BridgeError("MALFORMED_PAYLOAD", "Invalid secp256k1 private key");
    }
    this.privateKey = Uint8Array.from(privateKey);
    this.publicKey = secp256k1.getPublicKey(this.privateKey, false).slice(1);
  }

  static generate(): AuthoritySigner {
    return new AuthoritySigner(secp256k1.utils.randomPrivateKey());
  }

  /**
   * Sign a 32-byte digest.
   */
  sign(message: Bytes32): RecoverableSignature {
    assertBytes32(message, "message");
    const signature = secp256k1.sign(message, this.privateKey);
    return {
      signature: signature.toCompactRawBytes(),
      recoveryId: signature.recovery,
    };
  }

  /** Authorize a merkle batch root. */
  signRoot(root: Bytes32): RecoverableSignature {
    return this.sign(root);
  }

  /** Authorize handing the bridge over to `newKey`. */
  signKeyRotation(newKey: PublicKey64): RecoverableSignature {
    return this.sign(keyRotationMessage(newKey));
  }
}
