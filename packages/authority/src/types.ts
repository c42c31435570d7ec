/**
 * @bridge-core/authority — Core types.
 */

/**
 * A compact secp256k1 signature with the recovery id needed to
 * reconstruct the signer's public key.
 */
export interface RecoverableSignature {
  /** r || s, 64 bytes */
  readonly signature: Uint8Array;
  /** 0..3 */
  readonly recoveryId: number;
}
