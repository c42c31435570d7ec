import { describe, it, expect } from "vitest";
import { keccak_256 } from "@noble/hashes/sha3";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import type { ContentLeaf } from "@bridge-core/types";
import { BridgeError, u64ToWord } from "@bridge-core/types";
import {
  NETWORK_TAG,
  encodeContentLeaf,
  encodeTransferPayload,
  hashContentLeaf,
  stripNulPadding,
} from "../src/content-leaf.js";

// =============================================================================
// Fixtures
// =============================================================================

const origin = new Uint8Array(32).fill(1);
const receiver = new Uint8Array(32).fill(2);
const program = new Uint8Array(32).fill(3);
const mint = new Uint8Array(32).fill(4);
const collection = new Uint8Array(32).fill(5);
const zeros = new Uint8Array(32);

function leafWith(payload: ContentLeaf["payload"]): ContentLeaf {
  return { origin, receiver, destinationProgram: program, payload };
}

function header(): Uint8Array {
  return concatBytes(origin, utf8ToBytes("Solana"), receiver, program);
}

// =============================================================================
// Payloads
// =============================================================================

describe("encodeTransferPayload", () => {
  it("native: zero word then amount word", () => {
    const encoded = encodeTransferPayload({ kind: "native", amount: 1000n });

    expect(encoded).toHaveLength(64);
    expect(encoded.slice(0, 32)).toEqual(zeros);
    expect(encoded[62]).toBe(0x03);
    expect(encoded[63]).toBe(0xe8);
  });

  it("fungible: mint, amount, then raw metadata strings", () => {
    const encoded = encodeTransferPayload({
      kind: "fungible",
      mint,
      amount: 5n,
      name: "Wrapped",
      symbol: "WRP",
      uri: "https://example.test/w.json",
      decimals: 9,
    });

    expect(encoded).toEqual(
      concatBytes(
        mint,
        u64ToWord(5n),
        utf8ToBytes("WrappedWRPhttps://example.test/w.json"),
      ),
    );
  });

  it("fungible: decimals are not part of the leaf", () => {
    const base = {
      kind: "fungible" as const,
      mint,
      amount: 5n,
      name: "A",
      symbol: "B",
      uri: "C",
    };
    expect(encodeTransferPayload({ ...base, decimals: 0 })).toEqual(
      encodeTransferPayload({ ...base, decimals: 18 }),
    );
  });

  it("non-fungible: collection slot and a fixed amount of one", () => {
    const encoded = encodeTransferPayload({
      kind: "non_fungible",
      mint,
      collection,
      name: "Item",
      symbol: "ITM",
      uri: "ipfs://item",
    });

    expect(encoded).toEqual(
      concatBytes(mint, collection, u64ToWord(1n), utf8ToBytes("ItemITMipfs://item")),
    );
  });

  it("non-fungible without collection uses a zero word", () => {
    const encoded = encodeTransferPayload({
      kind: "non_fungible",
      mint,
      collection: null,
      name: "",
      symbol: "",
      uri: "",
    });

    expect(encoded).toEqual(concatBytes(mint, zeros, u64ToWord(1n)));
  });

  it("rejects a short mint", () => {
    expect(() =>
      encodeTransferPayload({
        kind: "fungible",
        mint: new Uint8Array(31),
        amount: 1n,
        name: "",
        symbol: "",
        uri: "",
        decimals: 0,
      }),
    ).toThrow("mint must be 32 bytes, got 31");
  });
});

// =============================================================================
// Leaves
// =============================================================================

describe("encodeContentLeaf", () => {
  it("prefixes the payload with origin, network tag, receiver and program", () => {
    const leaf = leafWith({ kind: "native", amount: 1000n });
    const encoded = encodeContentLeaf(leaf);

    expect(NETWORK_TAG).toBe("Solana");
    expect(encoded).toHaveLength(32 + 6 + 32 + 32 + 64);
    expect(encoded).toEqual(
      concatBytes(header(), zeros, u64ToWord(1000n)),
    );
  });

  it("rejects a receiver that is not 32 bytes", () => {
    try {
      encodeContentLeaf({
        ...leafWith({ kind: "native", amount: 1n }),
        receiver: new Uint8Array(20),
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BridgeError);
      if (err instanceof BridgeError) {
        expect(err.code).toBe("MALFORMED_PAYLOAD");
        expect(err.message).toBe("receiver must be 32 bytes, got 20");
      }
    }
  });
});

describe("hashContentLeaf", () => {
  it("is keccak-256 of the encoded leaf", () => {
    const leaf = leafWith({ kind: "native", amount: 42n });
    expect(hashContentLeaf(leaf)).toEqual(keccak_256(encodeContentLeaf(leaf)));
  });

  it("changes with the amount", () => {
    expect(hashContentLeaf(leafWith({ kind: "native", amount: 1n }))).not.toEqual(
      hashContentLeaf(leafWith({ kind: "native", amount: 2n })),
    );
  });
});

describe("stripNulPadding", () => {
  it("removes leading and trailing NULs only", () => {
    expect(stripNulPadding("abc\u0000\u0000")).toBe("abc");
    expect(stripNulPadding("\u0000a\u0000b\u0000")).toBe("a\u0000b");
    expect(stripNulPadding("plain")).toBe("plain");
  });
});
