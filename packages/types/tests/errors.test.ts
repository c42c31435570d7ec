import { describe, it, expect } from "vitest";
import { BridgeError, ERROR_CATEGORIES, isBridgeError } from "../src/errors.js";
import { tokenKindFromCode, transferAmount, transferMint } from "../src/transfer.js";

describe("BridgeError", () => {
  it("carries code, category and name", () => {
    const err = new BridgeError("WRONG_SIGNATURE", "recovered key does not match");
    expect(err.code).toBe("WRONG_SIGNATURE");
    expect(err.category).toBe("auth");
    expect(err.name).toBe("BridgeError");
    expect(err.message).toBe("recovered key does not match");
    expect(err).toBeInstanceOf(Error);
  });

  it("maps every code to a category", () => {
    expect(ERROR_CATEGORIES.WRONG_SEEDS).toBe("config");
    expect(ERROR_CATEGORIES.ALREADY_IN_USE).toBe("state");
    expect(ERROR_CATEGORIES.MALFORMED_PROOF).toBe("data");
    expect(ERROR_CATEGORIES.INSUFFICIENT_BALANCE).toBe("resource");
  });

  it("isBridgeError narrows only bridge errors", () => {
    expect(isBridgeError(new BridgeError("NOT_INITIALIZED", "x"))).toBe(true);
    expect(isBridgeError(new Error("x"))).toBe(false);
  });
});

describe("transfer accessors", () => {
  const mint = new Uint8Array(32).fill(3);

  it("NFT amount is always one", () => {
    expect(
      transferAmount({
        kind: "non_fungible",
        mint,
        collection: null,
        name: "",
        symbol: "",
        uri: "",
      }),
    ).toBe(1n);
  });

  it("native transfers have no mint", () => {
    expect(transferMint({ kind: "native", amount: 9n })).toBeNull();
    expect(transferAmount({ kind: "native", amount: 9n })).toBe(9n);
  });

  it("decodes token kind codes", () => {
    expect(tokenKindFromCode(0)).toBe("native");
    expect(tokenKindFromCode(1)).toBe("fungible");
    expect(tokenKindFromCode(2)).toBe("non_fungible");
    expect(tokenKindFromCode(3)).toBeNull();
  });
});
