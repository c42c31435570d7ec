/**
 * Withdrawal preflight routes.
 *
 *   POST /api/v1/proofs/verify — Check a leaf, merkle path and root signature
 *                                against the current authority key
 *
 * Nothing is executed: the answer says whether the bridge would accept the
 * authorization and whether the origin is already redeemed.
 */

import { Hono } from "hono";
import type { Address, ContentLeaf, TransferPayload } from "@bridge-core/types";
import { fromHex, toHex } from "@bridge-core/types";
import type { AppEnv } from "../types/api-contract.js";
import { VerifyWithdrawalSchema } from "../types/dto.js";
import type { ContentLeafDto, TransferPayloadDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

// =============================================================================
// Decoding
// =============================================================================

function toPayload(dto: TransferPayloadDto): TransferPayload {
  switch (dto.kind) {
    case "native":
      return { kind: "native", amount: BigInt(dto.amount) };
    case "fungible":
      return {
        kind: "fungible",
        mint: fromHex(dto.mint),
        amount: BigInt(dto.amount),
        name: dto.name,
        symbol: dto.symbol,
        uri: dto.uri,
        decimals: dto.decimals,
      };
    case "non_fungible":
      return {
        kind: "non_fungible",
        mint: fromHex(dto.mint),
        collection: dto.collection === null ? null : fromHex(dto.collection),
        name: dto.name,
        symbol: dto.symbol,
        uri: dto.uri,
      };
  }
}

function toLeaf(dto: ContentLeafDto, defaultProgram: Address): ContentLeaf {
  return {
    origin: fromHex(dto.origin),
    receiver: fromHex(dto.receiver),
    destinationProgram:
      dto.destinationProgram === undefined ? defaultProgram : fromHex(dto.destinationProgram),
    payload: toPayload(dto.payload),
  };
}

// =============================================================================
// Routes
// =============================================================================

export function createProofRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/verify", validateBody(VerifyWithdrawalSchema), (c) => {
    const body = c.get("validatedBody");
    const service = c.get("service");

    const result = service.preflight(toLeaf(body.leaf, service.program.programId), {
      path: body.path.map((sibling) => fromHex(sibling)),
      signature: fromHex(body.signature),
      recoveryId: body.recoveryId,
    });

    return c.json({
      data: {
        leafHash: toHex(result.leafHash),
        root: toHex(result.root),
        authorized: result.authorized,
        redeemed: result.redeemed,
        rejection: result.rejection,
        verifiedAt: new Date().toISOString(),
      },
    });
  });

  return routes;
}
