/**
 * Withdraw record routes.
 *
 *   GET /api/v1/withdrawals/:origin — Redemption status of a source-chain origin
 */

import { Hono } from "hono";
import { fromHex, toHex } from "@bridge-core/types";
import type { AppEnv } from "../types/api-contract.js";
import { Hex32Schema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createWithdrawalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:origin", (c) => {
    const param = Hex32Schema.safeParse(c.req.param("origin"));
    if (!param.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Origin must be 32 bytes of hex"),
        400,
      );
    }

    const view = c.get("service").getWithdrawal(fromHex(param.data));
    const { record } = view;
    return c.json({
      data: {
        origin: toHex(view.origin),
        address: toHex(view.address),
        redeemed: record !== null,
        record:
          record === null
            ? null
            : {
                tokenKind: record.tokenKind,
                mint: record.mint === null ? null : toHex(record.mint),
                amount: record.amount.toString(),
                receiver: toHex(record.receiver),
              },
      },
    });
  });

  return routes;
}
