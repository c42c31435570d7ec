/**
 * Admin record routes.
 *
 *   GET /api/v1/admin — Admin address, authority key and commission program
 */

import { Hono } from "hono";
import { toHex } from "@bridge-core/types";
import type { AppEnv } from "../types/api-contract.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { address, record } = c.get("service").getAdmin();
    return c.json({
      data: {
        address: toHex(address),
        authorityKey: toHex(record.authorityKey),
        commissionProgram: toHex(record.commissionProgram),
      },
    });
  });

  return routes;
}
