/**
 * Vault routes.
 *
 * GET  /api/v1/vault                    : Totals, share price, lock-up, clock
 * GET  /api/v1/vault/positions/:address : One holder's position
 * POST /api/v1/vault/deposit            : Deposit and mint shares
 * POST /api/v1/vault/withdraw           : Burn shares and pay out
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, DepositSchema, WithdrawSchema } from "../types/dto.js";
import { parseBody, parseValue } from "../middleware/validate.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").summary() });
  });

  routes.get("/positions/:address", (c) => {
    const holder = parseValue(AddressSchema, c.req.param("address"), "Invalid address");
    return c.json({ data: c.get("service").position(holder) });
  });

  routes.post("/deposit", async (c) => {
    const body = await parseBody(c, DepositSchema);
    return c.json({ data: c.get("service").deposit(body) }, 201);
  });

  routes.post("/withdraw", async (c) => {
    const body = await parseBody(c, WithdrawSchema);
    return c.json({ data: c.get("service").withdraw(body) });
  });

  return routes;
}
