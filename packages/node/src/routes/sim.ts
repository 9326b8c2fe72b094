/**
 * Simulation controls.
 *
 * POST /api/v1/sim/faucet       : Mint test funds to an account
 * POST /api/v1/sim/advance-time : Move the chain clock forward
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AdvanceTimeSchema, FaucetSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";

export function createSimRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/faucet", async (c) => {
    const body = await parseBody(c, FaucetSchema);
    return c.json({ data: c.get("service").faucet(body) });
  });

  routes.post("/advance-time", async (c) => {
    const body = await parseBody(c, AdvanceTimeSchema);
    const now = c.get("service").advanceTime(body);
    return c.json({ data: { now } });
  });

  return routes;
}
