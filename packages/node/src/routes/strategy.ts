/**
 * GET /api/v1/strategy/reserves: Accounted reserves and their values,
 * in holding-set order.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createStrategyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/reserves", (c) => {
    const service = c.get("service");
    const summary = service.summary();
    return c.json({
      data: {
        strategy: summary.strategy,
        totalAssets: summary.totalAssets,
        reserves: service.reserves(),
      },
    });
  });

  return routes;
}
