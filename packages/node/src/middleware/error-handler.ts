/**
 * Global error handler.
 *
 * Reverted calls surface their ProtocolError code with a status from
 * STATUS_MAP. Request validation failures answer 400 with the zod issues.
 * Anything else is a bug and answers 500 without details.
 */

import type { Context } from "hono";
import { isProtocolError } from "@yieldmesh/types";
import type { ProtocolErrorCode } from "@yieldmesh/types";
import { RequestValidationError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Protocol Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 409 | 422 | 500;

export const STATUS_MAP: Readonly<Record<ProtocolErrorCode, ErrorStatus>> = {
  // Caller not allowed
  UNAUTHORIZED: 403,

  // Input errors
  ZERO_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  UNKNOWN_ASSET: 400,
  INVALID_SWAPPER: 400,

  // Timing
  COME_BACK_LATER: 409,
  REENTRANT_CALL: 409,

  // Business rules
  TOO_SMALL: 422,
  EXCEEDS_DEPOSIT_CEILING: 422,
  INSUFFICIENT_SHARES: 422,
  VAULT_INSOLVENT: 422,
  FAILED_TO_SEND_ETH: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_RESERVE: 422,
  INSUFFICIENT_LIQUIDITY: 422,
  NOT_PAYABLE: 422,
  NOT_SUPPORTED_SWAPPER: 422,
  SET_DEFAULT_SWAPPER_BEFORE: 422,
  SLIPPAGE_EXCEEDED: 422,
  REGISTRY_WITHDRAW_BLOCKED: 422,
  STRATEGY_RETIRED: 422,
  INVALID_STRATEGY: 422,
  NON_ZERO_RESERVE: 422,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: unknown, c: Context): Response {
  if (isProtocolError(err)) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  if (err instanceof RequestValidationError) {
    return c.json(createErrorEnvelope(err.code, err.message, err.details), 400);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
