/**
 * Protocol Errors
 *
 * A single error class covers every reverted call. The code identifies
 * the failure kind; callers branch on `code`, never on the message.
 *
 * Rules:
 * - Always thrown, never returned
 * - A thrown ProtocolError aborts the whole call (state is rolled back)
 * - Anything thrown that is NOT a ProtocolError is a bug, not a revert
 */

export type ProtocolErrorCode =
  // Capability and argument checks
  | "UNAUTHORIZED"
  | "ZERO_ADDRESS"
  | "INVALID_AMOUNT"
  // Deposit gating
  | "TOO_SMALL"
  | "EXCEEDS_DEPOSIT_CEILING"
  | "UNKNOWN_ASSET"
  // Lock-up and share accounting
  | "COME_BACK_LATER"
  | "INSUFFICIENT_SHARES"
  | "VAULT_INSOLVENT"
  // Value movement
  | "FAILED_TO_SEND_ETH"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_RESERVE"
  | "INSUFFICIENT_LIQUIDITY"
  | "NOT_PAYABLE"
  // Swap routing
  | "INVALID_SWAPPER"
  | "NOT_SUPPORTED_SWAPPER"
  | "SET_DEFAULT_SWAPPER_BEFORE"
  | "SLIPPAGE_EXCEEDED"
  // Registry, strategy lifecycle
  | "REGISTRY_WITHDRAW_BLOCKED"
  | "STRATEGY_RETIRED"
  | "INVALID_STRATEGY"
  | "NON_ZERO_RESERVE"
  // Control flow
  | "REENTRANT_CALL";

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

/**
 * True when `err` is a ProtocolError, optionally of a specific code.
 */
export function isProtocolError(
  err: unknown,
  code?: ProtocolErrorCode,
): err is ProtocolError {
  if (!(err instanceof ProtocolError)) return false;
  return code === undefined || err.code === code;
}
