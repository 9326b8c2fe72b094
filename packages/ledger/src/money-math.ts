/**
 * @yieldmesh/ledger: Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Decimal strings are converted to/from bigint base units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Division always floors (rounding favours the pool, never the caller)
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import { ProtocolError, WAD } from "@yieldmesh/types";

// ─── Decimal Strings ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "0.02" with decimals=18 → 20000000000000000n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new ProtocolError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new ProtocolError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new ProtocolError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 20000000000000000n with decimals=18 → "0.020000000000000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Proportional Math ───────────────────────────────────────────────────

/**
 * floor(a * b / denominator).
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new ProtocolError("INVALID_AMOUNT", "Division by zero");
  }
  return (a * b) / denominator;
}

/**
 * Apply a WAD-scaled rate: floor(amount * rate / 1e18).
 */
export function wadMul(amount: bigint, rate: bigint): bigint {
  return mulDiv(amount, rate, WAD);
}

/**
 * Divide by a WAD-scaled rate: floor(amount * 1e18 / rate).
 */
export function wadDiv(amount: bigint, rate: bigint): bigint {
  return mulDiv(amount, WAD, rate);
}

/**
 * |a - b|
 */
export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

/**
 * True when a and b differ by at most `tolerance`.
 */
export function isWithin(a: bigint, b: bigint, tolerance: bigint): boolean {
  return absDiff(a, b) <= tolerance;
}
