/**
 * @yieldmesh/ledger: Reserve accounting primitives.
 *
 * A pure TypeScript accounting core with zero runtime dependencies:
 * - Per-asset reserve ledger (never reads live token balances)
 * - Ordered set with deterministic enumeration
 * - bigint fixed-point helpers (floor division everywhere)
 */

// Reserve ledger
export { ReserveLedger } from "./reserve-ledger.js";

// Ordered set
export { OrderedSet } from "./ordered-set.js";

// Fixed-point arithmetic
export {
  parseAmount,
  formatAmount,
  mulDiv,
  wadMul,
  wadDiv,
  absDiff,
  isWithin,
} from "./money-math.js";

// Types
export type { ReserveEntry, ReserveSnapshot } from "./types.js";
