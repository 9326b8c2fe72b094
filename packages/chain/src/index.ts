/**
 * @yieldmesh/chain: In-process execution host.
 *
 * Provides the environment the accounting core runs in:
 * - Token book (balances for every asset, native coin included)
 * - Block clock
 * - Atomic calls with full rollback
 * - Low-level native transfers with receive hooks
 * - Contract base class with a call-depth re-entrancy guard
 */

export { Chain } from "./chain.js";
export { Contract } from "./contract.js";
export { CallGuard } from "./call-guard.js";
export { TokenBook } from "./token-book.js";

export type { Restore, Journaled, ChainOptions, SendResult } from "./types.js";
