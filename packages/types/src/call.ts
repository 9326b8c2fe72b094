/**
 * Call Context
 *
 * Every externally reachable operation receives the identity of its
 * immediate caller, plus the native coin attached to the call.
 */

import type { Address } from "./asset.js";

export interface Msg {
  /** Immediate caller (an account or a contract acting on its own behalf) */
  readonly sender: Address;

  /** Native coin attached to the call, in base units */
  readonly value?: bigint | undefined;
}
