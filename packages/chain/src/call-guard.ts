/**
 * @yieldmesh/chain: Re-entrancy guard.
 *
 * Call-depth counter shared by every guarded entry point of one contract.
 * A nested entry (while depth > 0) fails with REENTRANT_CALL. The counter
 * is released in `finally`, so a failing call never leaves it held.
 */

import { ProtocolError } from "@yieldmesh/types";

export class CallGuard {
  private _depth = 0;

  run<T>(fn: () => T): T {
    if (this._depth > 0) {
      throw new ProtocolError("REENTRANT_CALL", "Re-entrant call rejected");
    }
    this._depth++;
    try {
      return fn();
    } finally {
      this._depth--;
    }
  }
}
