/**
 * @yieldmesh/chain: Contract base class.
 *
 * A contract owns an address on a Chain, takes part in atomic calls
 * through checkpoint(), and decides whether it accepts native coin.
 *
 * Subclasses wrap each externally reachable mutating entry point in
 * `nonReentrant()` (atomic + call-depth guard) or `atomic()` (admin
 * setters that never hand control to another contract).
 */

import { NATIVE_COIN, ProtocolError } from "@yieldmesh/types";
import type { Address, Msg } from "@yieldmesh/types";
import { CallGuard } from "./call-guard.js";
import type { Chain } from "./chain.js";
import type { Journaled, Restore } from "./types.js";

export abstract class Contract implements Journaled {
  readonly address: Address;
  protected readonly chain: Chain;
  private readonly _guard: CallGuard = new CallGuard();

  constructor(chain: Chain, address?: Address) {
    this.chain = chain;
    this.address = address ?? chain.newAddress();
    chain.deploy(this);
  }

  abstract checkpoint(): Restore;

  /**
   * Native coin receive hook. Contracts reject value unless they override it.
   */
  receiveValue(msg: Msg): void {
    throw new ProtocolError("NOT_PAYABLE", `${this.address} does not accept native coin from ${msg.sender}`);
  }

  nativeBalance(): bigint {
    return this.chain.tokens.balanceOf(NATIVE_COIN, this.address);
  }

  protected atomic<T>(fn: () => T): T {
    return this.chain.atomic(fn);
  }

  protected nonReentrant<T>(fn: () => T): T {
    return this.chain.atomic(() => this._guard.run(fn));
  }

  /**
   * Pull `msg.value` from the caller into this contract.
   */
  protected collectValue(msg: Msg): bigint {
    const value = msg.value ?? 0n;
    if (value > 0n) {
      this.chain.tokens.transfer(NATIVE_COIN, msg.sender, this.address, value);
    }
    return value;
  }

  protected rejectValue(msg: Msg): void {
    if ((msg.value ?? 0n) > 0n) {
      throw new ProtocolError("NOT_PAYABLE", "Call does not accept native coin");
    }
  }
}
