import { Chain, Contract } from "@yieldmesh/chain";
import type { Restore } from "@yieldmesh/chain";
import { isProtocolError } from "@yieldmesh/types";
import type { AssetId, Msg, ProtocolErrorCode } from "@yieldmesh/types";
import { expect } from "vitest";
import { deployReferenceVault } from "../src/deployment.js";
import type { ReferenceDeployment, ReferenceOptions } from "../src/deployment.js";

export const ALICE = "0x00000000000000000000000000000000000000a1";
export const BOB = "0x00000000000000000000000000000000000000b0";
export const MALLORY = "0x00000000000000000000000000000000000000c0";

export const GENESIS = 1_700_000_000;
export const ONE_DAY = 86_400;

export function deploy(options: ReferenceOptions = {}): ReferenceDeployment {
  return deployReferenceVault(new Chain({ genesisTime: GENESIS }), options);
}

/**
 * Mint `amount` to `account` and deposit it into the vault.
 */
export function fundAndDeposit(
  d: ReferenceDeployment,
  account: string,
  asset: AssetId,
  amount: bigint,
  options: { sell?: boolean; native?: boolean } = {},
): bigint {
  d.chain.tokens.mint(asset, account, amount);
  const msg: Msg = options.native === true ? { sender: account, value: amount } : { sender: account };
  return d.vault.deposit(msg, asset, amount, options.sell ?? false);
}

export function expectCode(fn: () => unknown, code: ProtocolErrorCode): void {
  try {
    fn();
  } catch (err) {
    expect(isProtocolError(err) ? err.code : err).toBe(code);
    return;
  }
  expect.unreachable(`expected ${code}`);
}

/**
 * Native coin recipient that refuses value until told otherwise, and can
 * run a callback from inside its receive hook. Its state survives rollbacks.
 */
export class Recipient extends Contract {
  accepting = false;
  onReceive: ((msg: Msg) => void) | undefined;

  override receiveValue(msg: Msg): void {
    this.onReceive?.(msg);
    if (!this.accepting) {
      super.receiveValue(msg);
    }
  }

  checkpoint(): Restore {
    return () => undefined;
  }
}
