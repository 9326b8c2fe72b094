/**
 * @yieldmesh/chain: Host types.
 */

import type { ProtocolError } from "@yieldmesh/types";

/**
 * Undo closure produced by a checkpoint. Calling it puts the
 * component back in the state it had when the checkpoint was taken.
 */
export type Restore = () => void;

/**
 * Anything whose state takes part in atomic calls.
 */
export interface Journaled {
  checkpoint(): Restore;
}

export interface ChainOptions {
  /** Initial block timestamp in seconds. Default: 1_700_000_000 */
  readonly genesisTime?: number | undefined;
  /** Symbol reported for the native coin. Default: "ETH" */
  readonly nativeSymbol?: string | undefined;
}

/**
 * Outcome of a low-level native coin transfer.
 */
export type SendResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: ProtocolError };
