/**
 * Tests for TokenBook.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ZERO_ADDRESS, isProtocolError } from "@yieldmesh/types";
import { TokenBook } from "../src/token-book.js";

const ALICE = "0x00000000000000000000000000000000000000a1";
const BOB = "0x00000000000000000000000000000000000000b0";

describe("TokenBook", () => {
  let book: TokenBook;

  beforeEach(() => {
    book = new TokenBook();
    book.register({ id: "X", symbol: "wstX", decimals: 18 });
  });

  it("mints and tracks supply", () => {
    book.mint("X", ALICE, 100n);
    expect(book.balanceOf("X", ALICE)).toBe(100n);
    expect(book.totalSupply("X")).toBe(100n);
  });

  it("transfers between holders", () => {
    book.mint("X", ALICE, 100n);
    book.transfer("X", ALICE, BOB, 40n);
    expect(book.balanceOf("X", ALICE)).toBe(60n);
    expect(book.balanceOf("X", BOB)).toBe(40n);
    expect(book.totalSupply("X")).toBe(100n);
  });

  it("rejects overdrafts with the symbol in the message", () => {
    book.mint("X", ALICE, 1n);
    try {
      book.transfer("X", ALICE, BOB, 2n);
      expect.unreachable();
    } catch (err) {
      expect(isProtocolError(err, "INSUFFICIENT_BALANCE")).toBe(true);
      expect((err as Error).message).toBe(`${ALICE} holds 1 wstX, needs 2`);
    }
  });

  it("rejects transfers to the zero address", () => {
    book.mint("X", ALICE, 1n);
    expect(() => book.transfer("X", ALICE, ZERO_ADDRESS, 1n)).toThrow("zero address");
  });

  it("burns and reduces supply", () => {
    book.mint("X", ALICE, 10n);
    book.burn("X", ALICE, 4n);
    expect(book.balanceOf("X", ALICE)).toBe(6n);
    expect(book.totalSupply("X")).toBe(6n);
  });

  it("rejects negative amounts", () => {
    expect(() => book.mint("X", ALICE, -1n)).toThrow("non-negative");
  });

  it("keeps the first registration", () => {
    const again = book.register({ id: "X", symbol: "other", decimals: 6 });
    expect(again.symbol).toBe("wstX");
    expect(book.listAssets()).toHaveLength(1);
  });

  it("restores balances and supply from a checkpoint", () => {
    book.mint("X", ALICE, 10n);
    const restore = book.checkpoint();
    book.transfer("X", ALICE, BOB, 3n);
    book.mint("Y", BOB, 5n);

    restore();

    expect(book.balanceOf("X", ALICE)).toBe(10n);
    expect(book.balanceOf("X", BOB)).toBe(0n);
    expect(book.balanceOf("Y", BOB)).toBe(0n);
    expect(book.totalSupply("Y")).toBe(0n);
  });
});
