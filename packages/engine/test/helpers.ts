/**
 * Shared fixtures: a pool wired to one MockChain, with funded participants.
 */

import { MockChain } from "@stakepool/chain-client";
import { addressFromPrivateKey, type Address } from "@stakepool/physics";
import { isPoolError, StakePool, type PoolEvent } from "../src/index.js";

export const POOL: Address = "0x00000000000000000000000000000000000000aa";
export const ALICE: Address = "0x00000000000000000000000000000000000000a1";
export const BOB: Address = "0x00000000000000000000000000000000000000b2";
export const CAROL: Address = "0x00000000000000000000000000000000000000c3";

/** Placeholder key: 31 zero bytes then `n`. */
export function testKey(n: number): Uint8Array {
  const key = new Uint8Array(32);
  key[31] = n;
  return key;
}

export const OPERATOR_KEY = testKey(1);
export const OPERATOR = addressFromPrivateKey(OPERATOR_KEY);
export const OTHER_KEY = testKey(2);
export const OTHER = addressFromPrivateKey(OTHER_KEY);

export interface Harness {
  chain: MockChain;
  pool: StakePool;
  events: PoolEvent[];
}

export function setup(opts: { feeBps?: number; startEpoch?: bigint; fund?: bigint } = {}): Harness {
  const chain = new MockChain({ poolAddress: POOL, startEpoch: opts.startEpoch ?? 5n });
  const fund = opts.fund ?? 1_000_000n;
  for (const who of [ALICE, BOB, CAROL]) chain.mint(who, fund);

  const events: PoolEvent[] = [];
  const pool = new StakePool({
    poolAddress: POOL,
    operator: OPERATOR,
    feeBps: opts.feeBps ?? 500,
    assets: chain.assets,
    settlement: chain.settlement,
    oracle: chain.oracle,
    onEvent: (e) => events.push(e),
  });
  return { chain, pool, events };
}

/** Event types in publication order. */
export function types(events: readonly PoolEvent[]): string[] {
  return events.map((e) => e.type);
}

/** The PoolError code `fn` throws, or undefined if it returns. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isPoolError(err) ? err.code : `not a PoolError: ${String(err)}`;
  }
  return undefined;
}
