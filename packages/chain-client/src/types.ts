/**
 * Chain collaborator interfaces — abstraction over the asset, the
 * work-settlement channel and the epoch source, for testability.
 *
 * The engine only ever talks to these three interfaces. Every call is
 * synchronous and all-or-nothing: it either completes or fails, and a
 * failure leaves both sides unchanged.
 */

import type { Address } from "@stakepool/physics";

/** The custody asset, bound to the pool's own address. */
export interface AssetLedger {
  /** Move exactly `amount` from `from` into the pool. false = nothing moved. */
  transferIn(from: Address, amount: bigint): boolean;
  /** Move exactly `amount` from the pool to `to`. false = nothing moved. */
  transferOut(to: Address, amount: bigint): boolean;
  balanceOf(owner: Address): bigint;
}

/**
 * Remote work-settlement channel. Payloads are opaque.
 * Claims pay an unpredictable, work-dependent amount into the pool;
 * the pool measures it as a balance delta.
 */
export interface SettlementChannel {
  submit(payload: Uint8Array): boolean;
  claim(epochIds: readonly bigint[]): boolean;
}

/** Authoritative, externally advanced epoch counter (uint64, non-decreasing). */
export interface EpochOracle {
  currentEpoch(): bigint;
}

/** Everything the pool needs from the outside world. */
export interface ChainClient {
  assets: AssetLedger;
  settlement: SettlementChannel;
  oracle: EpochOracle;
}

/** Called after a transfer moved balances; throwing reverts the transfer. */
export type TransferHook = (event: {
  direction: "in" | "out";
  counterparty: Address;
  amount: bigint;
}) => void;
