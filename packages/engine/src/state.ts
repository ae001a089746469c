/**
 * Engine state — every balance, counter and identity the pool custodies.
 *
 * All process-wide values (`lastProcessedEpoch`, the aggregates) are
 * fields of PoolState and are threaded explicitly through each component.
 * Records are plain data; the roster holds identities only.
 */

import type { Address } from "@stakepool/physics";
import { Journal } from "./journal.js";

export interface ParticipantRecord {
  /** Deposited, not yet epoch-qualified. Earns nothing. */
  pendingAmount: bigint;
  /** Epoch-qualified, reward-earning. */
  lockedAmount: bigint;
  /** Epoch at which the current pending batch becomes locked. */
  lockEpoch: bigint;
  /** Position in `roster` while active, −1 otherwise. */
  rosterIndex: number;
  /** pendingAmount > 0 || lockedAmount > 0 */
  active: boolean;
  unclaimedReward: bigint;
}

export interface PendingWithdrawal {
  id: bigint;
  owner: Address;
  amount: bigint;
  /** First epoch at which release is permitted. */
  availableEpoch: bigint;
}

export interface PoolState {
  poolAddress: Address;
  operator: Address;
  pendingOperator: Address | null;
  feeBps: number;
  paused: boolean;

  participants: Map<Address, ParticipantRecord>;
  roster: Address[];
  withdrawals: Map<Address, PendingWithdrawal[]>;
  nextWithdrawalId: bigint;

  lastProcessedEpoch: bigint;
  totalLocked: bigint;
  totalPending: bigint;
  totalUnclaimedReward: bigint;
  totalQueuedWithdrawal: bigint;
  /** Depositor reward that arrived while nothing was locked; paid with the next distribution. */
  carriedReward: bigint;

  /** Operator fees accrued but not yet paid out, per recipient. */
  feeOwed: Map<Address, bigint>;
  totalFeeOwed: bigint;

  /** Undo log of the operation in flight. */
  journal: Journal;
}

export interface InitialState {
  poolAddress: Address;
  operator: Address;
  feeBps: number;
  startEpoch: bigint;
}

export function createState(init: InitialState): PoolState {
  return {
    poolAddress: init.poolAddress,
    operator: init.operator,
    pendingOperator: null,
    feeBps: init.feeBps,
    paused: false,
    participants: new Map(),
    roster: [],
    withdrawals: new Map(),
    nextWithdrawalId: 1n,
    lastProcessedEpoch: init.startEpoch,
    totalLocked: 0n,
    totalPending: 0n,
    totalUnclaimedReward: 0n,
    totalQueuedWithdrawal: 0n,
    carriedReward: 0n,
    feeOwed: new Map(),
    totalFeeOwed: 0n,
    journal: new Journal(),
  };
}

/** Liabilities = everything the pool owes to someone. */
export function totalLiabilities(state: PoolState): bigint {
  return (
    state.totalLocked +
    state.totalPending +
    state.totalUnclaimedReward +
    state.totalQueuedWithdrawal +
    state.carriedReward +
    state.totalFeeOwed
  );
}
