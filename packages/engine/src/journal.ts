/**
 * Undo journal for the operation in flight.
 *
 * Components call the `save*` methods before changing a participant
 * record, a withdrawal queue, a fee balance or the roster. The first save
 * of a key keeps its prior value; rollback replays the saves newest first
 * and restores the scalar fields captured by `begin`. Cost is proportional
 * to what the operation touched, not to the size of the pool.
 */

import type { Address } from "@stakepool/physics";
import type { ParticipantRecord, PendingWithdrawal, PoolState } from "./state.js";

type Scalars = Pick<
  PoolState,
  | "operator"
  | "pendingOperator"
  | "feeBps"
  | "paused"
  | "nextWithdrawalId"
  | "lastProcessedEpoch"
  | "totalLocked"
  | "totalPending"
  | "totalUnclaimedReward"
  | "totalQueuedWithdrawal"
  | "carriedReward"
  | "totalFeeOwed"
>;

function scalarsOf(state: PoolState): Scalars {
  return {
    operator: state.operator,
    pendingOperator: state.pendingOperator,
    feeBps: state.feeBps,
    paused: state.paused,
    nextWithdrawalId: state.nextWithdrawalId,
    lastProcessedEpoch: state.lastProcessedEpoch,
    totalLocked: state.totalLocked,
    totalPending: state.totalPending,
    totalUnclaimedReward: state.totalUnclaimedReward,
    totalQueuedWithdrawal: state.totalQueuedWithdrawal,
    carriedReward: state.carriedReward,
    totalFeeOwed: state.totalFeeOwed,
  };
}

/** Put `prior` back under `key`, or remove the key if it was absent. */
function restore<V>(map: Map<Address, V>, key: Address, prior: V | undefined): void {
  if (prior === undefined) map.delete(key);
  else map.set(key, prior);
}

export class Journal {
  private scalars: Scalars | null = null;
  private undo: Array<() => void> = [];
  private readonly records = new Set<Address>();
  private readonly queues = new Set<Address>();
  private readonly fees = new Set<Address>();

  /** True between begin() and commit()/rollback(). Saves outside are no-ops. */
  get open(): boolean {
    return this.scalars !== null;
  }

  begin(state: PoolState): void {
    this.reset();
    this.scalars = scalarsOf(state);
  }

  commit(): void {
    this.reset();
  }

  rollback(state: PoolState): void {
    for (let i = this.undo.length - 1; i >= 0; i--) this.undo[i]?.();
    if (this.scalars) Object.assign(state, this.scalars);
    this.reset();
  }

  saveRecord(state: PoolState, who: Address): void {
    if (!this.open || this.records.has(who)) return;
    this.records.add(who);
    const live = state.participants.get(who);
    const prior: ParticipantRecord | undefined = live ? { ...live } : undefined;
    this.undo.push(() => restore(state.participants, who, prior));
  }

  saveQueue(state: PoolState, who: Address): void {
    if (!this.open || this.queues.has(who)) return;
    this.queues.add(who);
    const prior: PendingWithdrawal[] | undefined = state.withdrawals.get(who)?.slice();
    this.undo.push(() => restore(state.withdrawals, who, prior));
  }

  saveFee(state: PoolState, who: Address): void {
    if (!this.open || this.fees.has(who)) return;
    this.fees.add(who);
    const prior = state.feeOwed.get(who);
    this.undo.push(() => restore(state.feeOwed, who, prior));
  }

  /** Register the inverse of a roster change. */
  onUndo(fn: () => void): void {
    if (this.open) this.undo.push(fn);
  }

  private reset(): void {
    this.scalars = null;
    this.undo = [];
    this.records.clear();
    this.queues.clear();
    this.fees.clear();
  }
}
