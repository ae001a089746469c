/**
 * Participant records and the active roster.
 *
 * The roster is an indexable array plus a per-record index field:
 * insertion appends, removal swaps the last entry into the freed slot and
 * pops. Both are O(1); iteration order is deterministic.
 *
 * Every change goes through the state's journal so a failed operation can
 * be undone.
 */

import type { Address } from "@stakepool/physics";
import type { ParticipantRecord, PoolState } from "./state.js";

export function emptyRecord(): ParticipantRecord {
  return {
    pendingAmount: 0n,
    lockedAmount: 0n,
    lockEpoch: 0n,
    rosterIndex: -1,
    active: false,
    unclaimedReward: 0n,
  };
}

/** The live record of `who`, journaled for change. */
export function editRecord(state: PoolState, who: Address): ParticipantRecord | undefined {
  state.journal.saveRecord(state, who);
  return state.participants.get(who);
}

export function getOrCreateRecord(state: PoolState, who: Address): ParticipantRecord {
  let record = editRecord(state, who);
  if (!record) {
    record = emptyRecord();
    state.participants.set(who, record);
  }
  return record;
}

/** Mark active and append to the roster. No-op if already active. */
export function activate(state: PoolState, who: Address, record: ParticipantRecord): void {
  if (record.active) return;
  record.active = true;
  record.rosterIndex = state.roster.length;
  state.roster.push(who);
  state.journal.onUndo(() => {
    state.roster.pop();
  });
}

/** Swap-and-pop removal. No-op if not active. `record` must come from editRecord. */
export function deactivate(state: PoolState, record: ParticipantRecord): void {
  if (!record.active) return;

  const index = record.rosterIndex;
  const lastIndex = state.roster.length - 1;
  const last = state.roster[lastIndex];
  if (index < 0 || index > lastIndex || last === undefined) {
    throw new Error(`Roster corrupted: index ${index} outside 0..${lastIndex}`);
  }

  const removed = state.roster[index];
  if (removed === undefined) {
    throw new Error(`Roster corrupted: empty slot ${index}`);
  }
  if (index !== lastIndex) {
    state.roster[index] = last;
    const moved = editRecord(state, last);
    if (moved) moved.rosterIndex = index;
  }
  state.roster.pop();
  state.journal.onUndo(() => {
    state.roster.push(last);
    state.roster[index] = removed;
  });

  record.active = false;
  record.rosterIndex = -1;
}

/**
 * Re-derive `active` from balances: leave the roster once pending and
 * locked are both zero, and drop the record entirely once nothing
 * (reward included) is left in it.
 */
export function settleActivity(state: PoolState, who: Address, record: ParticipantRecord): void {
  if (record.pendingAmount === 0n && record.lockedAmount === 0n) {
    deactivate(state, record);
    if (record.unclaimedReward === 0n) state.participants.delete(who);
  }
}
