/**
 * Access control and pause gate.
 *
 * Operator identity moves by two steps (propose, accept) so control is
 * never handed to an address nobody holds. The pause gate covers deposits
 * and work submission only; withdrawals never check it.
 */

import { isValidFeeBps, isZeroAddress, MAX_FEE_BPS, type Address } from "@stakepool/physics";
import { PoolError } from "./errors.js";
import type { PoolState } from "./state.js";

export function assertOperator(state: PoolState, caller: Address): void {
  if (caller !== state.operator) {
    throw new PoolError("Unauthorized", "Caller is not the operator", { caller });
  }
}

export function assertNotPaused(state: PoolState): void {
  if (state.paused) throw new PoolError("Paused", "Pool is paused");
}

/**
 * @throws FeeTooHigh above MAX_FEE_BPS, InvalidFee for anything that is
 *   not a non-negative integer
 */
export function validateFee(feeBps: number): void {
  if (Number.isInteger(feeBps) && feeBps > MAX_FEE_BPS) {
    throw new PoolError("FeeTooHigh", `Fee exceeds ${MAX_FEE_BPS} bps`, {
      fee_bps: String(feeBps),
      max_fee_bps: String(MAX_FEE_BPS),
    });
  }
  if (!isValidFeeBps(feeBps)) {
    throw new PoolError("InvalidFee", "Fee must be a non-negative integer", {
      fee_bps: String(feeBps),
    });
  }
}

/** Returns the previous fee. */
export function setFee(state: PoolState, caller: Address, feeBps: number): number {
  assertOperator(state, caller);
  validateFee(feeBps);
  const previous = state.feeBps;
  state.feeBps = feeBps;
  return previous;
}

export function proposeOperator(state: PoolState, caller: Address, next: Address): void {
  assertOperator(state, caller);
  if (isZeroAddress(next)) {
    throw new PoolError("InvalidAddress", "Successor cannot be the zero address");
  }
  state.pendingOperator = next;
}

/** Returns the previous operator. */
export function acceptOperator(state: PoolState, caller: Address): Address {
  if (state.pendingOperator === null || caller !== state.pendingOperator) {
    throw new PoolError("NotPendingOperator", "Caller is not the proposed operator", { caller });
  }
  const previous = state.operator;
  state.operator = caller;
  state.pendingOperator = null;
  return previous;
}

/** Returns true when the flag changed. */
export function setPaused(state: PoolState, caller: Address, paused: boolean): boolean {
  assertOperator(state, caller);
  if (state.paused === paused) return false;
  state.paused = paused;
  return true;
}
