/**
 * Epoch utilities.
 *
 * The epoch counter is external and authoritative; nothing here reads a
 * clock. Deposits activate and withdrawals release one epoch after the
 * epoch in which they were made.
 */

import {
  ACTIVATION_DELAY_EPOCHS,
  MAX_EPOCH,
  WITHDRAWAL_DELAY_EPOCHS,
} from "./constants.js";

function addEpochs(epoch: bigint, delta: bigint): bigint {
  const next = epoch + delta;
  if (next > MAX_EPOCH) throw new Error(`Epoch overflow: ${epoch} + ${delta}`);
  return next;
}

/** Epoch at which a deposit made during `current` starts earning. */
export function activationEpoch(current: bigint): bigint {
  return addEpochs(current, ACTIVATION_DELAY_EPOCHS);
}

/** First epoch at which a withdrawal requested during `current` may be released. */
export function releaseEpoch(current: bigint): bigint {
  return addEpochs(current, WITHDRAWAL_DELAY_EPOCHS);
}

/** A pending batch or withdrawal targeting `target` is due at `current`. */
export function isDue(target: bigint, current: bigint): boolean {
  return target <= current;
}
