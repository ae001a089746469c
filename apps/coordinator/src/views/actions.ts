/**
 * Signed action dispatch — ActionV1 kind → StakePool operation.
 *
 * Params arrive as strings and are parsed here; a malformed param is an
 * ActionParamError (422) before the engine is called. Engine failures
 * propagate as PoolError.
 */

import type { StakePool } from "@stakepool/engine";
import {
  fromHex,
  isAddress,
  isHex,
  parseAmount,
  parseEpoch,
  type ActionV1,
  type Address,
} from "@stakepool/physics";

export class ActionParamError extends Error {
  constructor(
    public readonly param: string,
    message: string,
  ) {
    super(message);
    this.name = "ActionParamError";
  }
}

function param(action: ActionV1, name: string): string {
  const value = action.params[name];
  if (value === undefined) {
    throw new ActionParamError(name, `${action.kind} requires params.${name}`);
  }
  return value;
}

function amountParam(action: ActionV1, name = "amount"): bigint {
  try {
    return parseAmount(param(action, name));
  } catch (err) {
    if (err instanceof ActionParamError) throw err;
    throw new ActionParamError(name, err instanceof Error ? err.message : String(err));
  }
}

function epochsParam(action: ActionV1): bigint[] {
  const raw = param(action, "epochs");
  const parts = raw.split(",").map((s) => s.trim());
  if (parts.length === 0 || parts.some((s) => s.length === 0)) {
    throw new ActionParamError("epochs", "epochs must be comma-separated decimal integers");
  }
  try {
    return parts.map(parseEpoch);
  } catch (err) {
    throw new ActionParamError("epochs", err instanceof Error ? err.message : String(err));
  }
}

function feeParam(action: ActionV1): number {
  const raw = param(action, "fee_bps");
  if (!/^(0|[1-9][0-9]{0,5})$/.test(raw)) {
    throw new ActionParamError("fee_bps", "fee_bps must be a decimal integer");
  }
  return parseInt(raw, 10);
}

function bytesParam(action: ActionV1, name: string): Uint8Array {
  const raw = param(action, name);
  if (!isHex(raw)) throw new ActionParamError(name, `${name} must be 0x-prefixed hex`);
  return fromHex(raw);
}

function addressParam(action: ActionV1, name: string): string {
  const raw = param(action, name);
  if (!isAddress(raw)) throw new ActionParamError(name, `${name} must be 0x + 40 hex chars`);
  return raw;
}

/** Run the engine operation for `action` on behalf of its (verified) signer. */
export function applyAction(
  pool: StakePool,
  signer: Address,
  action: ActionV1,
): Record<string, unknown> {
  switch (action.kind) {
    case "deposit": {
      const batch = pool.deposit(signer, amountParam(action));
      return {
        amount: batch.amount.toString(),
        pending_amount: batch.pendingAmount.toString(),
        lock_epoch: batch.lockEpoch.toString(),
      };
    }
    case "withdrawal.request": {
      const w = pool.requestWithdrawal(signer, amountParam(action));
      return {
        id: w.id.toString(),
        amount: w.amount.toString(),
        available_epoch: w.availableEpoch.toString(),
      };
    }
    case "withdrawal.complete": {
      const release = pool.completeWithdrawal(signer);
      return { amount: release.amount.toString(), ids: release.ids.map(String) };
    }
    case "withdrawal.emergency": {
      const sweep = pool.emergencyWithdraw(signer);
      return {
        amount: sweep.total.toString(),
        pending: sweep.pending.toString(),
        locked: sweep.locked.toString(),
        queued: sweep.queued.toString(),
        reward: sweep.reward.toString(),
      };
    }
    case "rewards.claim": {
      const r = pool.claimRewards(signer, epochsParam(action));
      return {
        total_reward: r.totalReward.toString(),
        operator_fee: r.operatorFee.toString(),
        depositor_reward: r.depositorReward.toString(),
        distributed: r.distributed.toString(),
        dust: r.dust.toString(),
        carried: r.carried.toString(),
        recipients: r.recipients,
        fee_paid: r.feePaid.toString(),
        fee_owed: r.feeOwed.toString(),
      };
    }
    case "rewards.withdraw":
      return { amount: pool.claimUserRewards(signer).toString() };
    case "fee.withdraw":
      return { amount: pool.withdrawOperatorFee(signer).toString() };
    case "work.submit": {
      const payload = bytesParam(action, "payload");
      pool.submitWork(signer, payload);
      return { bytes: payload.length };
    }
    case "fee.set": {
      const feeBps = feeParam(action);
      pool.setFee(signer, feeBps);
      return { fee_bps: feeBps };
    }
    case "operator.propose": {
      const next = addressParam(action, "operator");
      pool.proposeOperator(signer, next);
      return { pending_operator: next.toLowerCase() };
    }
    case "operator.accept":
      pool.acceptOperator(signer);
      return { operator: signer };
    case "pool.pause":
      pool.pause(signer);
      return { paused: true };
    case "pool.unpause":
      pool.unpause(signer);
      return { paused: false };
  }
}
