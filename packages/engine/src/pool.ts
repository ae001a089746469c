/**
 * StakePool — the custody engine.
 *
 * Every mutating operation runs inside `mutate()`:
 *   1. reject re-entry while another operation is in flight
 *   2. open the undo journal; any throw rolls back what was touched
 *   3. synchronize the epoch before reading totals
 *   4. update the ledger, then call the collaborator
 *   5. publish buffered events only after commit
 *
 * Collaborators are synchronous; a `false` return and a throw are treated
 * the same way and surface as TransferFailed / ClaimFailed / SubmitFailed.
 * The one exception is the operator fee payout inside claimRewards: the
 * settlement claim cannot be undone, so a refused fee stays owed instead.
 */

import type { AssetLedger, EpochOracle, SettlementChannel } from "@stakepool/chain-client";
import {
  DEFAULT_FEE_BPS,
  isAddress,
  isValidEpoch,
  isZeroAddress,
  MAX_AMOUNT,
  normalizeAddress,
  tierForBalance,
  type Address,
} from "@stakepool/physics";
import * as access from "./access-control.js";
import { checkOperatorSignature, verifyOperatorSignature, type AuthMarker } from "./authenticator.js";
import { creditDeposit, type PendingBatch } from "./deposit-ledger.js";
import {
  effectiveEpoch,
  processEpoch as advanceEpoch,
  type EpochSummary,
} from "./epoch-processor.js";
import { PoolError, type PoolErrorCode } from "./errors.js";
import type { PoolEvent, PoolEventSink } from "./events.js";
import { audit } from "./invariants.js";
import {
  accrueOperatorFee,
  distributeReward,
  feeOwedTo,
  takeOperatorFee,
  takeUserReward,
} from "./reward-distributor.js";
import { createState, type PendingWithdrawal, type PoolState } from "./state.js";
import { participantView, poolView, type ParticipantView, type PoolView } from "./views.js";
import {
  queuedFor,
  requestWithdrawal as enqueueWithdrawal,
  sweepParticipant,
  takeMature,
  type EmergencySweep,
  type Release,
} from "./withdrawal-queue.js";

export interface StakePoolOptions {
  /** Custody identity of the pool on the asset ledger. */
  poolAddress: string;
  operator: string;
  feeBps?: number;
  assets: AssetLedger;
  settlement: SettlementChannel;
  oracle: EpochOracle;
  onEvent?: PoolEventSink;
}

export interface EpochResult {
  epoch: bigint;
  promotedParticipants: number;
  promotedAmount: bigint;
}

export interface ClaimResult {
  epochIds: bigint[];
  totalReward: bigint;
  operatorFee: bigint;
  depositorReward: bigint;
  distributed: bigint;
  dust: bigint;
  /** Depositor reward held for the next distribution (nothing locked). */
  carried: bigint;
  recipients: number;
  /** Fee transferred to the operator by this claim, backlog included. */
  feePaid: bigint;
  /** Fee still owed to the operator afterwards. */
  feeOwed: bigint;
}

// ── Input checks ───────────────────────────────────────────────────

function identity(value: string, field = "address"): Address {
  if (!isAddress(value) || isZeroAddress(value)) {
    throw new PoolError("InvalidAddress", `Invalid ${field}`, { [field]: value });
  }
  return normalizeAddress(value);
}

function positiveAmount(amount: bigint): bigint {
  if (amount <= 0n || amount > MAX_AMOUNT) {
    throw new PoolError("InvalidAmount", "Amount must be a positive uint256", {
      amount: amount.toString(),
    });
  }
  return amount;
}

export class StakePool {
  private readonly state: PoolState;
  private entered = false;
  private buffer: PoolEvent[] = [];

  private readonly assets: AssetLedger;
  private readonly settlement: SettlementChannel;
  private readonly oracle: EpochOracle;
  private readonly sink: PoolEventSink | undefined;

  constructor(opts: StakePoolOptions) {
    this.assets = opts.assets;
    this.settlement = opts.settlement;
    this.oracle = opts.oracle;
    this.sink = opts.onEvent;

    const feeBps = opts.feeBps ?? DEFAULT_FEE_BPS;
    access.validateFee(feeBps);

    this.state = createState({
      poolAddress: identity(opts.poolAddress, "pool_address"),
      operator: identity(opts.operator, "operator"),
      feeBps,
      startEpoch: this.readOracle(),
    });
  }

  // ── Deposits and withdrawals ───────────────────────────────────

  deposit(caller: string, amount: bigint): PendingBatch {
    const who = identity(caller, "caller");
    positiveAmount(amount);
    return this.mutate(() => {
      access.assertNotPaused(this.state);
      const epoch = this.syncEpoch();
      const batch = creditDeposit(this.state, who, amount, epoch);
      this.external("TransferFailed", "transfer in", () => this.assets.transferIn(who, amount));
      this.publish({
        type: "deposit",
        participant: who,
        amount,
        lockEpoch: batch.lockEpoch,
        pendingAmount: batch.pendingAmount,
      });
      return batch;
    });
  }

  requestWithdrawal(caller: string, amount: bigint): PendingWithdrawal {
    const who = identity(caller, "caller");
    positiveAmount(amount);
    return this.mutate(() => {
      const epoch = this.syncEpoch();
      const { withdrawal, fromPending, fromLocked } = enqueueWithdrawal(this.state, who, amount, epoch);
      this.publish({
        type: "withdrawal.requested",
        participant: who,
        id: withdrawal.id,
        amount,
        fromPending,
        fromLocked,
        availableEpoch: withdrawal.availableEpoch,
      });
      return { ...withdrawal };
    });
  }

  completeWithdrawal(caller: string): Release {
    const who = identity(caller, "caller");
    return this.mutate(() => {
      const epoch = this.syncEpoch();
      const release = takeMature(this.state, who, epoch);
      this.external("TransferFailed", "transfer out", () =>
        this.assets.transferOut(who, release.amount),
      );
      this.publish({
        type: "withdrawal.completed",
        participant: who,
        amount: release.amount,
        ids: release.ids,
      });
      return release;
    });
  }

  /** Always open: ignores the pause gate and never consults the oracle. */
  emergencyWithdraw(caller: string): EmergencySweep {
    const who = identity(caller, "caller");
    return this.mutate(() => {
      const sweep = sweepParticipant(this.state, who);
      this.external("TransferFailed", "transfer out", () =>
        this.assets.transferOut(who, sweep.total),
      );
      this.publish({
        type: "withdrawal.emergency",
        participant: who,
        amount: sweep.total,
        pending: sweep.pending,
        locked: sweep.locked,
        queued: sweep.queued,
        reward: sweep.reward,
      });
      return sweep;
    });
  }

  // ── Rewards ────────────────────────────────────────────────────

  /**
   * Claim settled epochs on the settlement channel and distribute what
   * arrived. Unrestricted. The reward is measured as the pool's balance
   * delta across the claim, which holds because nothing else moves the
   * pool's balance while the operation runs.
   */
  claimRewards(caller: string, epochIds: readonly bigint[]): ClaimResult {
    const who = identity(caller, "caller");
    for (const id of epochIds) {
      if (!isValidEpoch(id)) {
        throw new PoolError("EpochOutOfRange", "Epoch identifier outside uint64", {
          epoch: id.toString(),
        });
      }
    }
    const ids = [...epochIds];

    return this.mutate(() => {
      this.syncEpoch();
      const before = this.poolBalance("ClaimFailed");
      this.external("ClaimFailed", "settlement claim", () => this.settlement.claim(ids));
      const after = this.poolBalance("ClaimFailed");
      if (after < before) {
        throw new PoolError("ClaimFailed", "Pool balance decreased during claim", {
          before: before.toString(),
          after: after.toString(),
        });
      }

      const totalReward = after - before;
      const operator = this.state.operator;
      let result: ClaimResult = {
        epochIds: ids,
        totalReward,
        operatorFee: 0n,
        depositorReward: 0n,
        distributed: 0n,
        dust: 0n,
        carried: 0n,
        recipients: 0,
        feePaid: 0n,
        feeOwed: 0n,
      };

      if (totalReward > 0n) {
        const d = distributeReward(this.state, totalReward);
        result = {
          ...result,
          operatorFee: d.operatorFee,
          depositorReward: d.depositorReward,
          distributed: d.distributed,
          dust: d.dust,
          carried: d.carriedOut,
          recipients: d.recipients,
        };
        if (d.operatorFee > 0n) {
          accrueOperatorFee(this.state, operator, d.operatorFee);
          const owed = takeOperatorFee(this.state, operator);
          const refusal = this.attempt(() => this.assets.transferOut(operator, owed));
          if (refusal === null) {
            result = { ...result, feePaid: owed };
          } else {
            accrueOperatorFee(this.state, operator, owed);
            this.publish({ type: "fee.deferred", operator, amount: owed, reason: refusal });
          }
        }
      }
      result = { ...result, feeOwed: feeOwedTo(this.state, operator) };

      this.publish({ type: "rewards.claimed", caller: who, ...result, epochIds: [...ids] });
      return result;
    });
  }

  claimUserRewards(caller: string): bigint {
    const who = identity(caller, "caller");
    return this.mutate(() => {
      const amount = takeUserReward(this.state, who);
      this.external("TransferFailed", "transfer out", () => this.assets.transferOut(who, amount));
      this.publish({ type: "rewards.withdrawn", participant: who, amount });
      return amount;
    });
  }

  /** Pay out operator fees owed to the caller, current or former operator. */
  withdrawOperatorFee(caller: string): bigint {
    const who = identity(caller, "caller");
    return this.mutate(() => {
      const amount = takeOperatorFee(this.state, who);
      this.external("TransferFailed", "fee transfer", () => this.assets.transferOut(who, amount));
      this.publish({ type: "fee.withdrawn", recipient: who, amount });
      return amount;
    });
  }

  // ── Operator ───────────────────────────────────────────────────

  submitWork(caller: string, payload: Uint8Array): void {
    const who = identity(caller, "caller");
    this.mutate(() => {
      access.assertOperator(this.state, who);
      access.assertNotPaused(this.state);
      this.external("SubmitFailed", "settlement submit", () => this.settlement.submit(payload));
      this.publish({ type: "work.submitted", operator: who, bytes: payload.length });
    });
  }

  pause(caller: string): void {
    const who = identity(caller, "caller");
    this.mutate(() => {
      if (access.setPaused(this.state, who, true)) this.publish({ type: "paused", operator: who });
    });
  }

  unpause(caller: string): void {
    const who = identity(caller, "caller");
    this.mutate(() => {
      if (access.setPaused(this.state, who, false)) {
        this.publish({ type: "unpaused", operator: who });
      }
    });
  }

  setFee(caller: string, feeBps: number): void {
    const who = identity(caller, "caller");
    this.mutate(() => {
      const previousFeeBps = access.setFee(this.state, who, feeBps);
      this.publish({ type: "fee.updated", previousFeeBps, feeBps });
    });
  }

  proposeOperator(caller: string, next: string): void {
    const who = identity(caller, "caller");
    if (!isAddress(next)) {
      throw new PoolError("InvalidAddress", "Invalid operator", { operator: next });
    }
    const proposed = normalizeAddress(next);
    this.mutate(() => {
      access.proposeOperator(this.state, who, proposed);
      this.publish({ type: "operator.proposed", operator: who, proposed });
    });
  }

  acceptOperator(caller: string): void {
    const who = identity(caller, "caller");
    this.mutate(() => {
      const previousOperator = access.acceptOperator(this.state, who);
      this.publish({ type: "operator.accepted", previousOperator, operator: who });
    });
  }

  // ── Epoch ──────────────────────────────────────────────────────

  /** Unrestricted; null when the cursor is already current. */
  processEpoch(): EpochResult | null {
    return this.mutate(() => {
      const summary = this.sync();
      if (!summary) return null;
      return {
        epoch: summary.epoch,
        promotedParticipants: summary.promotedParticipants,
        promotedAmount: summary.promotedAmount,
      };
    });
  }

  // ── Authentication ─────────────────────────────────────────────

  /** @throws InvalidSignatureLength unless the signature is 65 bytes */
  verifySignature(hash: Uint8Array, signature: Uint8Array): AuthMarker {
    return verifyOperatorSignature(this.state.operator, hash, signature);
  }

  /** Never throws. */
  isValidSignature(hash: Uint8Array, signature: Uint8Array): AuthMarker {
    return checkOperatorSignature(this.state.operator, hash, signature);
  }

  // ── Queries ────────────────────────────────────────────────────

  participant(address: string): ParticipantView {
    return participantView(this.state, identity(address));
  }

  withdrawals(address: string): PendingWithdrawal[] {
    return queuedFor(this.state, identity(address)).map((w) => ({ ...w }));
  }

  snapshot(): PoolView {
    return poolView(this.state, this.readOracle(), this.assets.balanceOf(this.state.poolAddress));
  }

  tier(): number {
    return tierForBalance(this.assets.balanceOf(this.state.poolAddress));
  }

  depositorCount(): number {
    return this.state.roster.length;
  }

  roster(): Address[] {
    return this.state.roster.slice();
  }

  get operator(): Address {
    return this.state.operator;
  }

  get poolAddress(): Address {
    return this.state.poolAddress;
  }

  audit(): string[] {
    return audit(this.state);
  }

  // ── Internals ──────────────────────────────────────────────────

  private mutate<T>(fn: () => T): T {
    if (this.entered) {
      throw new PoolError("Reentrancy", "Another pool operation is in progress");
    }
    this.entered = true;
    const journal = this.state.journal;
    journal.begin(this.state);

    let result: T;
    try {
      result = fn();
      journal.commit();
    } catch (err) {
      journal.rollback(this.state);
      this.buffer = [];
      throw err;
    } finally {
      this.entered = false;
    }

    const events = this.buffer;
    this.buffer = [];
    if (this.sink) for (const event of events) this.sink(event);
    return result;
  }

  private publish(event: PoolEvent): void {
    this.buffer.push(event);
  }

  private readOracle(): bigint {
    let epoch: bigint;
    try {
      epoch = this.oracle.currentEpoch();
    } catch (err) {
      throw new PoolError("OracleFailed", "Epoch oracle failed", {}, { cause: err });
    }
    if (!isValidEpoch(epoch)) {
      throw new PoolError("EpochOutOfRange", "Oracle returned an epoch outside uint64", {
        epoch: epoch.toString(),
      });
    }
    return epoch;
  }

  /** Bring the ledger up to the oracle's epoch. */
  private sync(): EpochSummary | null {
    const epoch = effectiveEpoch(this.state, this.readOracle());
    const summary = advanceEpoch(this.state, epoch);
    if (summary) this.publish({ type: "epoch.processed", ...summary });
    return summary;
  }

  /** sync(), then the epoch to act on. */
  private syncEpoch(): bigint {
    this.sync();
    return this.state.lastProcessedEpoch;
  }

  private poolBalance(code: PoolErrorCode): bigint {
    try {
      return this.assets.balanceOf(this.state.poolAddress);
    } catch (err) {
      throw new PoolError(code, "pool balance read failed", {}, { cause: err });
    }
  }

  /** Run a collaborator call whose refusal is recoverable: the reason, or null on success. */
  private attempt(call: () => boolean): string | null {
    try {
      return call() ? null : "rejected";
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  /** Run a collaborator call; false or a throw fails the whole operation. */
  private external(code: PoolErrorCode, what: string, call: () => boolean): void {
    let ok: boolean;
    try {
      ok = call();
    } catch (err) {
      throw new PoolError(code, `${what} failed`, {}, { cause: err });
    }
    if (!ok) throw new PoolError(code, `${what} rejected`);
  }
}
