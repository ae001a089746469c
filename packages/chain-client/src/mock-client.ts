/**
 * Mock chain for development and testing.
 *
 * One in-process object plays all three collaborators: a fungible asset
 * ledger, a settlement channel that pays out credited epoch rewards on
 * claim, and a manually advanced epoch oracle.
 * Share a single instance between the pool and the test so both see the
 * same balances.
 */

import { normalizeAddress, type Address } from "@stakepool/physics";
import type {
  AssetLedger,
  ChainClient,
  EpochOracle,
  SettlementChannel,
  TransferHook,
} from "./types.js";

export interface MockChainOptions {
  poolAddress: Address;
  startEpoch?: bigint;
}

export class MockChain implements AssetLedger, SettlementChannel, EpochOracle, ChainClient {
  readonly poolAddress: Address;

  private readonly balances = new Map<Address, bigint>();
  /** Reward owed per epoch id, paid on claim. */
  private readonly epochRewards = new Map<bigint, bigint>();
  private readonly claimedEpochs = new Set<bigint>();
  private readonly submitted: Uint8Array[] = [];
  private epoch: bigint;
  private transferHook: TransferHook | null = null;

  /** Test switches: make the next calls fail without moving anything. */
  failTransfers = false;
  failClaims = false;
  failSubmits = false;

  constructor(opts: MockChainOptions) {
    this.poolAddress = normalizeAddress(opts.poolAddress);
    this.epoch = opts.startEpoch ?? 0n;
  }

  get assets(): AssetLedger {
    return this;
  }

  get settlement(): SettlementChannel {
    return this;
  }

  get oracle(): EpochOracle {
    return this;
  }

  // ── AssetLedger ──────────────────────────────────────────────────

  balanceOf(owner: Address): bigint {
    return this.balances.get(normalizeAddress(owner)) ?? 0n;
  }

  transferIn(from: Address, amount: bigint): boolean {
    return this.move(normalizeAddress(from), this.poolAddress, amount, "in");
  }

  transferOut(to: Address, amount: bigint): boolean {
    return this.move(this.poolAddress, normalizeAddress(to), amount, "out");
  }

  // ── SettlementChannel ────────────────────────────────────────────

  submit(payload: Uint8Array): boolean {
    if (this.failSubmits) return false;
    this.submitted.push(payload.slice());
    return true;
  }

  claim(epochIds: readonly bigint[]): boolean {
    if (this.failClaims) return false;
    let payout = 0n;
    for (const id of new Set(epochIds)) {
      if (this.claimedEpochs.has(id)) continue;
      const owed = this.epochRewards.get(id);
      if (owed === undefined) continue;
      payout += owed;
      this.claimedEpochs.add(id);
      this.epochRewards.delete(id);
    }
    if (payout > 0n) this.credit(this.poolAddress, payout);
    return true;
  }

  // ── EpochOracle ──────────────────────────────────────────────────

  currentEpoch(): bigint {
    return this.epoch;
  }

  // ── Test / dev helpers ───────────────────────────────────────────

  /** Create `amount` out of thin air for `to`. */
  mint(to: Address, amount: bigint): void {
    if (amount <= 0n) throw new Error(`MockChain: mint amount must be positive, got ${amount}`);
    this.credit(normalizeAddress(to), amount);
  }

  /** Advance the epoch counter. The oracle never moves backwards. */
  advanceEpoch(by = 1n): bigint {
    if (by < 0n) throw new Error("MockChain: epoch cannot move backwards");
    this.epoch += by;
    return this.epoch;
  }

  setEpoch(epoch: bigint): void {
    if (epoch < this.epoch) {
      throw new Error(`MockChain: epoch cannot move backwards (${this.epoch} → ${epoch})`);
    }
    this.epoch = epoch;
  }

  /** Make `amount` claimable for `epochId` on the settlement channel. */
  creditEpochReward(epochId: bigint, amount: bigint): void {
    if (this.claimedEpochs.has(epochId)) {
      throw new Error(`MockChain: epoch ${epochId} already claimed`);
    }
    this.epochRewards.set(epochId, (this.epochRewards.get(epochId) ?? 0n) + amount);
  }

  /** Payloads forwarded through submit(), in order. */
  submittedPayloads(): readonly Uint8Array[] {
    return this.submitted;
  }

  onTransfer(hook: TransferHook | null): void {
    this.transferHook = hook;
  }

  // ── Internals ────────────────────────────────────────────────────

  private credit(owner: Address, amount: bigint): void {
    this.balances.set(owner, (this.balances.get(owner) ?? 0n) + amount);
  }

  private move(from: Address, to: Address, amount: bigint, direction: "in" | "out"): boolean {
    if (this.failTransfers || amount < 0n) return false;
    const fromBalance = this.balances.get(from) ?? 0n;
    if (fromBalance < amount) return false;

    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);

    if (this.transferHook) {
      try {
        this.transferHook({
          direction,
          counterparty: direction === "in" ? from : to,
          amount,
        });
      } catch (err) {
        // All-or-nothing: undo the move before surfacing the failure
        this.credit(from, amount);
        this.credit(to, -amount);
        throw err;
      }
    }
    return true;
  }
}
