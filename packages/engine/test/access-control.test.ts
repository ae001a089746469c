/**
 * Operator authority, fee bounds, two-step handoff and the pause gate.
 */

import { describe, it, expect } from "vitest";
import { MockChain } from "@stakepool/chain-client";
import { ZERO_ADDRESS } from "@stakepool/physics";
import { StakePool } from "../src/index.js";
import { ALICE, codeOf, OPERATOR, OTHER, POOL, setup, types } from "./helpers.js";

function construct(operator: string, feeBps?: number): StakePool {
  const chain = new MockChain({ poolAddress: POOL });
  return new StakePool({
    poolAddress: POOL,
    operator,
    feeBps,
    assets: chain,
    settlement: chain,
    oracle: chain,
  });
}

describe("construction", () => {
  it("defaults to a 500 bps fee and the oracle's epoch", () => {
    const chain = new MockChain({ poolAddress: POOL, startEpoch: 42n });
    const pool = new StakePool({
      poolAddress: POOL,
      operator: OPERATOR,
      assets: chain,
      settlement: chain,
      oracle: chain,
    });
    const snap = pool.snapshot();
    expect(snap.feeBps).toBe(500);
    expect(snap.lastProcessedEpoch).toBe(42n);
    expect(snap.operator).toBe(OPERATOR);
    expect(snap.pendingOperator).toBeNull();
    expect(snap.paused).toBe(false);
  });

  it("rejects the zero operator", () => {
    expect(codeOf(() => construct(ZERO_ADDRESS))).toBe("InvalidAddress");
  });

  it("rejects a fee above 2000 bps", () => {
    expect(codeOf(() => construct(OPERATOR, 2001))).toBe("FeeTooHigh");
  });
});

describe("setFee", () => {
  it("accepts the bounds and emits fee.updated", () => {
    const { pool, events } = setup();
    pool.setFee(OPERATOR, 2000);
    pool.setFee(OPERATOR, 0);
    expect(pool.snapshot().feeBps).toBe(0);
    expect(events).toEqual([
      { type: "fee.updated", previousFeeBps: 500, feeBps: 2000 },
      { type: "fee.updated", previousFeeBps: 2000, feeBps: 0 },
    ]);
  });

  it("rejects out-of-range and non-integer fees", () => {
    const { pool } = setup();
    expect(codeOf(() => pool.setFee(OPERATOR, 2001))).toBe("FeeTooHigh");
    expect(codeOf(() => pool.setFee(OPERATOR, -1))).toBe("InvalidFee");
    expect(codeOf(() => pool.setFee(OPERATOR, 1.5))).toBe("InvalidFee");
    expect(pool.snapshot().feeBps).toBe(500);
  });

  it("is operator-only", () => {
    const { pool } = setup();
    expect(codeOf(() => pool.setFee(ALICE, 100))).toBe("Unauthorized");
  });
});

describe("operator handoff", () => {
  it("only the proposed successor can accept", () => {
    const { pool, events } = setup();
    pool.proposeOperator(OPERATOR, OTHER);
    expect(pool.snapshot().pendingOperator).toBe(OTHER);

    expect(codeOf(() => pool.acceptOperator(ALICE))).toBe("NotPendingOperator");
    pool.acceptOperator(OTHER);

    expect(pool.operator).toBe(OTHER);
    expect(pool.snapshot().pendingOperator).toBeNull();
    expect(codeOf(() => pool.setFee(OPERATOR, 100))).toBe("Unauthorized");
    pool.setFee(OTHER, 100);

    expect(types(events)).toEqual(["operator.proposed", "operator.accepted", "fee.updated"]);
    expect(events[1]).toEqual({
      type: "operator.accepted",
      previousOperator: OPERATOR,
      operator: OTHER,
    });
  });

  it("accept without a proposal fails", () => {
    const { pool } = setup();
    expect(codeOf(() => pool.acceptOperator(OTHER))).toBe("NotPendingOperator");
  });

  it("a new proposal replaces the previous one", () => {
    const { pool } = setup();
    pool.proposeOperator(OPERATOR, OTHER);
    pool.proposeOperator(OPERATOR, ALICE);
    expect(codeOf(() => pool.acceptOperator(OTHER))).toBe("NotPendingOperator");
    pool.acceptOperator(ALICE);
    expect(pool.operator).toBe(ALICE);
  });

  it("rejects the zero successor and non-operator proposals", () => {
    const { pool } = setup();
    expect(codeOf(() => pool.proposeOperator(OPERATOR, ZERO_ADDRESS))).toBe("InvalidAddress");
    expect(codeOf(() => pool.proposeOperator(ALICE, OTHER))).toBe("Unauthorized");
    expect(pool.snapshot().pendingOperator).toBeNull();
  });
});

describe("pause gate", () => {
  it("blocks deposits and work submission only", () => {
    const { pool, chain } = setup();
    pool.deposit(ALICE, 100n);
    pool.pause(OPERATOR);

    expect(codeOf(() => pool.deposit(ALICE, 1n))).toBe("Paused");
    expect(codeOf(() => pool.submitWork(OPERATOR, new Uint8Array([1])))).toBe("Paused");
    expect(pool.requestWithdrawal(ALICE, 10n).amount).toBe(10n);
    expect(pool.processEpoch()).toBeNull();

    pool.unpause(OPERATOR);
    pool.deposit(ALICE, 1n);
    expect(chain.balanceOf(POOL)).toBe(101n);
  });

  it("pause and unpause are idempotent and emit once", () => {
    const { pool, events } = setup();
    pool.pause(OPERATOR);
    pool.pause(OPERATOR);
    pool.unpause(OPERATOR);
    pool.unpause(OPERATOR);
    expect(types(events)).toEqual(["paused", "unpaused"]);
  });

  it("is operator-only", () => {
    const { pool } = setup();
    expect(codeOf(() => pool.pause(ALICE))).toBe("Unauthorized");
    expect(pool.snapshot().paused).toBe(false);
  });
});

describe("submitWork", () => {
  it("forwards the payload to the settlement channel", () => {
    const { pool, chain, events } = setup();
    pool.submitWork(OPERATOR, new Uint8Array([1, 2, 3]));
    expect(chain.submittedPayloads()).toEqual([new Uint8Array([1, 2, 3])]);
    expect(events).toEqual([{ type: "work.submitted", operator: OPERATOR, bytes: 3 }]);
  });

  it("is operator-only", () => {
    const { pool, chain } = setup();
    expect(codeOf(() => pool.submitWork(ALICE, new Uint8Array([1])))).toBe("Unauthorized");
    expect(chain.submittedPayloads()).toEqual([]);
  });

  it("a rejected submission fails as SubmitFailed", () => {
    const { pool, chain, events } = setup();
    chain.failSubmits = true;
    expect(codeOf(() => pool.submitWork(OPERATOR, new Uint8Array([1])))).toBe("SubmitFailed");
    expect(events).toEqual([]);
  });
});
