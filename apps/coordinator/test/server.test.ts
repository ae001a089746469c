/**
 * Coordinator HTTP surface, exercised through app.inject (no sockets).
 *
 * Actions are signed with placeholder secp256k1 keys; the MockChain is
 * shared with the test so balances can be asserted directly.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MockChain } from "@stakepool/chain-client";
import {
  addressFromPrivateKey,
  keccak256,
  signAction,
  signDigest,
  toHex,
  type ActionKind,
} from "@stakepool/physics";
import { buildApp } from "../src/server.js";

const POOL = "0x00000000000000000000000000000000000000aa";

/** Placeholder key: 31 zero bytes then `n`. */
function testKey(n: number): Uint8Array {
  const key = new Uint8Array(32);
  key[31] = n;
  return key;
}

const OPERATOR_KEY = testKey(1);
const OPERATOR = addressFromPrivateKey(OPERATOR_KEY);
const ALICE_KEY = testKey(3);
const ALICE = addressFromPrivateKey(ALICE_KEY);

type App = Awaited<ReturnType<typeof buildApp>>;

let app: App;
let chain: MockChain;

async function act(key: Uint8Array, kind: ActionKind, params: Record<string, string> = {}) {
  const from = addressFromPrivateKey(key);
  const nonceRes = await app.inject({ method: "GET", url: `/nonce/${from}` });
  const { next_nonce } = nonceRes.json<{ next_nonce: number }>();
  const action = await signAction(key, { v: 1, kind, from, nonce: next_nonce, params });
  return app.inject({ method: "POST", url: "/action", payload: action });
}

beforeEach(async () => {
  chain = new MockChain({ poolAddress: POOL });
  chain.mint(ALICE, 1_000n);
  app = await buildApp({
    chain,
    poolAddress: POOL,
    operator: OPERATOR,
    feeBps: 500,
    devMode: true,
    logger: false,
  });
});

afterEach(async () => {
  await app.close();
});

describe("queries", () => {
  it("GET /health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, events: 0, depositors: 0 });
  });

  it("GET /pool returns the wire snapshot", async () => {
    const res = await app.inject({ method: "GET", url: "/pool" });
    expect(res.json()).toEqual({
      pool_address: POOL,
      operator: OPERATOR,
      pending_operator: null,
      fee_bps: 500,
      paused: false,
      current_epoch: "0",
      last_processed_epoch: "0",
      total_locked: "0",
      total_pending: "0",
      total_unclaimed_reward: "0",
      total_queued_withdrawal: "0",
      carried_reward: "0",
      total_fee_owed: "0",
      balance: "0",
      surplus: "0",
      tier: 0,
      depositor_count: 0,
    });
  });

  it("GET /tier reports the distance to tier 1", async () => {
    const res = await app.inject({ method: "GET", url: "/tier" });
    expect(res.json()).toEqual({
      tier: 0,
      balance: "0",
      to_next_tier: "25000000000000000000000000",
    });
  });

  it("rejects a malformed address", async () => {
    const res = await app.inject({ method: "GET", url: "/participants/0x12" });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: "invalid_address", detail: "must be 0x + 40 hex chars" });
  });

  it("rejects the zero address as a typed validation error", async () => {
    const zero = "0x0000000000000000000000000000000000000000";
    const res = await app.inject({ method: "GET", url: `/participants/${zero}` });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: "invalid_address",
      detail: "Invalid address",
      context: { address: zero },
    });
  });

  it("GET /nonce starts at 1", async () => {
    const res = await app.inject({ method: "GET", url: `/nonce/${ALICE}` });
    expect(res.json()).toEqual({ address: ALICE, next_nonce: 1 });
  });
});

describe("POST /action", () => {
  it("deposit → epoch → claim → withdraw rewards", async () => {
    const dep = await act(ALICE_KEY, "deposit", { amount: "100" });
    expect(dep.statusCode).toBe(200);
    expect(dep.json()).toMatchObject({
      ok: true,
      kind: "deposit",
      result: { amount: "100", pending_amount: "100", lock_epoch: "1" },
    });

    const adv = await app.inject({ method: "POST", url: "/dev/epoch/advance", payload: {} });
    expect(adv.json()).toEqual({ epoch: "1" });

    const proc = await app.inject({ method: "POST", url: "/epoch/process" });
    expect(proc.json()).toEqual({
      processed: true,
      epoch: "1",
      promoted_participants: 1,
      promoted_amount: "100",
    });

    const again = await app.inject({ method: "POST", url: "/epoch/process" });
    expect(again.json()).toEqual({ processed: false, last_processed_epoch: "1" });

    await app.inject({
      method: "POST",
      url: "/dev/settlement/credit",
      payload: { epoch: "1", amount: "1000" },
    });
    const claim = await act(ALICE_KEY, "rewards.claim", { epochs: "1" });
    expect(claim.json()).toMatchObject({
      result: {
        total_reward: "1000",
        operator_fee: "50",
        depositor_reward: "950",
        distributed: "950",
        dust: "0",
        carried: "0",
        recipients: 1,
        fee_paid: "50",
        fee_owed: "0",
      },
    });
    expect(chain.balanceOf(OPERATOR)).toBe(50n);

    const participant = await app.inject({ method: "GET", url: `/participants/${ALICE}` });
    expect(participant.json()).toEqual({
      address: ALICE,
      locked_amount: "100",
      pending_amount: "0",
      lock_epoch: "1",
      unclaimed_reward: "950",
      queued_withdrawal: "0",
      active: true,
      withdrawals: [],
      fee_owed: "0",
    });

    const withdraw = await act(ALICE_KEY, "rewards.withdraw");
    expect(withdraw.json()).toMatchObject({ result: { amount: "950" } });
    expect(chain.balanceOf(ALICE)).toBe(1_850n);
  });

  it("a refused operator fee stays owed until fee.withdraw", async () => {
    await act(ALICE_KEY, "deposit", { amount: "100" });
    await app.inject({ method: "POST", url: "/dev/epoch/advance", payload: {} });
    await app.inject({
      method: "POST",
      url: "/dev/settlement/credit",
      payload: { epoch: "1", amount: "1000" },
    });
    chain.onTransfer((t) => {
      if (t.counterparty === OPERATOR) throw new Error("operator offline");
    });

    const claim = await act(ALICE_KEY, "rewards.claim", { epochs: "1" });
    expect(claim.statusCode).toBe(200);
    expect(claim.json()).toMatchObject({ result: { fee_paid: "0", fee_owed: "50" } });
    const pool = await app.inject({ method: "GET", url: "/pool" });
    expect(pool.json()).toMatchObject({ total_fee_owed: "50", total_unclaimed_reward: "950" });

    chain.onTransfer(null);
    const paid = await act(OPERATOR_KEY, "fee.withdraw");
    expect(paid.json()).toMatchObject({ kind: "fee.withdraw", result: { amount: "50" } });
    expect(chain.balanceOf(OPERATOR)).toBe(50n);

    const none = await act(OPERATOR_KEY, "fee.withdraw");
    expect(none.statusCode).toBe(409);
    expect(none.json()).toMatchObject({ error: "no_rewards" });
  });

  it("withdrawal request and completion", async () => {
    await act(ALICE_KEY, "deposit", { amount: "300" });
    const req = await act(ALICE_KEY, "withdrawal.request", { amount: "120" });
    expect(req.json()).toMatchObject({
      result: { id: "1", amount: "120", available_epoch: "1" },
    });

    const early = await act(ALICE_KEY, "withdrawal.complete");
    expect(early.statusCode).toBe(409);
    expect(early.json()).toMatchObject({ error: "withdrawal_not_mature" });

    await app.inject({ method: "POST", url: "/dev/epoch/advance", payload: { by: "1" } });
    const done = await act(ALICE_KEY, "withdrawal.complete");
    expect(done.json()).toMatchObject({ result: { amount: "120", ids: ["1"] } });
    expect(chain.balanceOf(ALICE)).toBe(820n);
  });

  it("emergency withdrawal while paused", async () => {
    await act(ALICE_KEY, "deposit", { amount: "300" });
    expect((await act(OPERATOR_KEY, "pool.pause")).json()).toMatchObject({ result: { paused: true } });

    const blocked = await act(ALICE_KEY, "deposit", { amount: "1" });
    expect(blocked.statusCode).toBe(403);
    expect(blocked.json()).toMatchObject({ error: "paused" });

    const exit = await act(ALICE_KEY, "withdrawal.emergency");
    expect(exit.json()).toMatchObject({ result: { amount: "300", pending: "300" } });
    expect(chain.balanceOf(ALICE)).toBe(1_000n);
  });

  it("maps engine error categories to statuses", async () => {
    const insufficient = await act(ALICE_KEY, "withdrawal.request", { amount: "5" });
    expect(insufficient.statusCode).toBe(409);
    expect(insufficient.json()).toMatchObject({ error: "insufficient_balance" });

    const unauthorized = await act(ALICE_KEY, "fee.set", { fee_bps: "100" });
    expect(unauthorized.statusCode).toBe(403);
    expect(unauthorized.json()).toMatchObject({ error: "unauthorized" });

    const tooHigh = await act(OPERATOR_KEY, "fee.set", { fee_bps: "3000" });
    expect(tooHigh.statusCode).toBe(422);
    expect(tooHigh.json()).toMatchObject({ error: "fee_too_high" });

    const transfer = await act(ALICE_KEY, "deposit", { amount: "5000" });
    expect(transfer.statusCode).toBe(502);
    expect(transfer.json()).toMatchObject({ error: "transfer_failed" });
  });

  it("a rejected action does not consume its nonce", async () => {
    await act(ALICE_KEY, "withdrawal.request", { amount: "5" });
    const res = await app.inject({ method: "GET", url: `/nonce/${ALICE}` });
    expect(res.json()).toMatchObject({ next_nonce: 1 });
  });

  it("rejects a replayed nonce", async () => {
    const action = await signAction(ALICE_KEY, {
      v: 1,
      kind: "deposit",
      from: ALICE,
      nonce: 1,
      params: { amount: "10" },
    });
    const first = await app.inject({ method: "POST", url: "/action", payload: action });
    expect(first.statusCode).toBe(200);

    const replay = await app.inject({ method: "POST", url: "/action", payload: action });
    expect(replay.statusCode).toBe(409);
    expect(replay.json()).toMatchObject({ error: "bad_nonce", expected_nonce: 2 });
    expect(chain.balanceOf(ALICE)).toBe(990n);
  });

  it("rejects tampered params", async () => {
    const action = await signAction(ALICE_KEY, {
      v: 1,
      kind: "deposit",
      from: ALICE,
      nonce: 1,
      params: { amount: "10" },
    });
    const res = await app.inject({
      method: "POST",
      url: "/action",
      payload: { ...action, params: { amount: "999" } },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ error: "invalid_signature" });
  });

  it("rejects an action signed for someone else", async () => {
    const action = await signAction(ALICE_KEY, {
      v: 1,
      kind: "pool.pause",
      from: OPERATOR,
      nonce: 1,
      params: {},
    });
    const res = await app.inject({ method: "POST", url: "/action", payload: action });
    expect(res.statusCode).toBe(401);
  });

  it("rejects a malformed envelope", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/action",
      payload: { v: 2, kind: "deposit" },
    });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: "invalid_action" });
  });

  it("rejects malformed params before the engine runs", async () => {
    const res = await act(ALICE_KEY, "deposit", { amount: "1.5" });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: "invalid_params", param: "amount" });

    const missing = await act(ALICE_KEY, "rewards.claim");
    expect(missing.json()).toMatchObject({ error: "invalid_params", param: "epochs" });
  });

  it("operator handoff through signed actions", async () => {
    const next = addressFromPrivateKey(testKey(2));
    await act(OPERATOR_KEY, "operator.propose", { operator: next });
    const accepted = await act(testKey(2), "operator.accept");
    expect(accepted.json()).toMatchObject({ result: { operator: next } });

    const pool = await app.inject({ method: "GET", url: "/pool" });
    expect(pool.json()).toMatchObject({ operator: next, pending_operator: null });
  });

  it("forwards work payloads", async () => {
    const res = await act(OPERATOR_KEY, "work.submit", { payload: "0xdeadbeef" });
    expect(res.json()).toMatchObject({ result: { bytes: 4 } });
    expect(chain.submittedPayloads()).toEqual([new Uint8Array([0xde, 0xad, 0xbe, 0xef])]);
  });
});

describe("GET /events", () => {
  it("records committed events with the causing action id", async () => {
    const dep = await act(ALICE_KEY, "deposit", { amount: "100" });
    const { action_id } = dep.json<{ action_id: string }>();

    const res = await app.inject({ method: "GET", url: "/events?from=0" });
    const body = res.json<{ events: Array<Record<string, unknown>>; count: number }>();
    expect(body.count).toBe(1);
    expect(body.events[0]).toMatchObject({
      seq: 0,
      type: "deposit",
      action_id,
      payload: {
        participant: ALICE,
        amount: "100",
        lock_epoch: "1",
        pending_amount: "100",
      },
    });
  });

  it("does not record rejected actions", async () => {
    await act(ALICE_KEY, "withdrawal.request", { amount: "5" });
    const res = await app.inject({ method: "GET", url: "/events" });
    expect(res.json()).toEqual({ events: [], count: 0 });
  });

  it("unsigned epoch processing has a null action id", async () => {
    await app.inject({ method: "POST", url: "/dev/epoch/advance", payload: {} });
    await app.inject({ method: "POST", url: "/epoch/process" });
    const res = await app.inject({ method: "GET", url: "/events" });
    expect(res.json()).toMatchObject({
      events: [{ seq: 0, type: "epoch.processed", action_id: null }],
    });
  });
});

describe("POST /auth/verify", () => {
  const hash = keccak256(new TextEncoder().encode("coordinator login"));

  it("returns the success marker for the operator", async () => {
    const sig = await signDigest(OPERATOR_KEY, hash);
    const res = await app.inject({
      method: "POST",
      url: "/auth/verify",
      payload: { hash: toHex(hash), signature: toHex(sig) },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ result: "0x1626ba7e" });
  });

  it("returns the failure marker for another key", async () => {
    const sig = await signDigest(ALICE_KEY, hash);
    const res = await app.inject({
      method: "POST",
      url: "/auth/verify",
      payload: { hash: toHex(hash), signature: toHex(sig) },
    });
    expect(res.json()).toEqual({ result: "0xffffffff" });
  });

  it("a wrong-length signature is data, not an error", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/auth/verify",
      payload: { hash: toHex(hash), signature: toHex(new Uint8Array(64)) },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ result: "0xffffffff" });
  });

  it("rejects a malformed body", async () => {
    const res = await app.inject({ method: "POST", url: "/auth/verify", payload: { hash: "0x12" } });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: "invalid_body" });
  });
});

describe("dev routes", () => {
  it("mint credits the address", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/dev/mint",
      payload: { address: ALICE, amount: "5" },
    });
    expect(res.json()).toEqual({ address: ALICE, balance: "1005" });
  });

  it("are absent outside dev mode", async () => {
    const prod = await buildApp({
      chain: new MockChain({ poolAddress: POOL }),
      poolAddress: POOL,
      operator: OPERATOR,
      devMode: false,
      logger: false,
    });
    const res = await prod.inject({
      method: "POST",
      url: "/dev/mint",
      payload: { address: ALICE, amount: "5" },
    });
    expect(res.statusCode).toBe(404);
    await prod.close();
  });
});
