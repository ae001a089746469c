/**
 * Coordinator server — HTTP front for one stake pool.
 *
 * Owns: the StakePool engine, the event log, per-signer nonces.
 * The chain collaborators are a MockChain (in-process dev ledger).
 *
 * Routes:
 *   GET  /health                  — liveness + event count
 *   GET  /pool                    — pool-wide snapshot (PoolSnapshotV1)
 *   GET  /tier                    — tier and distance to the next one
 *   GET  /participants            — roster and depositor count
 *   GET  /participants/:address   — participant snapshot (ParticipantSnapshotV1)
 *   GET  /nonce/:address          — next expected action nonce
 *   POST /action                  — signed ActionV1 ingest
 *   POST /epoch/process           — unrestricted epoch synchronization
 *   POST /auth/verify             — operator signature check → 4-byte marker
 *   GET  /events                  — append-only event log (from, limit)
 *   POST /dev/mint                — dev mode: mint asset to an address
 *   POST /dev/epoch/advance       — dev mode: advance the epoch oracle
 *   POST /dev/settlement/credit   — dev mode: make an epoch reward claimable
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyReply } from "fastify";
import { Type, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MockChain } from "@stakepool/chain-client";
import {
  isPoolError,
  StakePool,
  type PoolError,
  type PoolErrorCategory,
  type PoolEvent,
} from "@stakepool/engine";
import {
  ActionV1,
  AddressString,
  amountToNextTier,
  computeActionId,
  fromHex,
  Hash32,
  HexBytes,
  isAddress,
  normalizeAddress,
  recoverActionSigner,
  UintString,
  ZERO_ADDRESS,
  type Hex,
} from "@stakepool/physics";
import { config } from "./config.js";
import { EventLog } from "./event-log/writer.js";
import { createEpochScheduler } from "./scheduler.js";
import { ActionParamError, applyAction } from "./views/actions.js";
import { NonceStore } from "./views/nonce-store.js";
import { eventPayload, participantToWire, poolToWire, snakeCase } from "./views/serialize.js";

const AuthVerifyBody = Type.Object({ hash: Hash32, signature: HexBytes });
const DevMintBody = Type.Object({ address: AddressString, amount: UintString });
const DevAdvanceBody = Type.Object({ by: Type.Optional(UintString) });
const DevCreditBody = Type.Object({ epoch: UintString, amount: UintString });

const STATUS_BY_CATEGORY: Record<PoolErrorCategory, number> = {
  validation: 422,
  authorization: 403,
  balance: 409,
  invariant: 409,
  external: 502,
};

function sendPoolError(reply: FastifyReply, err: PoolError): FastifyReply {
  return reply.status(STATUS_BY_CATEGORY[err.category]).send({
    error: snakeCase(err.code),
    detail: err.message,
    context: err.detail,
  });
}

/** First schema violation as "path: message". */
function firstError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First();
  return first ? `${first.path || "/"}: ${first.message}` : "invalid body";
}

export interface CoordinatorDeps {
  chain?: MockChain;
  operator?: string;
  poolAddress?: string;
  feeBps?: number;
  devMode?: boolean;
  /** 0 = no scheduler. */
  schedulerIntervalMs?: number;
  logger?: boolean | { level: string };
}

export async function buildApp(deps: CoordinatorDeps = {}) {
  const app = Fastify({ logger: deps.logger ?? { level: config.logLevel } });
  const devMode = deps.devMode ?? config.devMode;
  const poolAddress = deps.poolAddress ?? config.poolAddress;
  const chain = deps.chain ?? new MockChain({ poolAddress: normalizeAddress(poolAddress) });

  const log = new EventLog();
  const nonces = new NonceStore();
  /** Digest of the action being applied; stamped on the events it commits. */
  let currentActionId: Hex | null = null;

  const pool = new StakePool({
    poolAddress,
    operator: deps.operator ?? config.operator(),
    feeBps: deps.feeBps ?? config.feeBps,
    assets: chain.assets,
    settlement: chain.settlement,
    oracle: chain.oracle,
    onEvent: (event: PoolEvent) => {
      const entry = log.append(event.type, eventPayload(event), currentActionId);
      app.log.info({ seq: entry.seq, type: entry.type, ...entry.payload }, "pool event");
    },
  });

  app.log.info(
    { pool: pool.poolAddress, operator: pool.operator, devMode },
    "stake pool ready",
  );

  // ── Queries ─────────────────────────────────────────────────────

  app.get("/health", async () => {
    return { ok: true, events: log.count(), depositors: pool.depositorCount() };
  });

  app.get("/pool", async (_req, reply) => {
    try {
      return reply.send(poolToWire(pool.snapshot()));
    } catch (err) {
      if (isPoolError(err)) return sendPoolError(reply, err);
      throw err;
    }
  });

  app.get("/tier", async () => {
    const balance = chain.balanceOf(pool.poolAddress);
    const missing = amountToNextTier(balance);
    return {
      tier: pool.tier(),
      balance: balance.toString(),
      to_next_tier: missing === null ? null : missing.toString(),
    };
  });

  app.get("/participants", async () => {
    return { depositor_count: pool.depositorCount(), roster: pool.roster() };
  });

  app.get<{ Params: { address: string } }>("/participants/:address", async (req, reply) => {
    const { address } = req.params;
    if (!isAddress(address)) {
      return reply.status(422).send({ error: "invalid_address", detail: "must be 0x + 40 hex chars" });
    }
    try {
      return reply.send(participantToWire(pool.participant(address)));
    } catch (err) {
      if (isPoolError(err)) return sendPoolError(reply, err);
      throw err;
    }
  });

  app.get<{ Params: { address: string } }>("/nonce/:address", async (req, reply) => {
    const { address } = req.params;
    if (!isAddress(address)) {
      return reply.status(422).send({ error: "invalid_address", detail: "must be 0x + 40 hex chars" });
    }
    const signer = normalizeAddress(address);
    return reply.send({ address: signer, next_nonce: nonces.next(signer) });
  });

  app.get<{ Querystring: { from?: string; limit?: string } }>("/events", async (req, reply) => {
    const from = req.query.from ?? "0";
    const limit = req.query.limit ?? "500";
    if (!/^[0-9]+$/.test(from) || !/^[0-9]+$/.test(limit)) {
      return reply.status(422).send({ error: "invalid_query", detail: "from and limit must be integers" });
    }
    const events = log.since(parseInt(from, 10), Math.min(parseInt(limit, 10), 500));
    return reply.send({ events, count: log.count() });
  });

  // ── Signed action ingest ────────────────────────────────────────
  // POST /action — ActionV1 envelope: verify shape, signature, nonce,
  // then run the engine operation as the recovered signer.
  app.post<{ Body: unknown }>("/action", async (req, reply) => {
    const body = req.body;
    if (!Value.Check(ActionV1, body)) {
      return reply.status(422).send({ error: "invalid_action", detail: firstError(ActionV1, body) });
    }
    const action = body;

    const signer = recoverActionSigner(action);
    if (signer === ZERO_ADDRESS || signer !== action.from.toLowerCase()) {
      return reply
        .status(401)
        .send({ error: "invalid_signature", detail: "signature does not recover to from" });
    }

    const expected = nonces.next(signer);
    if (action.nonce !== expected) {
      return reply.status(409).send({
        error: "bad_nonce",
        detail: `expected nonce ${expected}, got ${action.nonce}`,
        expected_nonce: expected,
      });
    }

    const actionId = computeActionId(action);
    currentActionId = actionId;
    try {
      const result = applyAction(pool, signer, action);
      nonces.consume(signer, action.nonce);
      return reply.send({ ok: true, action_id: actionId, kind: action.kind, result });
    } catch (err) {
      if (err instanceof ActionParamError) {
        return reply.status(422).send({ error: "invalid_params", detail: err.message, param: err.param });
      }
      if (isPoolError(err)) {
        req.log.warn({ kind: action.kind, signer, code: err.code }, "action rejected");
        return sendPoolError(reply, err);
      }
      throw err;
    } finally {
      currentActionId = null;
    }
  });

  // ── Epoch ───────────────────────────────────────────────────────
  // POST /epoch/process — anyone may synchronize; idempotent.
  app.post("/epoch/process", async (_req, reply) => {
    try {
      const result = pool.processEpoch();
      if (!result) {
        return reply.send({
          processed: false,
          last_processed_epoch: pool.snapshot().lastProcessedEpoch.toString(),
        });
      }
      return reply.send({
        processed: true,
        epoch: result.epoch.toString(),
        promoted_participants: result.promotedParticipants,
        promoted_amount: result.promotedAmount.toString(),
      });
    } catch (err) {
      if (isPoolError(err)) return sendPoolError(reply, err);
      throw err;
    }
  });

  // ── Authentication boundary ─────────────────────────────────────
  // POST /auth/verify — answers with a marker, never an error, for any
  // well-formed hash/signature pair.
  app.post<{ Body: unknown }>("/auth/verify", async (req, reply) => {
    const body = req.body;
    if (!Value.Check(AuthVerifyBody, body)) {
      return reply
        .status(422)
        .send({ error: "invalid_body", detail: firstError(AuthVerifyBody, body) });
    }
    const result = pool.isValidSignature(fromHex(body.hash), fromHex(body.signature));
    return reply.send({ result });
  });

  // ── Dev mode: drive the mock chain ──────────────────────────────
  if (devMode) {
    app.post<{ Body: unknown }>("/dev/mint", async (req, reply) => {
      const body = req.body;
      if (!Value.Check(DevMintBody, body) || body.amount === "0") {
        return reply.status(422).send({ error: "invalid_body", detail: "address + positive amount" });
      }
      const to = normalizeAddress(body.address);
      chain.mint(to, BigInt(body.amount));
      return reply.send({ address: to, balance: chain.balanceOf(to).toString() });
    });

    app.post<{ Body: unknown }>("/dev/epoch/advance", async (req, reply) => {
      const body = req.body ?? {};
      if (!Value.Check(DevAdvanceBody, body)) {
        return reply.status(422).send({ error: "invalid_body", detail: firstError(DevAdvanceBody, body) });
      }
      const epoch = chain.advanceEpoch(BigInt(body.by ?? "1"));
      return reply.send({ epoch: epoch.toString() });
    });

    app.post<{ Body: unknown }>("/dev/settlement/credit", async (req, reply) => {
      const body = req.body;
      if (!Value.Check(DevCreditBody, body)) {
        return reply.status(422).send({ error: "invalid_body", detail: firstError(DevCreditBody, body) });
      }
      try {
        chain.creditEpochReward(BigInt(body.epoch), BigInt(body.amount));
      } catch (err) {
        const msg = err instanceof Error ? err.message : "credit failed";
        return reply.status(409).send({ error: "already_claimed", detail: msg });
      }
      return reply.send({ epoch: body.epoch, amount: body.amount });
    });
  }

  // ── Scheduler ───────────────────────────────────────────────────
  const intervalMs = deps.schedulerIntervalMs ?? 0;
  if (intervalMs > 0) {
    const scheduler = createEpochScheduler(pool, {
      checkIntervalMs: intervalMs,
      onProcess: (result) => {
        app.log.info(
          { epoch: result.epoch.toString(), promoted: result.promotedAmount.toString() },
          "epoch processed by scheduler",
        );
      },
      onError: (err) => {
        app.log.error({ err }, "scheduler error");
      },
    });
    app.addHook("onClose", async () => {
      scheduler.stop();
    });
    scheduler.start();
    app.log.info({ intervalMs }, "epoch scheduler started");
  }

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── coordinator config ───");
  console.log(`  port:              ${config.port}`);
  console.log(`  pool_address:      ${config.poolAddress}`);
  console.log(`  fee_bps:           ${config.feeBps}`);
  console.log(`  epoch_scheduler:   ${config.epochSchedulerIntervalMs > 0 ? `${config.epochSchedulerIntervalMs}ms` : "disabled"}`);
  console.log(`  dev_mode:          ${config.devMode}`);
  console.log("───────────────────────────");

  const app = await buildApp({
    operator: config.operator(),
    schedulerIntervalMs: config.epochSchedulerIntervalMs,
  });

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
