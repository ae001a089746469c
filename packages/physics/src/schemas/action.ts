/**
 * ActionV1 — the signed action envelope.
 *
 * Every state-changing request to the coordinator is an ActionV1.
 * Kind determines which engine operation runs and which params it needs.
 *
 * digest = keccak256(canonical(ActionV1 minus sig))
 * sig    = secp256k1 recoverable signature over digest (65 bytes, hex)
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressString, HexBytes } from "./common.js";

export const ActionKind = Type.Union([
  Type.Literal("deposit"),
  Type.Literal("withdrawal.request"),
  Type.Literal("withdrawal.complete"),
  Type.Literal("withdrawal.emergency"),
  Type.Literal("rewards.claim"),
  Type.Literal("rewards.withdraw"),
  Type.Literal("fee.withdraw"),
  Type.Literal("work.submit"),
  Type.Literal("fee.set"),
  Type.Literal("operator.propose"),
  Type.Literal("operator.accept"),
  Type.Literal("pool.pause"),
  Type.Literal("pool.unpause"),
]);

export type ActionKind = Static<typeof ActionKind>;

export const ActionV1 = Type.Object(
  {
    /** Version. Always 1. */
    v: Type.Literal(1),
    kind: ActionKind,
    /** Signer address. Must equal the recovered signer. */
    from: AddressString,
    /** Per-signer sequence, strictly last + 1. */
    nonce: Type.Integer({ minimum: 1 }),
    /**
     * Kind-specific parameters, all strings:
     *   amount  — decimal base units (deposit, withdrawal.request)
     *   epochs  — comma-separated decimal epoch ids (rewards.claim)
     *   payload — 0x hex bytes (work.submit)
     *   fee_bps — decimal integer (fee.set)
     *   operator — address (operator.propose)
     */
    params: Type.Record(Type.String(), Type.String({ maxLength: 65_536 })),
    /** 65-byte recoverable signature, 0x hex. */
    sig: HexBytes,
  },
  { additionalProperties: false },
);

export type ActionV1 = Static<typeof ActionV1>;
