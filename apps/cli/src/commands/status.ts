/**
 * stakepool status / stakepool me [address]
 *
 * GET /pool + /tier, or GET /participants/:address → print summary.
 */

import { isAddress, type ParticipantSnapshotV1, type PoolSnapshotV1 } from "@stakepool/physics";
import type { CliConfig } from "../lib/config.js";
import { httpGetRotate } from "../lib/http.js";
import { loadKeys } from "../lib/keys.js";

interface TierResponse {
  tier: number;
  balance: string;
  to_next_tier: string | null;
}

export async function statusCommand(config: CliConfig): Promise<void> {
  const pool = await httpGetRotate<PoolSnapshotV1>(config.coordinators, "/pool");
  const tier = await httpGetRotate<TierResponse>(config.coordinators, "/tier");

  console.log(`Pool ${pool.pool_address}\n`);
  console.log(`  operator:        ${pool.operator}`);
  if (pool.pending_operator) console.log(`  pending:         ${pool.pending_operator}`);
  console.log(`  fee:             ${pool.fee_bps} bps`);
  console.log(`  paused:          ${pool.paused ? "yes" : "no"}`);
  console.log(`  epoch:           ${pool.current_epoch} (processed ${pool.last_processed_epoch})`);
  console.log(`  locked:          ${pool.total_locked}`);
  console.log(`  pending:         ${pool.total_pending}`);
  console.log(`  queued:          ${pool.total_queued_withdrawal}`);
  console.log(`  unclaimed:       ${pool.total_unclaimed_reward}`);
  console.log(`  fees owed:       ${pool.total_fee_owed}`);
  console.log(`  carried:         ${pool.carried_reward}`);
  console.log(`  depositors:      ${pool.depositor_count}`);
  console.log(
    `  tier:            ${tier.tier}` +
      (tier.to_next_tier === null ? " (max)" : ` (${tier.to_next_tier} to next)`),
  );
}

export async function meCommand(config: CliConfig, address?: string): Promise<void> {
  let who: string;
  if (address !== undefined) {
    if (!isAddress(address)) {
      throw new Error(`Invalid address: must be 0x + 40 hex chars. Got: ${address}`);
    }
    who = address.toLowerCase();
  } else {
    who = (await loadKeys(config.keyPath)).address;
  }

  const p = await httpGetRotate<ParticipantSnapshotV1>(config.coordinators, `/participants/${who}`);

  console.log(`Participant ${p.address}\n`);
  console.log(`  locked:    ${p.locked_amount}`);
  console.log(`  pending:   ${p.pending_amount} (locks at epoch ${p.lock_epoch})`);
  console.log(`  reward:    ${p.unclaimed_reward}`);
  console.log(`  queued:    ${p.queued_withdrawal}`);
  if (p.fee_owed !== "0") console.log(`  fee owed:  ${p.fee_owed}`);
  console.log(`  active:    ${p.active ? "yes" : "no"}`);
  for (const w of p.withdrawals) {
    console.log(`    #${w.id}: ${w.amount} available at epoch ${w.available_epoch}`);
  }
}
