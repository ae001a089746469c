/**
 * Signed pool actions: deposit, withdraw, complete, emergency, claim,
 * rewards, fee, fee-withdraw, propose, accept, pause, unpause.
 *
 * Each one loads the key, signs an ActionV1 for the next nonce and
 * prints the coordinator's result.
 */

import {
  isAddress,
  isDecimalString,
  isValidFeeBps,
  type ActionKind,
} from "@stakepool/physics";
import type { CliConfig } from "../lib/config.js";
import { loadKeys } from "../lib/keys.js";
import { submitAction } from "../lib/submit.js";

async function run(
  config: CliConfig,
  kind: ActionKind,
  params: Record<string, string> = {},
): Promise<void> {
  const key = await loadKeys(config.keyPath);
  const res = await submitAction(config, key, kind, params);

  console.log(`${res.kind} ok (action ${res.action_id})`);
  for (const [name, value] of Object.entries(res.result)) {
    const shown = Array.isArray(value) ? value.join(", ") || "(none)" : String(value);
    console.log(`  ${name}: ${shown}`);
  }
}

function amountArg(value: string): string {
  if (!isDecimalString(value) || /^0+$/.test(value)) {
    throw new Error(`Amount must be a positive integer in base units. Got: ${value}`);
  }
  return value;
}

export async function depositCommand(amount: string, config: CliConfig): Promise<void> {
  await run(config, "deposit", { amount: amountArg(amount) });
}

export async function withdrawCommand(amount: string, config: CliConfig): Promise<void> {
  await run(config, "withdrawal.request", { amount: amountArg(amount) });
}

export async function completeCommand(config: CliConfig): Promise<void> {
  await run(config, "withdrawal.complete");
}

export async function emergencyCommand(config: CliConfig): Promise<void> {
  await run(config, "withdrawal.emergency");
}

/** Claim settlement rewards for the given epochs. Open to any caller. */
export async function claimCommand(epochs: string[], config: CliConfig): Promise<void> {
  if (epochs.length === 0) throw new Error("At least one epoch is required");
  for (const e of epochs) {
    if (!isDecimalString(e)) throw new Error(`Invalid epoch: ${e}`);
  }
  await run(config, "rewards.claim", { epochs: epochs.join(",") });
}

export async function rewardsCommand(config: CliConfig): Promise<void> {
  await run(config, "rewards.withdraw");
}

export async function feeCommand(bps: string, config: CliConfig): Promise<void> {
  const n = Number(bps);
  if (!/^[0-9]+$/.test(bps) || !isValidFeeBps(n)) {
    throw new Error(`Fee must be 0–2000 basis points. Got: ${bps}`);
  }
  await run(config, "fee.set", { fee_bps: bps });
}

/** Pull operator fees that could not be paid at claim time. */
export async function feeWithdrawCommand(config: CliConfig): Promise<void> {
  await run(config, "fee.withdraw");
}

export async function proposeCommand(operator: string, config: CliConfig): Promise<void> {
  if (!isAddress(operator)) {
    throw new Error(`Invalid address: must be 0x + 40 hex chars. Got: ${operator}`);
  }
  await run(config, "operator.propose", { operator: operator.toLowerCase() });
}

export async function acceptCommand(config: CliConfig): Promise<void> {
  await run(config, "operator.accept");
}

export async function pauseCommand(config: CliConfig): Promise<void> {
  await run(config, "pool.pause");
}

export async function unpauseCommand(config: CliConfig): Promise<void> {
  await run(config, "pool.unpause");
}
