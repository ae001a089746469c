/**
 * stakepool CLI — drive a pool coordinator from the terminal.
 *
 * Commands:
 *   keygen                 Generate secp256k1 key
 *   address                Print the key's address
 *   status                 Pool totals, fee, epoch, tier
 *   me [address]           Participant balances and queued withdrawals
 *   deposit <amount>       Deposit base units (locks next epoch)
 *   withdraw <amount>      Queue a withdrawal
 *   complete               Release matured withdrawals
 *   emergency              Take everything out, bypassing pause
 *   claim <epochs...>      Claim settlement rewards and distribute them
 *   rewards                Withdraw accrued rewards
 *   fee-withdraw           Withdraw operator fees owed to the key
 *   process                Synchronize the pool to the current epoch
 *   fee <bps>              Operator: set the fee
 *   propose <address>      Operator: propose a successor
 *   accept                 Accept a pending operator handoff
 *   pause | unpause        Operator: toggle the pause gate
 *   config                 Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig, withPrimaryCoordinator, type CliConfig } from "./lib/config.js";
import { addressCommand, keygenCommand } from "./commands/keygen.js";
import { meCommand, statusCommand } from "./commands/status.js";
import {
  acceptCommand,
  claimCommand,
  completeCommand,
  depositCommand,
  emergencyCommand,
  feeCommand,
  feeWithdrawCommand,
  pauseCommand,
  proposeCommand,
  rewardsCommand,
  unpauseCommand,
  withdrawCommand,
} from "./commands/pool-actions.js";
import { processCommand } from "./commands/process.js";
import { configCommand } from "./commands/config-cmd.js";

interface GlobalOptions {
  coordinator?: string;
}

const program = new Command();

program
  .name("stakepool")
  .description("Pooled staking with epoch-synchronized accounting")
  .version("0.1.0")
  .option("-c, --coordinator <url>", "Coordinator URL override");

async function resolveConfig(): Promise<CliConfig> {
  const config = await loadConfig();
  const { coordinator } = program.opts<GlobalOptions>();
  return coordinator ? withPrimaryCoordinator(config, coordinator) : config;
}

// ── keys ────────────────────────────────────────────────────────────

program
  .command("keygen")
  .description("Generate secp256k1 key → ~/.stakepool/key.json")
  .option("--force", "Overwrite existing key file")
  .action(async (opts: { force?: boolean }) => {
    await keygenCommand(await resolveConfig(), { force: opts.force });
  });

program
  .command("address")
  .description("Print the address of the configured key")
  .action(async () => {
    await addressCommand(await resolveConfig());
  });

// ── queries ─────────────────────────────────────────────────────────

program
  .command("status")
  .description("Show pool totals, fee, epoch and tier")
  .action(async () => {
    await statusCommand(await resolveConfig());
  });

program
  .command("me")
  .description("Show a participant's balances (default: own key)")
  .argument("[address]", "Participant address")
  .action(async (address: string | undefined) => {
    await meCommand(await resolveConfig(), address);
  });

// ── participant actions ─────────────────────────────────────────────

program
  .command("deposit")
  .description("Deposit base units; they join the locked stake next epoch")
  .argument("<amount>", "Amount in base units")
  .action(async (amount: string) => {
    await depositCommand(amount, await resolveConfig());
  });

program
  .command("withdraw")
  .description("Queue a withdrawal (pending first, then locked)")
  .argument("<amount>", "Amount in base units")
  .action(async (amount: string) => {
    await withdrawCommand(amount, await resolveConfig());
  });

program
  .command("complete")
  .description("Release all matured withdrawals")
  .action(async () => {
    await completeCommand(await resolveConfig());
  });

program
  .command("emergency")
  .description("Withdraw everything immediately, even while paused")
  .action(async () => {
    await emergencyCommand(await resolveConfig());
  });

program
  .command("rewards")
  .description("Withdraw accrued rewards")
  .action(async () => {
    await rewardsCommand(await resolveConfig());
  });

program
  .command("process")
  .description("Synchronize the pool to the current epoch")
  .action(async () => {
    await processCommand(await resolveConfig());
  });

program
  .command("claim")
  .description("Claim settlement rewards and distribute them")
  .argument("<epochs...>", "Epoch ids to claim")
  .action(async (epochs: string[]) => {
    await claimCommand(epochs, await resolveConfig());
  });

// ── operator actions ────────────────────────────────────────────────

program
  .command("fee-withdraw")
  .description("Withdraw operator fees owed to this key")
  .action(async () => {
    await feeWithdrawCommand(await resolveConfig());
  });

program
  .command("fee")
  .description("Set the operator fee")
  .argument("<bps>", "Basis points (0–2000)")
  .action(async (bps: string) => {
    await feeCommand(bps, await resolveConfig());
  });

program
  .command("propose")
  .description("Propose a new operator (two-step handoff)")
  .argument("<address>", "Successor address")
  .action(async (address: string) => {
    await proposeCommand(address, await resolveConfig());
  });

program
  .command("accept")
  .description("Accept a pending operator handoff")
  .action(async () => {
    await acceptCommand(await resolveConfig());
  });

program
  .command("pause")
  .description("Pause deposits, withdrawals and claims")
  .action(async () => {
    await pauseCommand(await resolveConfig());
  });

program
  .command("unpause")
  .description("Lift the pause")
  .action(async () => {
    await unpauseCommand(await resolveConfig());
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("--set-coordinator <url>", "Set primary coordinator URL")
  .option("--key-path <path>", "Set key file path")
  .action(async (opts: { setCoordinator?: string; keyPath?: string }) => {
    await configCommand({ coordinator: opts.setCoordinator, keyPath: opts.keyPath });
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
