/**
 * stakepool process
 *
 * POST /epoch/process — anyone may synchronize the pool to the current epoch.
 */

import type { CliConfig } from "../lib/config.js";
import { httpPostRotate } from "../lib/http.js";

type ProcessResponse =
  | { processed: false; last_processed_epoch: string }
  | {
      processed: true;
      epoch: string;
      promoted_participants: number;
      promoted_amount: string;
    };

export async function processCommand(config: CliConfig): Promise<void> {
  const res = await httpPostRotate<ProcessResponse>(config.coordinators, "/epoch/process", {});
  if (!res.processed) {
    console.log(`Already at epoch ${res.last_processed_epoch}`);
    return;
  }
  console.log(`Processed epoch ${res.epoch}`);
  console.log(`  promoted: ${res.promoted_participants} participant(s), ${res.promoted_amount}`);
}
