/**
 * Signed action submission: GET /nonce → sign ActionV1 → POST /action.
 */

import {
  ACTION_VERSION,
  signAction,
  type ActionKind,
  type ActionV1,
} from "@stakepool/physics";
import type { CliConfig } from "./config.js";
import { httpGetRotate, httpPostRotate } from "./http.js";
import type { LoadedKey } from "./keys.js";

interface NonceResponse {
  address: string;
  next_nonce: number;
}

export interface ActionResponse {
  ok: true;
  action_id: string;
  kind: ActionKind;
  result: Record<string, string | string[] | boolean | number | null>;
}

/** Build and sign an action for the signer's next nonce. */
export async function buildAction(
  config: CliConfig,
  key: LoadedKey,
  kind: ActionKind,
  params: Record<string, string>,
): Promise<ActionV1> {
  const { next_nonce } = await httpGetRotate<NonceResponse>(
    config.coordinators,
    `/nonce/${key.address}`,
  );
  return signAction(key.privateKey, {
    v: ACTION_VERSION,
    kind,
    from: key.address,
    nonce: next_nonce,
    params,
  });
}

export async function submitAction(
  config: CliConfig,
  key: LoadedKey,
  kind: ActionKind,
  params: Record<string, string> = {},
): Promise<ActionResponse> {
  const action = await buildAction(config, key, kind, params);
  return httpPostRotate<ActionResponse>(config.coordinators, "/action", action);
}
