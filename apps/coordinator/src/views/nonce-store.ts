/**
 * Per-signer action nonces. In-memory: a coordinator restart resets them
 * along with the rest of the dev ledger.
 *
 * An action must carry exactly last + 1; the nonce is consumed only once
 * the action has committed, so a rejected action can be corrected and
 * resent with the same nonce.
 */

import type { Address } from "@stakepool/physics";

export class NonceStore {
  private readonly last = new Map<Address, number>();

  next(signer: Address): number {
    return (this.last.get(signer) ?? 0) + 1;
  }

  consume(signer: Address, nonce: number): void {
    const expected = this.next(signer);
    if (nonce !== expected) {
      throw new Error(`Nonce ${nonce} out of sequence for ${signer}, expected ${expected}`);
    }
    this.last.set(signer, nonce);
  }
}
