/**
 * Event log writer — in-memory append-only store.
 *
 * Entries are never modified or removed. Sequence numbers are dense and
 * start at 0, so `from` is both a cursor and an index.
 */

import type { Hex } from "@stakepool/physics";
import type { EventEnvelope } from "./schemas.js";

export class EventLog {
  private readonly entries: EventEnvelope[] = [];

  append(
    type: string,
    payload: Record<string, unknown>,
    actionId: Hex | null = null,
    timestamp: number = Date.now(),
  ): EventEnvelope {
    const entry: EventEnvelope = {
      seq: this.entries.length,
      type,
      timestamp,
      action_id: actionId,
      payload,
    };
    this.entries.push(entry);
    return entry;
  }

  /** Entries with seq ≥ fromSeq, oldest first, at most `limit`. */
  since(fromSeq = 0, limit = 500): EventEnvelope[] {
    return this.entries.slice(Math.max(0, fromSeq), Math.max(0, fromSeq) + limit);
  }

  byType(type: string): EventEnvelope[] {
    return this.entries.filter((e) => e.type === type);
  }

  count(): number {
    return this.entries.length;
  }
}
