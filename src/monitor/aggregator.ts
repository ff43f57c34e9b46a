import type { AggregateEntry, AggregateSnapshot, MessageEvent, MonitoredName } from '../types.js';

/**
 * Per-name arrival statistics.
 *
 * `record` and `snapshot` are synchronous, so the event loop serializes
 * them: a snapshot sees each entry either before or after an update, never
 * in between. Snapshots are copies, so formatting a frame holds nothing.
 */
export class RateAggregator {
  private readonly entries = new Map<MonitoredName, AggregateEntry>();

  record(name: MonitoredName, at: number): void {
    const entry = this.entries.get(name);
    if (!entry) {
      this.entries.set(name, { count: 1, lastSeen: at });
      return;
    }
    entry.count += 1;
    if (entry.lastSeen === null || at > entry.lastSeen) {
      entry.lastSeen = at;
    }
  }

  snapshot(): AggregateSnapshot {
    const copy = new Map<MonitoredName, AggregateEntry>();
    for (const [name, entry] of this.entries) {
      copy.set(name, { count: entry.count, lastSeen: entry.lastSeen });
    }
    return copy;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Update loop: records every event until the source ends. */
  async consume(source: AsyncIterable<MessageEvent>): Promise<number> {
    let recorded = 0;
    for await (const event of source) {
      this.record(event.name, event.receivedAt);
      recorded += 1;
    }
    return recorded;
  }
}
