import { OptionTicker } from '@optiontape/shared';

/**
 * Latest value per key. A later upsert replaces the earlier value; nothing is queued.
 *
 * Every mutation is a single synchronous step, so readers on the event loop
 * never observe a half-written entry. `snapshotCopy()` copies in one step too.
 */
export class LatestValueCache<V> {
  private entries = new Map<string, V>();

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  upsert(key: string, value: V): void {
    this.entries.set(key, value);
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Point-in-time shallow copy; later upserts do not show up in it
   */
  snapshotCopy(): Map<string, V> {
    return new Map(this.entries);
  }
}

export type QuoteCache = LatestValueCache<OptionTicker>;
export type UnderlyingPriceCache = LatestValueCache<string>;
