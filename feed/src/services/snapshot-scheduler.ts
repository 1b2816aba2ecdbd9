import { persistenceError, safeCallAsync, SnapshotPassSummary, toError } from '@optiontape/shared';
import { config } from '../config';
import { SnapshotStore, SnapshotWriteError } from '../db/snapshot-store';
import { createLogger, Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import { QuoteCache, UnderlyingPriceCache } from './latest-value-cache';
import { filterSnapshot } from './snapshot-filter';

export interface SnapshotSchedulerOptions {
  store: SnapshotStore;
  quotes: QuoteCache;
  prices: UnderlyingPriceCache;
  intervalMs?: number;
  quoteAsset?: string;
  cutoffHourUtc?: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Periodically copies the quote cache, filters it, and persists one pass.
 *
 * The snapshot index lives in memory after startup recovery. It is bumped
 * before each pass is written and never handed out twice, even when a write fails.
 */
export class SnapshotScheduler {
  private readonly store: SnapshotStore;
  private readonly quotes: QuoteCache;
  private readonly prices: UnderlyingPriceCache;
  private readonly intervalMs: number;
  private readonly quoteAsset: string;
  private readonly cutoffHourUtc: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  private snapshotIndex = 0;
  private initialized = false;
  private stopped = false;
  private readonly abortController = new AbortController();
  private lastSummary: SnapshotPassSummary | null = null;
  private lastSnapshotAt: Date | null = null;
  private totalPersistenceErrors = 0;

  constructor(options: SnapshotSchedulerOptions) {
    this.store = options.store;
    this.quotes = options.quotes;
    this.prices = options.prices;
    this.intervalMs = options.intervalMs ?? config.schedule.snapshotIntervalMs;
    this.quoteAsset = options.quoteAsset ?? config.universe.quoteAsset;
    this.cutoffHourUtc = options.cutoffHourUtc ?? config.schedule.expirationCutoffHourUtc;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('snapshot');
  }

  /**
   * Recover the high-water snapshot index from the store. Returns it.
   */
  async initialize(): Promise<number> {
    this.snapshotIndex = await this.store.getMaxSnapshotIndex();
    this.initialized = true;
    this.logger.info('Recovered snapshot index', { snapshotIndex: this.snapshotIndex });
    return this.snapshotIndex;
  }

  async takeSnapshot(now: Date = this.clock()): Promise<SnapshotPassSummary> {
    if (!this.initialized) {
      throw new Error('Snapshot scheduler used before initialize()');
    }

    this.snapshotIndex += 1;
    const snapshotIndex = this.snapshotIndex;

    const filtered = filterSnapshot({
      snapshotIndex,
      quotes: this.quotes.snapshotCopy(),
      prices: this.prices.snapshotCopy(),
      now,
      quoteAsset: this.quoteAsset,
      cutoffHourUtc: this.cutoffHourUtc,
      clock: this.clock,
    });

    const saved = filtered.rows.length;
    const summary: SnapshotPassSummary = {
      snapshotIndex,
      collected: filtered.collected,
      saved,
      dropped: filtered.collected - saved,
      unparsable: filtered.unparsable,
      expired: filtered.expired,
      illiquid: filtered.illiquid,
    };

    this.logger.info(`Snapshot ${snapshotIndex}: collected ${summary.collected}, saved ${saved}, dropped ${summary.dropped}`, {
      unparsable: summary.unparsable,
      expired: summary.expired,
      illiquid: summary.illiquid,
    });

    const persisted = await safeCallAsync(() =>
      this.store.recordPass({ summary, rows: filtered.rows, completedAt: this.clock() })
    ).mapErr(error => persistenceError(`Failed to persist snapshot ${snapshotIndex}: ${error.message}`, error.cause));

    if (persisted.isErr()) {
      this.totalPersistenceErrors++;
      const cause = persisted.error.cause;
      // Rows written before the failure stay in storage without a pass row
      const rowsWritten = cause instanceof SnapshotWriteError ? cause.rowsWritten : 0;
      this.logger.error(persisted.error.message, { snapshotIndex, rows: saved, rowsWritten }, toError(persisted.error));
    }

    this.lastSummary = summary;
    this.lastSnapshotAt = now;
    return summary;
  }

  /**
   * One pass every interval until `stop()`. A failing pass is logged and the loop goes on.
   */
  async runForever(): Promise<void> {
    while (!this.stopped) {
      await sleep(this.intervalMs, this.abortController.signal);
      if (this.stopped) {
        break;
      }

      try {
        await this.takeSnapshot();
      } catch (error) {
        this.logger.error(
          'Snapshot pass failed',
          { snapshotIndex: this.snapshotIndex },
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }
  }

  stop(): void {
    this.stopped = true;
    this.abortController.abort();
  }

  getCurrentIndex(): number {
    return this.snapshotIndex;
  }

  getHealthStatus(): {
    snapshotIndex: number;
    lastSnapshotAt: Date | null;
    lastSummary: SnapshotPassSummary | null;
    totalPersistenceErrors: number;
    intervalMs: number;
  } {
    return {
      snapshotIndex: this.snapshotIndex,
      lastSnapshotAt: this.lastSnapshotAt,
      lastSummary: this.lastSummary,
      totalPersistenceErrors: this.totalPersistenceErrors,
      intervalMs: this.intervalMs,
    };
  }
}
