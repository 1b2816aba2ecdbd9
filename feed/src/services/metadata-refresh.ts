import {
  DailyTimeUtc,
  formatDailyTimeUtc,
  isPastExpirationCutoff,
  msUntilNextDailyRun,
  parseOptionSymbol,
  toError,
} from '@optiontape/shared';
import { config } from '../config';
import { createLogger, Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import { InstrumentRegistry } from './instrument-registry';
import { QuoteCache } from './latest-value-cache';

export type UniverseSubscriber = { updateUniverse(symbols: string[]): void };

export interface MetadataRefreshOptions {
  registry: InstrumentRegistry;
  quotes: QuoteCache;
  streams?: UniverseSubscriber;
  refreshTime?: DailyTimeUtc;
  cutoffHourUtc?: number;
  clock?: () => Date;
  logger?: Logger;
}

export interface RefreshOutcome {
  refreshed: boolean;
  symbols: number;
  pruned: number;
}

/**
 * Cache entries that should no longer be collected: gone from the universe,
 * not a valid option symbol, or at/past the expiration cutoff
 */
export function findStaleSymbols(
  cachedSymbols: string[],
  universe: ReadonlySet<string>,
  now: Date,
  cutoffHourUtc: number
): string[] {
  return cachedSymbols.filter(symbol => {
    if (!universe.has(symbol)) {
      return true;
    }
    const parsed = parseOptionSymbol(symbol);
    return parsed.isErr() || isPastExpirationCutoff(parsed.value, now, cutoffHourUtc);
  });
}

/**
 * Once a day re-reads the listed contracts and prunes the quote cache to match
 */
export class MetadataRefresh {
  private readonly registry: InstrumentRegistry;
  private readonly quotes: QuoteCache;
  private readonly streams: UniverseSubscriber | null;
  private readonly refreshTime: DailyTimeUtc;
  private readonly cutoffHourUtc: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private stopped = false;
  private readonly abortController = new AbortController();
  private lastRefreshAt: Date | null = null;

  constructor(options: MetadataRefreshOptions) {
    this.registry = options.registry;
    this.quotes = options.quotes;
    this.streams = options.streams ?? null;
    this.refreshTime = options.refreshTime ?? config.schedule.metadataRefreshTime;
    this.cutoffHourUtc = options.cutoffHourUtc ?? config.schedule.expirationCutoffHourUtc;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('refresh');
  }

  /**
   * Fetch the universe and prune the cache. On failure nothing changes until the next run.
   */
  async refresh(now: Date = this.clock()): Promise<RefreshOutcome> {
    const fetched = await this.registry.fetchUniverse();
    if (fetched.isErr()) {
      this.logger.error(
        'Metadata refresh failed, keeping current universe',
        { errorType: fetched.error.type, symbols: this.registry.size },
        toError(fetched.error)
      );
      return { refreshed: false, symbols: this.registry.size, pruned: 0 };
    }

    const symbols = fetched.value;
    this.registry.replace(symbols);

    const stale = findStaleSymbols(this.quotes.keys(), new Set(symbols), now, this.cutoffHourUtc);
    for (const symbol of stale) {
      this.quotes.remove(symbol);
    }

    this.streams?.updateUniverse(symbols);
    this.lastRefreshAt = now;

    this.logger.info('Metadata refreshed', {
      symbols: symbols.length,
      pruned: stale.length,
      cached: this.quotes.size,
    });
    return { refreshed: true, symbols: symbols.length, pruned: stale.length };
  }

  async runForever(): Promise<void> {
    while (!this.stopped) {
      const delay = msUntilNextDailyRun(this.clock(), this.refreshTime);
      this.logger.info(`Next metadata refresh at ${formatDailyTimeUtc(this.refreshTime)}`, { delayMs: delay });

      await sleep(delay, this.abortController.signal);
      if (this.stopped) {
        break;
      }

      try {
        await this.refresh();
      } catch (error) {
        this.logger.error(
          'Metadata refresh crashed',
          {},
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }
  }

  stop(): void {
    this.stopped = true;
    this.abortController.abort();
  }

  getLastRefreshAt(): Date | null {
    return this.lastRefreshAt;
  }
}
