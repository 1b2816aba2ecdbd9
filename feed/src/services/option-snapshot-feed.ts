import { OptionTicker, SnapshotPassSummary, toError } from '@optiontape/shared';
import { config } from '../config';
import { SnapshotStore } from '../db/snapshot-store';
import { createLogger, Logger } from '../utils/logger';
import { InstrumentRegistry, UniverseSource } from './instrument-registry';
import { LatestValueCache } from './latest-value-cache';
import { MetadataRefresh } from './metadata-refresh';
import { QuoteStreamManager, QuoteStreamManagerOptions } from './option-ticker-stream';
import { SnapshotScheduler } from './snapshot-scheduler';
import { StreamHealthStatus } from './stream-connection';
import { UnderlyingPriceTracker, UnderlyingPriceTrackerOptions } from './underlying-price-stream';

export interface OptionSnapshotFeedOptions {
  store: SnapshotStore;
  source: UniverseSource;
  underlyings?: string[];
  quoteStream?: QuoteStreamManagerOptions;
  underlyingStream?: UnderlyingPriceTrackerOptions;
  snapshotIntervalMs?: number;
  clock?: () => Date;
  logger?: Logger;
}

export interface FeedHealthStatus {
  running: boolean;
  universeSize: number;
  cachedQuotes: number;
  trackedPrices: number;
  quoteGroups: StreamHealthStatus[];
  underlyingStream: StreamHealthStatus | null;
  snapshotIndex: number;
  lastSnapshotAt: Date | null;
  lastSnapshot: SnapshotPassSummary | null;
  totalPersistenceErrors: number;
  snapshotIntervalMs: number;
  lastRefreshAt: Date | null;
}

/**
 * Wires the registry, both stream kinds, the snapshot loop and the daily
 * refresh around one quote cache and one underlying price map.
 */
export class OptionSnapshotFeed {
  readonly quotes = new LatestValueCache<OptionTicker>();
  readonly prices = new LatestValueCache<string>();
  readonly registry: InstrumentRegistry;
  readonly quoteStreams: QuoteStreamManager;
  readonly underlyingTracker: UnderlyingPriceTracker;
  readonly scheduler: SnapshotScheduler;
  readonly refresher: MetadataRefresh;

  private readonly store: SnapshotStore;
  private readonly underlyings: string[];
  private readonly logger: Logger;
  private running: Promise<void> | null = null;

  constructor(options: OptionSnapshotFeedOptions) {
    this.store = options.store;
    this.underlyings = options.underlyings ?? config.universe.underlyings;
    this.logger = options.logger ?? createLogger('system');

    this.registry = new InstrumentRegistry(options.source);
    this.quoteStreams = new QuoteStreamManager(this.quotes, options.quoteStream);
    this.underlyingTracker = new UnderlyingPriceTracker(this.prices, options.underlyingStream);
    this.scheduler = new SnapshotScheduler({
      store: this.store,
      quotes: this.quotes,
      prices: this.prices,
      intervalMs: options.snapshotIntervalMs,
      clock: options.clock,
    });
    this.refresher = new MetadataRefresh({
      registry: this.registry,
      quotes: this.quotes,
      streams: this.quoteStreams,
      clock: options.clock,
    });
  }

  /**
   * Load the universe and recover the snapshot index, then launch every task.
   * Rejects when either startup step fails.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    const loaded = await this.registry.load();
    if (loaded.isErr()) {
      this.logger.error('Could not load the option universe at startup', { errorType: loaded.error.type });
      throw toError(loaded.error);
    }
    if (loaded.value.length === 0) {
      this.logger.warn('No option symbols matched the configured underlyings', { underlyings: this.underlyings });
    }

    await this.store.initialize();
    const recovered = await this.scheduler.initialize();

    this.logger.info('Starting option snapshot feed', {
      symbols: loaded.value.length,
      underlyings: this.underlyings,
      nextSnapshotIndex: recovered + 1,
    });

    this.running = Promise.all([
      this.supervise('underlying prices', this.underlyingTracker.trackPrices(this.underlyings)),
      this.supervise('quote streams', this.quoteStreams.subscribe(loaded.value)),
      this.supervise('snapshot loop', this.scheduler.runForever()),
      this.supervise('metadata refresh', this.refresher.runForever()),
    ]).then(() => undefined);
  }

  private supervise(task: string, promise: Promise<void>): Promise<void> {
    return promise.catch((error: unknown) => {
      this.logger.error(
        `Task ${task} ended with an error`,
        { task },
        error instanceof Error ? error : new Error(String(error))
      );
    });
  }

  /**
   * Resolves once every task has ended
   */
  async wait(): Promise<void> {
    await this.running;
  }

  async stop(): Promise<void> {
    this.refresher.stop();
    this.scheduler.stop();
    this.quoteStreams.stop();
    this.underlyingTracker.stop();
    await this.running;
    this.logger.info('Option snapshot feed stopped');
  }

  getHealthStatus(): FeedHealthStatus {
    const snapshots = this.scheduler.getHealthStatus();
    return {
      running: this.running !== null,
      universeSize: this.registry.size,
      cachedQuotes: this.quotes.size,
      trackedPrices: this.prices.size,
      quoteGroups: this.quoteStreams.getHealthStatus(),
      underlyingStream: this.underlyingTracker.getHealthStatus(),
      snapshotIndex: snapshots.snapshotIndex,
      lastSnapshotAt: snapshots.lastSnapshotAt,
      lastSnapshot: snapshots.lastSummary,
      totalPersistenceErrors: snapshots.totalPersistenceErrors,
      snapshotIntervalMs: snapshots.intervalMs,
      lastRefreshAt: this.refresher.getLastRefreshAt(),
    };
  }
}
