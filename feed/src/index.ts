// Public surface of the feed package

export { OptionSnapshotFeed } from './services/option-snapshot-feed';
export type { FeedHealthStatus, OptionSnapshotFeedOptions } from './services/option-snapshot-feed';
export { BinanceOptionsClient, selectOptionSymbols } from './services/binance-options-client';
export { InstrumentRegistry } from './services/instrument-registry';
export { QuoteStreamManager } from './services/option-ticker-stream';
export { UnderlyingPriceTracker } from './services/underlying-price-stream';
export { SnapshotScheduler } from './services/snapshot-scheduler';
export { MetadataRefresh } from './services/metadata-refresh';
export { filterSnapshot } from './services/snapshot-filter';
export { StreamConnection } from './services/stream-connection';
export { LatestValueCache } from './services/latest-value-cache';
export { QuestDBConnection } from './db/connection';
export { QuestDBSnapshotStore, SnapshotWriteError } from './db/snapshot-store';
export type { SnapshotStore } from './db/snapshot-store';
export { loadConfig } from './config';
export type { Config } from './config';
export * from './types';
