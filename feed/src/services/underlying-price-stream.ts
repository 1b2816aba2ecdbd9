import { config } from '../config';
import { isTradeEnvelope } from '../types/binance';
import { createLogger, Logger } from '../utils/logger';
import { createReconnectPolicy, ReconnectPolicy } from '../utils/reconnect-policy';
import { UnderlyingPriceCache } from './latest-value-cache';
import { StreamConnection, StreamHealthStatus } from './stream-connection';

export interface UnderlyingPriceTrackerOptions {
  streamUrl?: string;
  quoteAsset?: string;
  reconnectPolicy?: ReconnectPolicy;
  staleTimeoutMs?: number;
  logger?: Logger;
}

export function buildTradeStreamUrl(baseUrl: string, assets: string[], quoteAsset: string): string {
  const streams = assets.map(asset => `${asset.toLowerCase()}${quoteAsset.toLowerCase()}@trade`);
  return `${baseUrl}?streams=${streams.join('/')}`;
}

/**
 * Last spot trade price per pair (BTCUSDT, ETHUSDT) from a single combined trade stream
 */
export class UnderlyingPriceTracker {
  private readonly streamUrl: string;
  private readonly quoteAsset: string;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly staleTimeoutMs: number;
  private readonly logger: Logger;
  private connection: StreamConnection | null = null;
  private stopped = false;

  constructor(
    private readonly prices: UnderlyingPriceCache,
    options: UnderlyingPriceTrackerOptions = {}
  ) {
    this.streamUrl = options.streamUrl ?? config.binance.spotStreamUrl;
    this.quoteAsset = options.quoteAsset ?? config.universe.quoteAsset;
    this.reconnectPolicy = options.reconnectPolicy ?? createReconnectPolicy();
    this.staleTimeoutMs = options.staleTimeoutMs ?? config.stream.staleTimeoutMs;
    this.logger = options.logger ?? createLogger('underlying');
  }

  /**
   * Settles only after `stop()`
   */
  async trackPrices(assets: string[]): Promise<void> {
    if (this.stopped || this.connection) {
      return;
    }

    this.connection = new StreamConnection({
      label: assets.map(asset => `${asset}${this.quoteAsset}`).join(','),
      url: buildTradeStreamUrl(this.streamUrl, assets, this.quoteAsset),
      reconnectPolicy: this.reconnectPolicy,
      staleTimeoutMs: this.staleTimeoutMs,
      logger: this.logger,
      onMessage: message => this.handleMessage(message),
    });

    this.logger.info('Tracking underlying prices', { assets, quoteAsset: this.quoteAsset });
    await this.connection.run();
  }

  private handleMessage(message: unknown): void {
    if (!isTradeEnvelope(message)) {
      this.logger.debug('Ignored frame without a trade payload');
      return;
    }
    this.prices.upsert(message.data.s, message.data.p);
  }

  stop(): void {
    this.stopped = true;
    this.connection?.stop();
  }

  getHealthStatus(): StreamHealthStatus | null {
    return this.connection?.getHealthStatus() ?? null;
  }
}
