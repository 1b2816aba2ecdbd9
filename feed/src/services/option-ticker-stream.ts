import { config } from '../config';
import { isTickerEnvelope } from '../types/binance';
import { createLogger, Logger } from '../utils/logger';
import { createReconnectPolicy, ReconnectPolicy } from '../utils/reconnect-policy';
import { QuoteCache } from './latest-value-cache';
import { StreamConnection, StreamHealthStatus } from './stream-connection';

export interface QuoteStreamManagerOptions {
  streamUrl?: string;
  groupSize?: number;
  reconnectPolicy?: ReconnectPolicy;
  staleTimeoutMs?: number;
  logger?: Logger;
}

interface StreamGroup {
  symbols: string[];
  connection: StreamConnection;
}

/**
 * Split symbols into consecutive groups of at most `size`, keeping order
 */
export function chunkSymbols(symbols: string[], size: number): string[][] {
  const groups: string[][] = [];
  for (let start = 0; start < symbols.length; start += size) {
    groups.push(symbols.slice(start, start + size));
  }
  return groups;
}

export function buildTickerStreamUrl(baseUrl: string, symbols: string[]): string {
  return `${baseUrl}?streams=${symbols.map(symbol => `${symbol}@ticker`).join('/')}`;
}

// e.g. "BTC-250328-90000-C ... ETH-250328-4000-P (total 200)"
export function describeGroup(symbols: string[]): string {
  if (symbols.length === 0) {
    return '(empty)';
  }
  return `${symbols[0]} ... ${symbols[symbols.length - 1]} (total ${symbols.length})`;
}

/**
 * Keeps the quote cache fed from the exchange's 24hr ticker streams.
 *
 * The universe is spread over several combined-stream sockets, each carrying
 * at most `groupSize` symbols. Every socket reconnects on its own; one group
 * failing never touches the others.
 */
export class QuoteStreamManager {
  private readonly streamUrl: string;
  private readonly groupSize: number;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly staleTimeoutMs: number;
  private readonly logger: Logger;

  private readonly groups = new Map<string, StreamGroup>();
  private readonly tasks = new Set<Promise<void>>();
  private stopped = false;
  private resolveStopped: () => void = () => undefined;
  private readonly stoppedSignal = new Promise<void>(resolve => {
    this.resolveStopped = resolve;
  });

  constructor(
    private readonly cache: QuoteCache,
    options: QuoteStreamManagerOptions = {}
  ) {
    this.streamUrl = options.streamUrl ?? config.binance.optionsStreamUrl;
    this.groupSize = options.groupSize ?? config.universe.streamGroupSize;
    this.reconnectPolicy = options.reconnectPolicy ?? createReconnectPolicy();
    this.staleTimeoutMs = options.staleTimeoutMs ?? config.stream.staleTimeoutMs;
    this.logger = options.logger ?? createLogger('quote-stream');
  }

  /**
   * Stream every symbol. Settles once `stop()` has been called and every
   * group's socket task has ended.
   */
  async subscribe(symbols: string[]): Promise<void> {
    this.updateUniverse(symbols);
    await this.stoppedSignal;

    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  /**
   * Regroup for a new universe. Groups whose symbol list is unchanged keep
   * their socket; the rest are stopped and replaced.
   */
  updateUniverse(symbols: string[]): void {
    if (this.stopped) {
      return;
    }

    const wanted = new Map<string, string[]>();
    for (const group of chunkSymbols(symbols, this.groupSize)) {
      wanted.set(group.join('/'), group);
    }

    let stoppedGroups = 0;
    for (const [key, group] of this.groups) {
      if (!wanted.has(key)) {
        group.connection.stop();
        this.groups.delete(key);
        stoppedGroups++;
      }
    }

    let startedGroups = 0;
    for (const [key, groupSymbols] of wanted) {
      if (!this.groups.has(key)) {
        this.startGroup(key, groupSymbols);
        startedGroups++;
      }
    }

    this.logger.info('Quote stream groups updated', {
      symbols: symbols.length,
      groups: this.groups.size,
      started: startedGroups,
      stopped: stoppedGroups,
    });
  }

  private startGroup(key: string, symbols: string[]): void {
    const connection = new StreamConnection({
      label: describeGroup(symbols),
      url: buildTickerStreamUrl(this.streamUrl, symbols),
      reconnectPolicy: this.reconnectPolicy,
      staleTimeoutMs: this.staleTimeoutMs,
      logger: this.logger,
      onMessage: message => this.handleMessage(message),
    });
    this.groups.set(key, { symbols, connection });

    const task = connection
      .run()
      .catch((error: unknown) => {
        this.logger.error(
          'Quote stream group task failed',
          { group: connection.label },
          error instanceof Error ? error : new Error(String(error))
        );
      })
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  private handleMessage(message: unknown): void {
    if (!isTickerEnvelope(message)) {
      this.logger.debug('Ignored frame without a ticker payload');
      return;
    }
    this.cache.upsert(message.data.s, message.data);
  }

  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    for (const group of this.groups.values()) {
      group.connection.stop();
    }
    this.groups.clear();
    this.resolveStopped();
  }

  getGroupSymbols(): string[][] {
    return [...this.groups.values()].map(group => [...group.symbols]);
  }

  getHealthStatus(): StreamHealthStatus[] {
    return [...this.groups.values()].map(group => group.connection.getHealthStatus());
  }
}
