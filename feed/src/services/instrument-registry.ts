import { AppError, ResultAsync } from '@optiontape/shared';
import { BinanceOptionsClient } from './binance-options-client';

export type UniverseSource = Pick<BinanceOptionsClient, 'fetchUniverse'>;

/**
 * The set of option symbols currently being tracked
 */
export class InstrumentRegistry {
  private symbols: string[] = [];
  private lookup = new Set<string>();

  constructor(private readonly source: UniverseSource) {}

  fetchUniverse(): ResultAsync<string[], AppError> {
    return this.source.fetchUniverse();
  }

  /**
   * Fetch and adopt the universe in one step; the current set is kept on failure
   */
  load(): ResultAsync<string[], AppError> {
    return this.fetchUniverse().map(symbols => {
      this.replace(symbols);
      return symbols;
    });
  }

  replace(symbols: string[]): void {
    this.symbols = [...symbols];
    this.lookup = new Set(symbols);
  }

  getSymbols(): string[] {
    return [...this.symbols];
  }

  has(symbol: string): boolean {
    return this.lookup.has(symbol);
  }

  get size(): number {
    return this.symbols.length;
  }
}
