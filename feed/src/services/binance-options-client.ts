import axios, { AxiosInstance } from 'axios';
import {
  AppError,
  emptyResultError,
  errAsync,
  okAsync,
  ResultAsync,
  safeCallAsync,
  transportError,
} from '@optiontape/shared';
import { config } from '../config';
import { BinanceOptionSymbolInfo, isExchangeInfoResponse, isOptionSymbolInfo } from '../types/binance';
import { createLogger, Logger } from '../utils/logger';

export const EXCHANGE_INFO_ENDPOINT = '/eapi/v1/exchangeInfo';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface BinanceOptionsClientOptions {
  http?: HttpClient;
  underlyings?: string[];
  quoteAsset?: string;
  logger?: Logger;
}

/**
 * Keep symbols whose underlying pair (e.g. ETHUSDT) is an allowed asset quoted
 * in `quoteAsset`. Exchange order is kept and repeats are dropped.
 */
export function selectOptionSymbols(
  optionSymbols: BinanceOptionSymbolInfo[],
  underlyings: string[],
  quoteAsset: string
): string[] {
  const allowed = new Set(underlyings.map(asset => asset.toUpperCase()));
  const quote = quoteAsset.toUpperCase();
  const seen = new Set<string>();
  const symbols: string[] = [];

  for (const info of optionSymbols) {
    const pair = info.underlying.toUpperCase();
    if (!pair.endsWith(quote)) {
      continue;
    }
    const asset = pair.slice(0, pair.length - quote.length);
    if (!allowed.has(asset) || seen.has(info.symbol)) {
      continue;
    }
    seen.add(info.symbol);
    symbols.push(info.symbol);
  }

  return symbols;
}

export class BinanceOptionsClient {
  private readonly http: HttpClient;
  private readonly underlyings: string[];
  private readonly quoteAsset: string;
  private readonly logger: Logger;

  constructor(options: BinanceOptionsClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: config.binance.optionsRestUrl,
        timeout: config.binance.requestTimeoutMs,
      });
    this.underlyings = options.underlyings ?? config.universe.underlyings;
    this.quoteAsset = options.quoteAsset ?? config.universe.quoteAsset;
    this.logger = options.logger ?? createLogger('registry');
  }

  /**
   * One exchangeInfo request, narrowed to the configured underlyings
   */
  fetchUniverse(): ResultAsync<string[], AppError> {
    return safeCallAsync(() => this.http.get<unknown>(EXCHANGE_INFO_ENDPOINT))
      .mapErr(error =>
        error.type === 'TRANSPORT_ERROR'
          ? error
          : transportError(`Failed to fetch exchange info: ${error.message}`, { cause: error.cause })
      )
      .andThen(response => {
        const body = response.data;
        if (!isExchangeInfoResponse(body)) {
          return errAsync<string[], AppError>(transportError('Exchange info response has no optionSymbols array'));
        }
        if (body.optionSymbols.length === 0) {
          return errAsync<string[], AppError>(emptyResultError('Exchange info returned no option symbols'));
        }

        const symbols = selectOptionSymbols(
          body.optionSymbols.filter(isOptionSymbolInfo),
          this.underlyings,
          this.quoteAsset
        );
        this.logger.info('Fetched option universe', {
          listed: body.optionSymbols.length,
          selected: symbols.length,
          underlyings: this.underlyings,
        });
        return okAsync<string[], AppError>(symbols);
      });
  }
}
