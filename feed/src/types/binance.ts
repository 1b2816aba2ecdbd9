// Binance European options API types
import { OptionTicker } from '@optiontape/shared';

export interface BinanceOptionSymbolInfo {
  symbol: string; // e.g. ETH-250301-2200-C
  underlying: string; // e.g. ETHUSDT
  side?: 'CALL' | 'PUT';
  strikePrice?: string;
  expiryDate?: number; // ms
  unit?: number;
  priceScale?: number;
  quantityScale?: number;
  makerFeeRate?: string;
  takerFeeRate?: string;
}

export interface BinanceExchangeInfoResponse {
  timezone?: string;
  serverTime?: number;
  optionSymbols?: BinanceOptionSymbolInfo[];
}

// Combined stream frame: /stream?streams=a/b/c
export interface BinanceStreamEnvelope<T> {
  stream: string;
  data: T;
}

export type BinanceTickerEnvelope = BinanceStreamEnvelope<OptionTicker>;

export interface BinanceTradeEvent {
  e?: string; // "trade"
  E?: number; // event time (ms)
  s: string; // asset pair, e.g. BTCUSDT
  p: string; // price
  q?: string; // quantity
  T?: number; // trade time (ms)
}

export type BinanceTradeEnvelope = BinanceStreamEnvelope<BinanceTradeEvent>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isTickerEnvelope(value: unknown): value is BinanceTickerEnvelope {
  return isRecord(value) && isRecord(value.data) && typeof value.data.s === 'string' && value.data.s.length > 0;
}

export function isTradeEnvelope(value: unknown): value is BinanceTradeEnvelope {
  return (
    isRecord(value) &&
    isRecord(value.data) &&
    typeof value.data.s === 'string' &&
    value.data.s.length > 0 &&
    typeof value.data.p === 'string' &&
    value.data.p.length > 0
  );
}

export function isExchangeInfoResponse(value: unknown): value is { optionSymbols: unknown[] } {
  return isRecord(value) && Array.isArray(value.optionSymbols);
}

export function isOptionSymbolInfo(value: unknown): value is BinanceOptionSymbolInfo {
  return isRecord(value) && typeof value.symbol === 'string' && typeof value.underlying === 'string';
}
