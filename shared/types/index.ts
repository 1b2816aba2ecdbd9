// ============================================================================
// SHARED TYPES - Option symbols, quotes and snapshot rows
// ============================================================================

// ============================================================================
// OPTION SYMBOL TYPES
// ============================================================================

export type OptionSide = 'C' | 'P';

export interface ParsedOptionSymbol {
  symbol: string;
  underlying: string; // e.g. BTC
  expiration: string; // YYMMDD, as written in the symbol
  strike: string; // as written in the symbol
  side: OptionSide;
  expirationDate: Date; // 00:00 UTC of the expiration day
  strikePrice: number;
}

// ============================================================================
// QUOTE TYPES
// ============================================================================

/**
 * Latest 24h ticker state for one option contract.
 * Numeric fields stay as the exchange's decimal text.
 */
export interface OptionTicker {
  s: string; // option symbol
  e?: string; // event type
  E?: number; // event time (ms)
  T?: number; // transaction time (ms)
  o?: string; // open price
  h?: string; // high price
  l?: string; // low price
  c?: string; // last price
  V?: string; // volume in contracts
  A?: string; // volume in quote asset
  P?: string; // price change percent
  p?: string; // price change
  Q?: string; // last trade quantity
  n?: number | string; // trade count
  bo?: string; // best bid price
  ao?: string; // best ask price
  bq?: string; // best bid quantity
  aq?: string; // best ask quantity
  b?: string; // bid implied volatility
  a?: string; // ask implied volatility
  d?: string; // delta
  t?: string; // theta
  g?: string; // gamma
  v?: string; // vega
  vo?: string; // mark implied volatility
  mp?: string; // mark price
}

/** Last trade price per asset pair, e.g. `BTCUSDT` -> `"64012.10"`. */
export type UnderlyingPrices = ReadonlyMap<string, string>;

// ============================================================================
// SNAPSHOT TYPES
// ============================================================================

export interface OptionSnapshotRow {
  snapshot_index: number;
  timestamp: Date;
  symbol: string;
  underlying: string;
  expiration: string;
  strike: number;
  side: OptionSide;
  underlying_price: string;
  open_price: string;
  high_price: string;
  low_price: string;
  last_price: string;
  volume: string;
  quote_volume: string;
  trade_count: string;
  bid_price: string;
  ask_price: string;
  bid_qty: string;
  ask_qty: string;
  bid_iv: string;
  ask_iv: string;
  delta: string;
  theta: string;
  gamma: string;
  vega: string;
  mark_iv: string;
  mark_price: string;
}

export interface SnapshotPassSummary {
  snapshotIndex: number;
  collected: number;
  saved: number;
  dropped: number;
  unparsable: number;
  expired: number;
  illiquid: number;
}
