import {
  isPastExpirationCutoff,
  OptionSnapshotRow,
  OptionTicker,
  ParsedOptionSymbol,
  parseOptionSymbol,
  UnderlyingPrices,
} from '@optiontape/shared';

export interface SnapshotFilterInput {
  snapshotIndex: number;
  quotes: ReadonlyMap<string, OptionTicker>;
  prices: UnderlyingPrices;
  now: Date;
  quoteAsset: string;
  cutoffHourUtc: number;
  // Row timestamps are read per row, at build time
  clock?: () => Date;
}

export interface SnapshotFilterResult {
  rows: OptionSnapshotRow[];
  collected: number;
  unparsable: number;
  expired: number;
  illiquid: number;
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isPositiveNumber(value: string | number | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value === 'string' && !DECIMAL_PATTERN.test(value.trim())) {
    return false;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0;
}

/**
 * Traded in the last 24h at a real price: volume and last price both positive
 */
export function isLiquid(ticker: OptionTicker): boolean {
  return isPositiveNumber(ticker.V) && isPositiveNumber(ticker.c);
}

function text(value: string | number | undefined): string {
  return value === undefined ? '' : String(value);
}

export function buildSnapshotRow(
  snapshotIndex: number,
  timestamp: Date,
  parsed: ParsedOptionSymbol,
  ticker: OptionTicker,
  underlyingPrice: string
): OptionSnapshotRow {
  return {
    snapshot_index: snapshotIndex,
    timestamp,
    symbol: parsed.symbol,
    underlying: parsed.underlying,
    expiration: parsed.expiration,
    strike: parsed.strikePrice,
    side: parsed.side,
    underlying_price: underlyingPrice,
    open_price: text(ticker.o),
    high_price: text(ticker.h),
    low_price: text(ticker.l),
    last_price: text(ticker.c),
    volume: text(ticker.V),
    quote_volume: text(ticker.A),
    trade_count: text(ticker.n),
    bid_price: text(ticker.bo),
    ask_price: text(ticker.ao),
    bid_qty: text(ticker.bq),
    ask_qty: text(ticker.aq),
    bid_iv: text(ticker.b),
    ask_iv: text(ticker.a),
    delta: text(ticker.d),
    theta: text(ticker.t),
    gamma: text(ticker.g),
    vega: text(ticker.v),
    mark_iv: text(ticker.vo),
    mark_price: text(ticker.mp),
  };
}

/**
 * Turn a copy of the quote cache into the rows of one snapshot pass.
 *
 * Entries are dropped, in this order, when the symbol does not parse, when the
 * contract is at or past its expiration cutoff, or when it has no volume or
 * last price. Each drop is counted under its reason.
 */
export function filterSnapshot(input: SnapshotFilterInput): SnapshotFilterResult {
  const clock = input.clock ?? (() => new Date());
  const result: SnapshotFilterResult = {
    rows: [],
    collected: input.quotes.size,
    unparsable: 0,
    expired: 0,
    illiquid: 0,
  };

  for (const [symbol, ticker] of input.quotes) {
    const parsed = parseOptionSymbol(symbol);
    if (parsed.isErr()) {
      result.unparsable++;
      continue;
    }
    if (isPastExpirationCutoff(parsed.value, input.now, input.cutoffHourUtc)) {
      result.expired++;
      continue;
    }
    if (!isLiquid(ticker)) {
      result.illiquid++;
      continue;
    }

    const underlyingPrice = input.prices.get(`${parsed.value.underlying}${input.quoteAsset}`) ?? '';
    result.rows.push(buildSnapshotRow(input.snapshotIndex, clock(), parsed.value, ticker, underlyingPrice));
  }

  return result;
}
