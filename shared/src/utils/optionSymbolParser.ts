/**
 * Utility functions for parsing Binance option symbols
 * Handles formats like: BTC-250328-90000-C
 */

import { Result, ok, err } from 'neverthrow';
import { AppError, parseFailure } from '../../utils/errorHandler';
import { OptionSide, ParsedOptionSymbol } from '../../types';

export const OPTION_SYMBOL_DELIMITER = '-';

const EXPIRATION_PATTERN = /^\d{6}$/;
const STRIKE_PATTERN = /^\d+(\.\d+)?$/;

function isOptionSide(value: string): value is OptionSide {
  return value === 'C' || value === 'P';
}

/**
 * Parse an option symbol into underlying, expiration, strike and side
 *
 * Format: BTC-250328-90000-C
 * - BTC: underlying asset
 * - 250328: expiration date (YYMMDD, UTC)
 * - 90000: strike price
 * - C: option side (C for call, P for put)
 *
 * Exactly four delimiter-separated parts are accepted.
 */
export function parseOptionSymbol(symbol: string): Result<ParsedOptionSymbol, AppError> {
  const parts = symbol.split(OPTION_SYMBOL_DELIMITER);
  if (parts.length !== 4) {
    return err(parseFailure(`Expected 4 parts in option symbol ${symbol}, got ${parts.length}`));
  }

  const [underlying, expiration, strike, side] = parts;

  if (underlying.length === 0) {
    return err(parseFailure(`Missing underlying in option symbol ${symbol}`));
  }

  const expirationDate = parseExpirationDate(expiration);
  if (!expirationDate) {
    return err(parseFailure(`Invalid expiration date in option symbol ${symbol}`));
  }

  const strikePrice = Number(strike);
  if (!STRIKE_PATTERN.test(strike) || !(strikePrice > 0)) {
    return err(parseFailure(`Invalid strike in option symbol ${symbol}`));
  }

  if (!isOptionSide(side)) {
    return err(parseFailure(`Invalid side in option symbol ${symbol}`));
  }

  return ok({ symbol, underlying, expiration, strike, side, expirationDate, strikePrice });
}

/**
 * Parse a YYMMDD string into 00:00 UTC of that day, or null for impossible dates
 */
export function parseExpirationDate(expiration: string): Date | null {
  if (!EXPIRATION_PATTERN.test(expiration)) {
    return null;
  }

  const year = 2000 + parseInt(expiration.substring(0, 2), 10);
  const month = parseInt(expiration.substring(2, 4), 10);
  const day = parseInt(expiration.substring(4, 6), 10);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function formatOptionSymbol(parsed: Pick<ParsedOptionSymbol, 'underlying' | 'expiration' | 'strike' | 'side'>): string {
  return [parsed.underlying, parsed.expiration, parsed.strike, parsed.side].join(OPTION_SYMBOL_DELIMITER);
}

/**
 * The moment a contract stops being collected: its expiration day at `cutoffHourUtc`:00 UTC
 */
export function getExpirationCutoff(parsed: Pick<ParsedOptionSymbol, 'expirationDate'>, cutoffHourUtc: number): Date {
  const cutoff = new Date(parsed.expirationDate.getTime());
  cutoff.setUTCHours(cutoffHourUtc, 0, 0, 0);
  return cutoff;
}

/**
 * A contract whose cutoff is at or before `now` is expired
 */
export function isPastExpirationCutoff(
  parsed: Pick<ParsedOptionSymbol, 'expirationDate'>,
  now: Date,
  cutoffHourUtc: number
): boolean {
  return getExpirationCutoff(parsed, cutoffHourUtc).getTime() <= now.getTime();
}
