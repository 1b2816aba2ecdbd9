import { OptionTicker } from '@optiontape/shared';
import { Logger } from '../../utils/logger';

export function makeTicker(symbol: string, overrides: Partial<OptionTicker> = {}): OptionTicker {
  return {
    s: symbol,
    o: '100',
    h: '120',
    l: '95',
    c: '110',
    V: '12.5',
    A: '1375',
    n: 7,
    bo: '108',
    ao: '112',
    bq: '3',
    aq: '4',
    b: '0.51',
    a: '0.55',
    d: '0.42',
    t: '-12.5',
    g: '0.0001',
    v: '30.2',
    vo: '0.53',
    mp: '110.5',
    ...overrides,
  };
}

export function tickerFrame(ticker: OptionTicker): { stream: string; data: OptionTicker } {
  return { stream: `${ticker.s}@ticker`, data: ticker };
}

export function tradeFrame(pair: string, price: string): { stream: string; data: { e: string; s: string; p: string } } {
  return { stream: `${pair.toLowerCase()}@trade`, data: { e: 'trade', s: pair, p: price } };
}

// Logger with every method replaced by a spy
export function createSilentLogger(): Logger {
  const logger = new Logger('test', 'DEBUG');
  jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  jest.spyOn(logger, 'info').mockImplementation(() => undefined);
  jest.spyOn(logger, 'debug').mockImplementation(() => undefined);
  jest.spyOn(logger, 'websocketEvent').mockImplementation(() => undefined);
  jest.spyOn(logger, 'databaseOperation').mockImplementation(() => undefined);
  jest.spyOn(logger, 'healthCheck').mockImplementation(() => undefined);
  return logger;
}
