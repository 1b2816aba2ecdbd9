import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import {
  BinanceOptionsClient,
  EXCHANGE_INFO_ENDPOINT,
  selectOptionSymbols,
} from '../../services/binance-options-client';
import { InstrumentRegistry } from '../../services/instrument-registry';
import { createSilentLogger } from '../test-utils/fixtures';

function response<T>(data: T, status = 200): AxiosResponse<T> {
  return { data, status, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

const LISTED = [
  { symbol: 'BTC-250328-90000-C', underlying: 'BTCUSDT' },
  { symbol: 'DOGE-250328-1-C', underlying: 'DOGEUSDT' },
  { symbol: 'ETH-250328-2200-P', underlying: 'ETHUSDT' },
  { symbol: 'BTC-250328-90000-C', underlying: 'BTCUSDT' },
  { symbol: 'BTC-250328-80000-P', underlying: 'BTCUSDC' },
  { symbol: 'ETH-250404-2500-C', underlying: 'ETHUSDT' },
];

describe('selectOptionSymbols', () => {
  it('should keep allowed underlyings in exchange order without repeats', () => {
    expect(selectOptionSymbols(LISTED, ['BTC', 'ETH'], 'USDT')).toEqual([
      'BTC-250328-90000-C',
      'ETH-250328-2200-P',
      'ETH-250404-2500-C',
    ]);
  });

  it('should honour the configured quote asset', () => {
    expect(selectOptionSymbols(LISTED, ['BTC'], 'USDC')).toEqual(['BTC-250328-80000-P']);
  });
});

describe('BinanceOptionsClient', () => {
  let get: jest.Mock;
  let client: BinanceOptionsClient;

  beforeEach(() => {
    get = jest.fn();
    client = new BinanceOptionsClient({
      http: { get },
      underlyings: ['BTC', 'ETH'],
      quoteAsset: 'USDT',
      logger: createSilentLogger(),
    });
  });

  it('should fetch exchange info once and return the filtered universe', async () => {
    get.mockResolvedValue(response({ timezone: 'UTC', optionSymbols: LISTED }));

    const result = await client.fetchUniverse();

    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith(EXCHANGE_INFO_ENDPOINT);
    expect(result._unsafeUnwrap()).toEqual(['BTC-250328-90000-C', 'ETH-250328-2200-P', 'ETH-250404-2500-C']);
  });

  it('should skip malformed entries', async () => {
    get.mockResolvedValue(response({ optionSymbols: [{ symbol: 'BTC-250328-90000-C' }, LISTED[0]] }));

    const result = await client.fetchUniverse();

    expect(result._unsafeUnwrap()).toEqual(['BTC-250328-90000-C']);
  });

  it('should report an empty listing as an empty result', async () => {
    get.mockResolvedValue(response({ optionSymbols: [] }));

    const error = (await client.fetchUniverse())._unsafeUnwrapErr();

    expect(error.type).toBe('EMPTY_RESULT_ERROR');
    expect(error.message).toBe('Exchange info returned no option symbols');
  });

  it('should report a body without optionSymbols as a transport failure', async () => {
    get.mockResolvedValue(response({ code: -1, msg: 'unexpected' }));

    const error = (await client.fetchUniverse())._unsafeUnwrapErr();

    expect(error.type).toBe('TRANSPORT_ERROR');
    expect(error.message).toBe('Exchange info response has no optionSymbols array');
  });

  it('should report an HTTP failure as a transport failure', async () => {
    const unavailable = response({ msg: 'Service unavailable' }, 503);
    get.mockRejectedValue(
      new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', undefined, undefined, unavailable)
    );

    const error = (await client.fetchUniverse())._unsafeUnwrapErr();

    expect(error.type).toBe('TRANSPORT_ERROR');
    expect(error.message).toBe('HTTP 503: Service unavailable');
    expect(error.status).toBe(503);
  });

  it('should report any other failure as a transport failure', async () => {
    get.mockRejectedValue(new Error('boom'));

    const error = (await client.fetchUniverse())._unsafeUnwrapErr();

    expect(error.type).toBe('TRANSPORT_ERROR');
    expect(error.message).toBe('Failed to fetch exchange info: boom');
  });
});

describe('InstrumentRegistry', () => {
  let get: jest.Mock;
  let registry: InstrumentRegistry;

  beforeEach(() => {
    get = jest.fn();
    registry = new InstrumentRegistry(
      new BinanceOptionsClient({
        http: { get },
        underlyings: ['BTC', 'ETH'],
        quoteAsset: 'USDT',
        logger: createSilentLogger(),
      })
    );
  });

  it('should start empty', () => {
    expect(registry.size).toBe(0);
    expect(registry.getSymbols()).toEqual([]);
  });

  it('should adopt the fetched universe on load', async () => {
    get.mockResolvedValue(response({ optionSymbols: LISTED }));

    await registry.load();

    expect(registry.size).toBe(3);
    expect(registry.has('ETH-250328-2200-P')).toBe(true);
    expect(registry.has('DOGE-250328-1-C')).toBe(false);
  });

  it('should keep the previous universe when a load fails', async () => {
    registry.replace(['BTC-250328-90000-C']);
    get.mockRejectedValue(new Error('socket hang up'));

    const result = await registry.load();

    expect(result.isErr()).toBe(true);
    expect(registry.getSymbols()).toEqual(['BTC-250328-90000-C']);
  });

  it('should hand out copies of its symbol list', () => {
    registry.replace(['A-1']);
    registry.getSymbols().push('B-2');
    expect(registry.getSymbols()).toEqual(['A-1']);
  });
});
