import { LatestValueCache } from '../../services/latest-value-cache';
import { buildTradeStreamUrl, UnderlyingPriceTracker } from '../../services/underlying-price-stream';
import { FixedDelayReconnectPolicy } from '../../utils/reconnect-policy';
import { FakeWebSocket } from '../test-utils/fake-websocket';
import { createSilentLogger, tradeFrame } from '../test-utils/fixtures';

jest.mock('ws', () => jest.requireActual('../test-utils/fake-websocket').FakeWebSocket);

const SPOT_URL = 'wss://spot.test/stream';

describe('buildTradeStreamUrl', () => {
  it('should build lowercase trade streams for each asset', () => {
    expect(buildTradeStreamUrl(SPOT_URL, ['BTC', 'ETH'], 'USDT')).toBe(
      'wss://spot.test/stream?streams=btcusdt@trade/ethusdt@trade'
    );
  });
});

describe('UnderlyingPriceTracker', () => {
  let prices: LatestValueCache<string>;
  let tracker: UnderlyingPriceTracker;

  beforeEach(() => {
    jest.useFakeTimers();
    FakeWebSocket.reset();
    prices = new LatestValueCache<string>();
    tracker = new UnderlyingPriceTracker(prices, {
      streamUrl: SPOT_URL,
      quoteAsset: 'USDT',
      reconnectPolicy: new FixedDelayReconnectPolicy(60000),
      staleTimeoutMs: 0,
      logger: createSilentLogger(),
    });
  });

  afterEach(() => {
    tracker.stop();
    jest.useRealTimers();
  });

  it('should store the last trade price per pair', () => {
    void tracker.trackPrices(['BTC', 'ETH']);
    const socket = FakeWebSocket.instances[0];
    socket.open();

    socket.receive(tradeFrame('BTCUSDT', '84000.10'));
    socket.receive(tradeFrame('ETHUSDT', '2200.5'));
    socket.receive(tradeFrame('BTCUSDT', '84010.00'));

    expect(prices.snapshotCopy()).toEqual(
      new Map([
        ['BTCUSDT', '84010.00'],
        ['ETHUSDT', '2200.5'],
      ])
    );
  });

  it('should ignore frames without a price', () => {
    void tracker.trackPrices(['BTC']);
    const socket = FakeWebSocket.instances[0];
    socket.open();

    socket.receive({ stream: 'btcusdt@trade', data: { s: 'BTCUSDT' } });

    expect(prices.size).toBe(0);
  });

  it('should keep the last known price across a reconnect', async () => {
    void tracker.trackPrices(['BTC']);
    const first = FakeWebSocket.instances[0];
    first.open();
    first.receive(tradeFrame('BTCUSDT', '84000'));

    first.drop();
    await jest.advanceTimersByTimeAsync(60000);

    expect(FakeWebSocket.instances).toHaveLength(2);
    expect(prices.get('BTCUSDT')).toBe('84000');
  });

  it('should settle trackPrices() after stop()', async () => {
    const tracking = tracker.trackPrices(['BTC']);
    FakeWebSocket.instances[0].open();

    tracker.stop();
    await tracking;

    expect(tracker.getHealthStatus()?.connected).toBe(false);
  });
});
