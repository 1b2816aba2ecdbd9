import { HealthMonitor } from '../../services/health-monitor';
import { FeedHealthStatus } from '../../services/option-snapshot-feed';
import { StreamHealthStatus } from '../../services/stream-connection';
import { createSilentLogger } from '../test-utils/fixtures';

const NOW = new Date('2025-03-01T12:00:00.000Z');

function stream(label: string, overrides: Partial<StreamHealthStatus> = {}): StreamHealthStatus {
  return {
    label,
    connected: true,
    connectedSince: new Date('2025-03-01T11:00:00.000Z'),
    lastMessageReceived: new Date('2025-03-01T11:59:50.000Z'),
    totalMessages: 100,
    totalParseErrors: 0,
    totalErrors: 0,
    consecutiveFailures: 0,
    totalReconnects: 0,
    uptime: 3600000,
    ...overrides,
  };
}

function feedStatus(overrides: Partial<FeedHealthStatus> = {}): FeedHealthStatus {
  return {
    running: true,
    universeSize: 2,
    cachedQuotes: 2,
    trackedPrices: 2,
    quoteGroups: [stream('A-1 ... A-2 (total 2)')],
    underlyingStream: stream('BTCUSDT,ETHUSDT'),
    snapshotIndex: 12,
    lastSnapshotAt: new Date('2025-03-01T11:59:00.000Z'),
    lastSnapshot: { snapshotIndex: 12, collected: 2, saved: 2, dropped: 0, unparsable: 0, expired: 0, illiquid: 0 },
    totalPersistenceErrors: 0,
    snapshotIntervalMs: 60000,
    lastRefreshAt: null,
    ...overrides,
  };
}

const CONNECTED_DB = {
  isConnected: true,
  lastSuccessfulQuery: NOW,
  totalQueries: 10,
  totalErrors: 0,
  connectionAttempts: 1,
  uptime: 1000,
};

describe('HealthMonitor', () => {
  let monitor: HealthMonitor;
  let status: FeedHealthStatus;
  let database: typeof CONNECTED_DB;

  beforeEach(() => {
    status = feedStatus();
    database = { ...CONNECTED_DB };
    monitor = new HealthMonitor(createSilentLogger(), {
      thresholds: { maxMemoryUsageMB: Number.MAX_SAFE_INTEGER },
      clock: () => NOW,
    });
    monitor.setServices({ getHealthStatus: () => status }, { getHealthStatus: () => database });
  });

  afterEach(() => {
    monitor.stopMonitoring();
  });

  it('should raise no alerts for a healthy feed', () => {
    expect(monitor.performHealthCheck()).toEqual([]);
    expect(monitor.isHealthy()).toBe(true);
  });

  it('should flag disconnected, failing and silent streams', () => {
    status = feedStatus({
      quoteGroups: [
        stream('A-1 ... A-2 (total 2)', { connected: false, consecutiveFailures: 6 }),
        stream('B-1 ... B-2 (total 2)', { lastMessageReceived: new Date('2025-03-01T11:50:00.000Z') }),
      ],
    });

    expect(monitor.performHealthCheck()).toEqual([
      'Stream A-1 ... A-2 (total 2) is not connected',
      'Stream A-1 ... A-2 (total 2) failed 6 times in a row',
      'No messages on B-1 ... B-2 (total 2) for 10.0 minutes',
    ]);
  });

  it('should flag a snapshot loop that missed two intervals', () => {
    status = feedStatus({ lastSnapshotAt: new Date('2025-03-01T11:57:59.000Z') });

    expect(monitor.performHealthCheck()).toEqual(['No snapshot since 2025-03-01T11:57:59.000Z']);
  });

  it('should flag database problems', () => {
    database = { ...CONNECTED_DB, isConnected: false, totalErrors: 9 };

    expect(monitor.performHealthCheck()).toEqual(['Database is not connected', 'Database has 9 errors']);
    expect(monitor.isHealthy()).toBe(false);
  });

  it('should summarise the feed', () => {
    const summary = monitor.getHealthSummary();

    expect(summary.split('\n').slice(0, 6)).toEqual([
      'System Health Summary:',
      '- Quote streams: 1/1 connected',
      '- Underlying stream: Connected',
      '- Database: Connected',
      '- Universe: 2 symbols, 2 cached quotes',
      '- Last snapshot: #12, saved 2',
    ]);
  });
});
