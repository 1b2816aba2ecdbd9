import { QuestDBConnection } from '../db/connection';
import { healthLogger, Logger } from '../utils/logger';
import { FeedHealthStatus, OptionSnapshotFeed } from './option-snapshot-feed';

type FeedStatusSource = Pick<OptionSnapshotFeed, 'getHealthStatus'>;
type DatabaseStatusSource = Pick<QuestDBConnection, 'getHealthStatus'>;

export interface SystemHealth {
  timestamp: Date;
  feed: FeedHealthStatus | null;
  database: {
    connected: boolean;
    lastSuccessfulQuery: Date | null;
    totalQueries: number;
    totalErrors: number;
    connectionAttempts: number;
    uptime: number;
  };
  system: {
    uptime: number;
    memoryUsage: NodeJS.MemoryUsage;
    cpuUsage: NodeJS.CpuUsage;
  };
}

export interface AlertThresholds {
  maxConsecutiveStreamFailures: number;
  maxDatabaseErrors: number;
  maxMemoryUsageMB: number;
  maxNoMessageMinutes: number;
  // A snapshot is overdue after this many intervals without one
  maxMissedSnapshotIntervals: number;
}

const DEFAULT_THRESHOLDS: AlertThresholds = {
  maxConsecutiveStreamFailures: 5,
  maxDatabaseErrors: 5,
  maxMemoryUsageMB: 500,
  maxNoMessageMinutes: 5,
  maxMissedSnapshotIntervals: 2,
};

export class HealthMonitor {
  private feed: FeedStatusSource | null = null;
  private dbConnection: DatabaseStatusSource | null = null;
  private startTime = Date.now();
  private monitoringInterval: NodeJS.Timeout | null = null;
  private readonly alertThresholds: AlertThresholds;
  private readonly clock: () => Date;

  constructor(
    private readonly logger: Logger = healthLogger,
    options: { thresholds?: Partial<AlertThresholds>; clock?: () => Date } = {}
  ) {
    this.alertThresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.clock = options.clock ?? (() => new Date());
  }

  setServices(feed: FeedStatusSource, dbConnection: DatabaseStatusSource): void {
    this.feed = feed;
    this.dbConnection = dbConnection;
  }

  startMonitoring(intervalMs = 60000): void {
    if (this.monitoringInterval) {
      this.logger.warn('Health monitoring already started');
      return;
    }

    this.logger.info('Starting health monitoring', { intervalMs });

    this.monitoringInterval = setInterval(() => {
      this.performHealthCheck();
    }, intervalMs);

    this.performHealthCheck();
  }

  stopMonitoring(): void {
    if (this.monitoringInterval) {
      clearInterval(this.monitoringInterval);
      this.monitoringInterval = null;
      this.logger.info('Health monitoring stopped');
    }
  }

  performHealthCheck(): string[] {
    const alerts = this.generateAlerts(this.getSystemHealth());

    if (alerts.length > 0) {
      this.logger.healthCheck('feed', 'unhealthy', { alerts });
    } else {
      this.logger.healthCheck('feed', 'healthy');
    }
    return alerts;
  }

  getSystemHealth(): SystemHealth {
    const dbHealth = this.dbConnection?.getHealthStatus() || {
      isConnected: false,
      lastSuccessfulQuery: null,
      totalQueries: 0,
      totalErrors: 0,
      connectionAttempts: 0,
      uptime: 0,
    };

    return {
      timestamp: this.clock(),
      feed: this.feed?.getHealthStatus() ?? null,
      database: {
        connected: dbHealth.isConnected,
        lastSuccessfulQuery: dbHealth.lastSuccessfulQuery,
        totalQueries: dbHealth.totalQueries,
        totalErrors: dbHealth.totalErrors,
        connectionAttempts: dbHealth.connectionAttempts,
        uptime: dbHealth.uptime,
      },
      system: {
        uptime: Date.now() - this.startTime,
        memoryUsage: process.memoryUsage(),
        cpuUsage: process.cpuUsage(),
      },
    };
  }

  generateAlerts(health: SystemHealth): string[] {
    const alerts: string[] = [];
    const now = health.timestamp.getTime();
    const feed = health.feed;

    if (!feed) {
      alerts.push('Feed is not running');
    } else {
      const streams = feed.underlyingStream ? [...feed.quoteGroups, feed.underlyingStream] : feed.quoteGroups;

      for (const stream of streams) {
        if (!stream.connected) {
          alerts.push(`Stream ${stream.label} is not connected`);
        }
        if (stream.consecutiveFailures > this.alertThresholds.maxConsecutiveStreamFailures) {
          alerts.push(`Stream ${stream.label} failed ${stream.consecutiveFailures} times in a row`);
        }
        if (stream.lastMessageReceived) {
          const minutesSinceLastMessage = (now - stream.lastMessageReceived.getTime()) / 60000;
          if (minutesSinceLastMessage > this.alertThresholds.maxNoMessageMinutes) {
            alerts.push(`No messages on ${stream.label} for ${minutesSinceLastMessage.toFixed(1)} minutes`);
          }
        }
      }

      if (feed.lastSnapshotAt) {
        const overdueAfter = feed.snapshotIntervalMs * this.alertThresholds.maxMissedSnapshotIntervals;
        if (now - feed.lastSnapshotAt.getTime() > overdueAfter) {
          alerts.push(`No snapshot since ${feed.lastSnapshotAt.toISOString()}`);
        }
      }
    }

    if (!health.database.connected) {
      alerts.push('Database is not connected');
    }

    if (health.database.totalErrors > this.alertThresholds.maxDatabaseErrors) {
      alerts.push(`Database has ${health.database.totalErrors} errors`);
    }

    const memoryUsageMB = health.system.memoryUsage.heapUsed / 1024 / 1024;
    if (memoryUsageMB > this.alertThresholds.maxMemoryUsageMB) {
      alerts.push(`High memory usage: ${memoryUsageMB.toFixed(2)}MB`);
    }

    return alerts;
  }

  getHealthSummary(): string {
    const health = this.getSystemHealth();
    const feed = health.feed;
    const groups = feed?.quoteGroups ?? [];
    const connectedGroups = groups.filter(group => group.connected).length;

    return `
System Health Summary:
- Quote streams: ${connectedGroups}/${groups.length} connected
- Underlying stream: ${feed?.underlyingStream?.connected ? 'Connected' : 'Disconnected'}
- Database: ${health.database.connected ? 'Connected' : 'Disconnected'}
- Universe: ${feed?.universeSize ?? 0} symbols, ${feed?.cachedQuotes ?? 0} cached quotes
- Last snapshot: ${feed?.lastSnapshot ? `#${feed.lastSnapshot.snapshotIndex}, saved ${feed.lastSnapshot.saved}` : 'none'}
- Uptime: ${Math.floor(health.system.uptime / 1000)}s
- Memory Usage: ${(health.system.memoryUsage.heapUsed / 1024 / 1024).toFixed(2)}MB
    `.trim();
  }

  isHealthy(): boolean {
    return this.generateAlerts(this.getSystemHealth()).length === 0;
  }
}

export const healthMonitor = new HealthMonitor();
