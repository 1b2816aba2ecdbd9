import dotenv from 'dotenv';
import { DailyTimeUtc, parseDailyTimeUtc } from '@optiontape/shared';

dotenv.config();

export type ReconnectStrategy = 'fixed' | 'exponential';

export interface Config {
  binance: {
    optionsRestUrl: string;
    optionsStreamUrl: string;
    spotStreamUrl: string;
    requestTimeoutMs: number;
  };
  universe: {
    underlyings: string[];
    quoteAsset: string;
    streamGroupSize: number;
  };
  stream: {
    reconnectStrategy: ReconnectStrategy;
    reconnectDelayMs: number;
    maxReconnectDelayMs: number;
    staleTimeoutMs: number;
  };
  schedule: {
    snapshotIntervalMs: number;
    metadataRefreshTime: DailyTimeUtc;
    expirationCutoffHourUtc: number;
  };
  questdb: {
    host: string;
    port: number;
    user: string;
    password: string;
    insertBatchSize: number;
  };
  app: {
    logLevel: string;
  };
}

type Env = Record<string, string | undefined>;

// Exchange limit on streams per combined connection
export const MAX_STREAMS_PER_CONNECTION = 200;

function parseList(value: string | undefined, fallback: string): string[] {
  return (value || fallback)
    .split(',')
    .map(item => item.trim().toUpperCase())
    .filter(item => item.length > 0);
}

export function validateConfig(env: Env): void {
  const problems: string[] = [];

  const groupSize = parseInt(env.STREAM_GROUP_SIZE || String(MAX_STREAMS_PER_CONNECTION), 10);
  if (isNaN(groupSize) || groupSize < 1 || groupSize > MAX_STREAMS_PER_CONNECTION) {
    problems.push(`STREAM_GROUP_SIZE must be between 1 and ${MAX_STREAMS_PER_CONNECTION}, got: ${env.STREAM_GROUP_SIZE}`);
  }

  const strategy = env.RECONNECT_STRATEGY || 'fixed';
  if (strategy !== 'fixed' && strategy !== 'exponential') {
    problems.push(`RECONNECT_STRATEGY must be "fixed" or "exponential", got: ${strategy}`);
  }

  const positiveIntegers = ['RECONNECT_DELAY_MS', 'MAX_RECONNECT_DELAY_MS', 'SNAPSHOT_INTERVAL_MS', 'QUESTDB_INSERT_BATCH_SIZE'];
  for (const key of positiveIntegers) {
    const raw = env[key];
    if (raw !== undefined && !(parseInt(raw, 10) > 0)) {
      problems.push(`${key} must be a positive integer, got: ${raw}`);
    }
  }

  const staleTimeout = env.STREAM_STALE_TIMEOUT_MS;
  if (staleTimeout !== undefined && !(parseInt(staleTimeout, 10) >= 0)) {
    problems.push(`STREAM_STALE_TIMEOUT_MS must be zero or a positive integer, got: ${staleTimeout}`);
  }

  if (!parseDailyTimeUtc(env.METADATA_REFRESH_TIME_UTC || '08:01')) {
    problems.push(`METADATA_REFRESH_TIME_UTC must be HH:MM, got: ${env.METADATA_REFRESH_TIME_UTC}`);
  }

  const cutoffHour = parseInt(env.EXPIRATION_CUTOFF_HOUR_UTC || '8', 10);
  if (isNaN(cutoffHour) || cutoffHour < 0 || cutoffHour > 23) {
    problems.push(`EXPIRATION_CUTOFF_HOUR_UTC must be between 0 and 23, got: ${env.EXPIRATION_CUTOFF_HOUR_UTC}`);
  }

  if (parseList(env.OPTION_UNDERLYINGS, 'BTC,ETH').length === 0) {
    problems.push('OPTION_UNDERLYINGS must name at least one asset');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
}

export function loadConfig(env: Env): Config {
  validateConfig(env);

  return {
    binance: {
      optionsRestUrl: env.BINANCE_OPTIONS_REST_URL || 'https://eapi.binance.com',
      optionsStreamUrl: env.BINANCE_OPTIONS_STREAM_URL || 'wss://nbstream.binance.com/eoptions/stream',
      spotStreamUrl: env.BINANCE_SPOT_STREAM_URL || 'wss://stream.binance.com:9443/stream',
      requestTimeoutMs: parseInt(env.BINANCE_REQUEST_TIMEOUT_MS || '30000', 10),
    },
    universe: {
      underlyings: parseList(env.OPTION_UNDERLYINGS, 'BTC,ETH'),
      quoteAsset: (env.OPTION_QUOTE_ASSET || 'USDT').trim().toUpperCase(),
      streamGroupSize: parseInt(env.STREAM_GROUP_SIZE || String(MAX_STREAMS_PER_CONNECTION), 10),
    },
    stream: {
      reconnectStrategy: env.RECONNECT_STRATEGY === 'exponential' ? 'exponential' : 'fixed',
      reconnectDelayMs: parseInt(env.RECONNECT_DELAY_MS || '60000', 10),
      maxReconnectDelayMs: parseInt(env.MAX_RECONNECT_DELAY_MS || '300000', 10),
      staleTimeoutMs: parseInt(env.STREAM_STALE_TIMEOUT_MS || '180000', 10),
    },
    schedule: {
      snapshotIntervalMs: parseInt(env.SNAPSHOT_INTERVAL_MS || '60000', 10),
      metadataRefreshTime: parseDailyTimeUtc(env.METADATA_REFRESH_TIME_UTC || '08:01') ?? { hour: 8, minute: 1 },
      expirationCutoffHourUtc: parseInt(env.EXPIRATION_CUTOFF_HOUR_UTC || '8', 10),
    },
    questdb: {
      host: env.QUESTDB_HOST || '127.0.0.1',
      port: parseInt(env.QUESTDB_PORT || '9000', 10),
      user: env.QUESTDB_USER || 'admin',
      password: env.QUESTDB_PASSWORD || 'quest',
      insertBatchSize: parseInt(env.QUESTDB_INSERT_BATCH_SIZE || '50', 10),
    },
    app: {
      logLevel: env.LOG_LEVEL || 'info',
    },
  };
}

// Validated on import
export const config: Config = loadConfig(process.env);
