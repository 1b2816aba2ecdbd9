import { config, Config } from '../config';

/**
 * Decides how long a stream waits before reopening after its `attempt`-th
 * consecutive failure (1-based). `null` means stop reconnecting.
 */
export interface ReconnectPolicy {
  readonly name: string;
  nextDelay(attempt: number): number | null;
}

export class FixedDelayReconnectPolicy implements ReconnectPolicy {
  readonly name = 'fixed';

  constructor(private readonly delayMs: number) {}

  nextDelay(_attempt: number): number {
    return this.delayMs;
  }
}

export class ExponentialBackoffReconnectPolicy implements ReconnectPolicy {
  readonly name = 'exponential';

  constructor(
    private readonly baseDelayMs: number,
    private readonly maxDelayMs: number,
    private readonly maxAttempts: number = Infinity
  ) {}

  nextDelay(attempt: number): number | null {
    if (attempt > this.maxAttempts) {
      return null;
    }
    return Math.min(this.baseDelayMs * Math.pow(2, Math.max(attempt, 1) - 1), this.maxDelayMs);
  }
}

export function createReconnectPolicy(streamConfig: Config['stream'] = config.stream): ReconnectPolicy {
  if (streamConfig.reconnectStrategy === 'exponential') {
    return new ExponentialBackoffReconnectPolicy(streamConfig.reconnectDelayMs, streamConfig.maxReconnectDelayMs);
  }
  return new FixedDelayReconnectPolicy(streamConfig.reconnectDelayMs);
}
