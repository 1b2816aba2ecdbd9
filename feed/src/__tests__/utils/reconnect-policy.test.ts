import {
  createReconnectPolicy,
  ExponentialBackoffReconnectPolicy,
  FixedDelayReconnectPolicy,
} from '../../utils/reconnect-policy';

describe('FixedDelayReconnectPolicy', () => {
  it('should wait the same delay forever', () => {
    const policy = new FixedDelayReconnectPolicy(60000);
    expect([1, 2, 50, 10000].map(attempt => policy.nextDelay(attempt))).toEqual([60000, 60000, 60000, 60000]);
  });
});

describe('ExponentialBackoffReconnectPolicy', () => {
  it('should double the delay up to the cap', () => {
    const policy = new ExponentialBackoffReconnectPolicy(1000, 5000);
    expect([1, 2, 3, 4, 5].map(attempt => policy.nextDelay(attempt))).toEqual([1000, 2000, 4000, 5000, 5000]);
  });

  it('should stop after the attempt limit', () => {
    const policy = new ExponentialBackoffReconnectPolicy(1000, 5000, 2);
    expect(policy.nextDelay(2)).toBe(2000);
    expect(policy.nextDelay(3)).toBeNull();
  });
});

describe('createReconnectPolicy', () => {
  it('should build the configured strategy', () => {
    const base = { reconnectDelayMs: 1000, maxReconnectDelayMs: 8000, staleTimeoutMs: 0 };

    expect(createReconnectPolicy({ ...base, reconnectStrategy: 'fixed' }).nextDelay(3)).toBe(1000);
    expect(createReconnectPolicy({ ...base, reconnectStrategy: 'exponential' }).nextDelay(3)).toBe(4000);
  });
});
