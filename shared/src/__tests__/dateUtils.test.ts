import { formatDailyTimeUtc, getNextDailyRun, msUntilNextDailyRun, parseDailyTimeUtc } from '@optiontape/shared';

describe('dateUtils', () => {
  describe('parseDailyTimeUtc', () => {
    it('should parse HH:MM', () => {
      expect(parseDailyTimeUtc('08:01')).toEqual({ hour: 8, minute: 1 });
      expect(parseDailyTimeUtc('8:01')).toEqual({ hour: 8, minute: 1 });
      expect(parseDailyTimeUtc(' 23:59 ')).toEqual({ hour: 23, minute: 59 });
    });

    it('should return null for malformed or out-of-range values', () => {
      expect(parseDailyTimeUtc('24:00')).toBeNull();
      expect(parseDailyTimeUtc('08:60')).toBeNull();
      expect(parseDailyTimeUtc('0801')).toBeNull();
      expect(parseDailyTimeUtc('')).toBeNull();
    });
  });

  describe('getNextDailyRun', () => {
    const refreshTime = { hour: 8, minute: 1 };

    it('should pick the same day when the time is still ahead', () => {
      const next = getNextDailyRun(new Date('2025-03-10T07:30:00.000Z'), refreshTime);
      expect(next.toISOString()).toBe('2025-03-10T08:01:00.000Z');
    });

    it('should pick the next day when the time has passed', () => {
      const next = getNextDailyRun(new Date('2025-03-10T09:00:00.000Z'), refreshTime);
      expect(next.toISOString()).toBe('2025-03-11T08:01:00.000Z');
    });

    it('should pick the next day when now is exactly the scheduled time', () => {
      const next = getNextDailyRun(new Date('2025-03-10T08:01:00.000Z'), refreshTime);
      expect(next.toISOString()).toBe('2025-03-11T08:01:00.000Z');
    });

    it('should roll over month ends', () => {
      const next = getNextDailyRun(new Date('2025-03-31T12:00:00.000Z'), refreshTime);
      expect(next.toISOString()).toBe('2025-04-01T08:01:00.000Z');
    });
  });

  describe('msUntilNextDailyRun', () => {
    it('should return the delay in milliseconds', () => {
      expect(msUntilNextDailyRun(new Date('2025-03-10T08:00:00.000Z'), { hour: 8, minute: 1 })).toBe(60000);
    });
  });

  describe('formatDailyTimeUtc', () => {
    it('should zero-pad both fields', () => {
      expect(formatDailyTimeUtc({ hour: 8, minute: 1 })).toBe('08:01 UTC');
    });
  });
});
