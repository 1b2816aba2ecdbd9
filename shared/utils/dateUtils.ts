/**
 * Wall-clock schedule helpers shared by the daily jobs
 */

export interface DailyTimeUtc {
  hour: number;
  minute: number;
}

/**
 * Parse `HH:MM` (24h, UTC) into a DailyTimeUtc, or null when malformed
 */
export function parseDailyTimeUtc(value: string): DailyTimeUtc | null {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    return null;
  }

  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return { hour, minute };
}

/**
 * Next occurrence of `time` strictly after `now`
 */
export function getNextDailyRun(now: Date, time: DailyTimeUtc): Date {
  const target = new Date(now.getTime());
  target.setUTCHours(time.hour, time.minute, 0, 0);
  if (target.getTime() <= now.getTime()) {
    target.setUTCDate(target.getUTCDate() + 1);
  }
  return target;
}

export function msUntilNextDailyRun(now: Date, time: DailyTimeUtc): number {
  return getNextDailyRun(now, time).getTime() - now.getTime();
}

export function formatDailyTimeUtc(time: DailyTimeUtc): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')} UTC`;
}
