import { formatInTimeZone } from 'date-fns-tz';

/**
 * Calendar date (YYYY-MM-DD) of `now` in the given IANA time zone.
 */
export function todayInTimeZone(timeZone: string, now: Date = new Date()): string {
  return formatInTimeZone(now, timeZone, 'yyyy-MM-dd');
}
