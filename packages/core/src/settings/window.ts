import type { ReviewSettings, Weekday } from '../types/index.js';
import { VALID_WEEKDAYS, parseTimeOfDay } from './schema.js';
import { parseZonedTimestamp } from '../git/log.js';

/** ms per day */
const MS_PER_DAY = 86_400_000;

const DAYS_PER_WEEK = 7;

/**
 * Start of the review window.
 *
 * The last recorded review when there is one; otherwise the most recent
 * occurrence of the default weekday and time strictly before today, in the
 * local zone. `weeksBack` then widens the window by whole weeks.
 */
export function resolveReviewSince(
  settings: Pick<ReviewSettings, 'lastRun' | 'defaultWeekday' | 'defaultTime'>,
  now: Date = new Date(),
  weeksBack = 0,
): Date {
  const base =
    settings.lastRun !== null
      ? parseZonedTimestamp(settings.lastRun)
      : defaultSince(settings.defaultWeekday, settings.defaultTime, now);

  return new Date(base.getTime() - weeksBack * DAYS_PER_WEEK * MS_PER_DAY);
}

/**
 * Most recent past `weekday` at `time` (local), never today.
 */
export function defaultSince(weekday: Weekday, time: string, now: Date = new Date()): Date {
  const targetIndex = VALID_WEEKDAYS.indexOf(weekday);
  const { hours, minutes } = parseTimeOfDay(time) ?? { hours: 0, minutes: 0 };

  // Date#getDay counts from Sunday; VALID_WEEKDAYS starts on Monday.
  const todayIndex = (now.getDay() + 6) % DAYS_PER_WEEK;
  const daysSince = (todayIndex - (targetIndex === -1 ? 1 : targetIndex) + DAYS_PER_WEEK) % DAYS_PER_WEEK || DAYS_PER_WEEK;

  const target = new Date(now.getFullYear(), now.getMonth(), now.getDate() - daysSince, hours, minutes);
  if (target.getTime() > now.getTime()) {
    target.setDate(target.getDate() - DAYS_PER_WEEK);
  }
  return target;
}
