import { subHours } from 'date-fns';
import {
  addCalendarDays,
  calendarDateIn,
  calendarDaysBetween,
  formatCalendarDate,
  mondayOf,
  parseDateParam,
  zonedStartOfDay,
  type CalendarDate,
} from '@/utils/date';
import { InvalidInputError } from '@/utils/error';

export type Granularity = 'overall' | 'weekly' | 'daily';

/** Half-open interval [start, end) plus the calendar days it covers in `timeZone`. */
export interface AggregationWindow {
  granularity: Granularity;
  start: Date;
  end: Date;
  timeZone: string;
  firstDay: CalendarDate;
  lastDay: CalendarDate; // inclusive
}

export const DEFAULT_OVERALL_DAYS = 30;
export const MAX_OVERALL_DAYS = 90;

/** Trailing `days` × 24h ending at `now`. `days` is clamped to [1, 90]. */
export function overallWindow(now: Date, days: number, timeZone: string): AggregationWindow {
  const span = Number.isFinite(days) ? Math.min(Math.max(Math.floor(days), 1), MAX_OVERALL_DAYS) : DEFAULT_OVERALL_DAYS;
  const start = subHours(now, span * 24);
  return {
    granularity: 'overall',
    start,
    end: now,
    timeZone,
    firstDay: calendarDateIn(start, timeZone),
    lastDay: calendarDateIn(new Date(now.getTime() - 1), timeZone),
  };
}

/**
 * A Monday-start week. `start`/`end` are YYYY-MM-DD with `end` inclusive and must
 * lie in the same week; missing values default to that week's Monday/Sunday
 * (the current week when both are missing).
 */
export function weeklyWindow(
  params: { start?: string | null; end?: string | null },
  now: Date,
  timeZone: string
): AggregationWindow {
  const startDay = params.start
    ? parseDateParam(params.start, 'start')
    : mondayOf(params.end ? parseDateParam(params.end, 'end') : calendarDateIn(now, timeZone));
  const monday = mondayOf(startDay);
  const endDay = params.end ? parseDateParam(params.end, 'end') : addCalendarDays(monday, 6);

  if (calendarDaysBetween(startDay, endDay) < 0) {
    throw new InvalidInputError(`end (${formatCalendarDate(endDay)}) is before start (${formatCalendarDate(startDay)})`);
  }
  if (calendarDaysBetween(monday, endDay) > 6) {
    throw new InvalidInputError('start and end must fall in the same Monday-start week');
  }

  return {
    granularity: 'weekly',
    start: zonedStartOfDay(startDay, timeZone),
    end: zonedStartOfDay(addCalendarDays(endDay, 1), timeZone),
    timeZone,
    firstDay: startDay,
    lastDay: endDay,
  };
}

/** One calendar day in `timeZone`; defaults to today. */
export function dailyWindow(date: string | null | undefined, now: Date, timeZone: string): AggregationWindow {
  const day = date ? parseDateParam(date, 'date') : calendarDateIn(now, timeZone);
  return {
    granularity: 'daily',
    start: zonedStartOfDay(day, timeZone),
    end: zonedStartOfDay(addCalendarDays(day, 1), timeZone),
    timeZone,
    firstDay: day,
    lastDay: day,
  };
}

export function inWindow(timestamp: Date, window: { start: Date; end: Date }): boolean {
  const t = timestamp.getTime();
  return t >= window.start.getTime() && t < window.end.getTime();
}
