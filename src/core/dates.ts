/**
 * @file dates.ts
 * @brief Calendar arithmetic shared by the cache, the loaders and the layout.
 *
 * @description
 * Weeks start on Monday (luxon's ISO week). All helpers take an explicit zone so
 * tests can pin the calendar; callers in the app pass the consumer's local zone.
 *
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { CalendarEvent, eventEnd, eventStart } from '../types/schema';
import { DateRange } from '../types';

export function monthRange(date: DateTime): DateRange {
  const start = date.startOf('month');
  return { start, end: start.plus({ months: 1 }) };
}

export function weekRange(date: DateTime): DateRange {
  const start = date.startOf('week');
  return { start, end: start.plus({ days: 7 }) };
}

/** `date`'s day widened by `paddingDays` on each side. */
export function paddedDayRange(date: DateTime, paddingDays: number): DateRange {
  const day = date.startOf('day');
  return {
    start: day.minus({ days: paddingDays }),
    end: day.plus({ days: paddingDays + 1 })
  };
}

export function toCacheDate(date: DateTime): string {
  return date.toFormat('yyyy-MM-dd');
}

/** ISO instant without milliseconds, as the remote API expects for `timeMin`/`timeMax`. */
export function toApiInstant(date: DateTime): string {
  return date.toUTC().toISO({ suppressMilliseconds: true }) ?? '';
}

/**
 * Orders by start ascending. Events whose start does not resolve go last,
 * ordered by id among themselves.
 */
export function compareByStart(a: CalendarEvent, b: CalendarEvent): number {
  const aStart = eventStart(a)?.toMillis();
  const bStart = eventStart(b)?.toMillis();
  if (aStart === undefined || bStart === undefined) {
    if (aStart !== undefined) return -1;
    if (bStart !== undefined) return 1;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  }
  return aStart - bStart;
}

/** Start ascending, then end ascending; the per-day list order. */
export function compareEvents(a: CalendarEvent, b: CalendarEvent): number {
  const byStart = compareByStart(a, b);
  if (byStart !== 0) return byStart;
  const aEnd = eventEnd(a)?.toMillis() ?? Number.POSITIVE_INFINITY;
  const bEnd = eventEnd(b)?.toMillis() ?? Number.POSITIVE_INFINITY;
  if (aEnd === bEnd) return 0;
  return aEnd < bEnd ? -1 : 1;
}
