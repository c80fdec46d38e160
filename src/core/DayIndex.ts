/**
 * @file DayIndex.ts
 * @brief Maps events onto the calendar days they cover.
 *
 * @description
 * All-day events cover `[start, end)` by date: an event on 2024-05-01 with end
 * 2024-05-03 shows on the 1st and 2nd. An end on or before the start still
 * shows on the start day. Timed events cover every day from their start to the
 * day of their last instant, so one ending exactly at midnight does not spill
 * onto the next day.
 *
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { CalendarEvent, eventEnd, eventStart, isAllDay } from '../types/schema';
import { compareEvents } from './dates';

type DaySpan = { first: DateTime; last: DateTime };

function daySpan(event: CalendarEvent, zone: string): DaySpan | null {
  const start = eventStart(event, zone);
  if (!start) return null;
  const end = eventEnd(event, zone) ?? start;
  const first = start.startOf('day');

  if (isAllDay(event)) {
    const exclusiveEnd = end.startOf('day');
    const last = exclusiveEnd > first ? exclusiveEnd.minus({ days: 1 }) : first;
    return { first, last };
  }
  const lastInstant = end > start ? end.minus({ milliseconds: 1 }) : start;
  return { first, last: lastInstant.startOf('day') };
}

export function occursOn(event: CalendarEvent, date: DateTime, zone: string = 'local'): boolean {
  const span = daySpan(event, zone);
  if (!span) return false;
  const day = date.setZone(zone).startOf('day');
  return day >= span.first && day <= span.last;
}

/** The events visible on `date`, in per-day order. */
export function eventsForDay(
  events: CalendarEvent[],
  date: DateTime,
  zone: string = 'local'
): CalendarEvent[] {
  return events.filter(event => occursOn(event, date, zone)).sort(compareEvents);
}

/** Buckets events by ISO date (`yyyy-MM-dd`) of every day they cover. */
export function groupEventsByDay(
  events: CalendarEvent[],
  zone: string = 'local'
): Map<string, CalendarEvent[]> {
  const byDay = new Map<string, CalendarEvent[]>();
  for (const event of events) {
    const span = daySpan(event, zone);
    if (!span) continue;
    for (let day = span.first; day <= span.last; day = day.plus({ days: 1 })) {
      const key = day.toISODate();
      if (!key) break;
      const bucket = byDay.get(key);
      if (bucket) {
        bucket.push(event);
      } else {
        byDay.set(key, [event]);
      }
    }
  }
  for (const bucket of byDay.values()) {
    bucket.sort(compareEvents);
  }
  return byDay;
}
