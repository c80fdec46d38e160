import { DateTime } from 'luxon';
import { CalendarEvent, CalendarSource, DateRange } from '../src/types';

export function timedEvent(
  id: string,
  start: string,
  end: string,
  overrides: Partial<CalendarEvent> = {}
): CalendarEvent {
  return {
    id,
    title: id,
    start: { dateTime: start },
    end: { dateTime: end },
    sourceCalendarId: 'primary',
    ...overrides
  };
}

export function allDayEvent(
  id: string,
  startDate: string,
  endDate: string,
  overrides: Partial<CalendarEvent> = {}
): CalendarEvent {
  return {
    id,
    title: id,
    start: { date: startDate },
    end: { date: endDate },
    sourceCalendarId: 'primary',
    ...overrides
  };
}

export function calendar(id: string, displayName: string = id): CalendarSource {
  return { id, displayName };
}

export function utc(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: 'UTC' });
}

export function utcRange(start: string, end: string): DateRange {
  return { start: utc(start), end: utc(end) };
}

/** A clock tests advance by hand. */
export class ManualClock {
  constructor(public current: number = 1_700_000_000_000) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}
