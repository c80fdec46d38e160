/**
 * @file parser_gcal.ts
 * @brief Converts Google Calendar API objects into the engine's event model.
 * @license See LICENSE.md
 */

import { CalendarEvent, CalendarSource, EventDateTime, validateEvent } from '../../types/schema';
import {
  GoogleCalendarListEntrySchema,
  GoogleEventSchema,
  GoogleEventLike,
  GoogleEventDateTimeSchema
} from './typesGCal';
import { z } from 'zod';

type GoogleEventDateTime = z.infer<typeof GoogleEventDateTimeSchema>;

function toEventDateTime(value: GoogleEventDateTime | undefined): EventDateTime | null {
  if (!value) return null;
  if (value.date) {
    return { date: value.date };
  }
  if (value.dateTime) {
    return value.timeZone
      ? { dateTime: value.dateTime, timeZone: value.timeZone }
      : { dateTime: value.dateTime };
  }
  return null;
}

/**
 * Parses one raw item from an events response.
 * Returns null for cancelled instances and items the event schema rejects.
 */
export function fromGoogleEvent(raw: unknown, calendarId: string): CalendarEvent | null {
  const parsed = GoogleEventSchema.safeParse(raw);
  if (!parsed.success) return null;
  const gEvent: GoogleEventLike = parsed.data;

  if (gEvent.status === 'cancelled') return null;

  const start = toEventDateTime(gEvent.start);
  if (!start) return null;
  // Google omits `end` only for malformed items; fall back to a zero-length event.
  const end = toEventDateTime(gEvent.end) ?? start;

  return validateEvent({
    id: gEvent.id,
    title: gEvent.summary ?? '',
    description: gEvent.description,
    location: gEvent.location,
    start,
    end,
    sourceCalendarId: calendarId,
    recurringInstanceId: gEvent.recurringEventId,
    recurrenceRules: gEvent.recurrence
  });
}

export function fromGoogleCalendar(raw: unknown): CalendarSource | null {
  const parsed = GoogleCalendarListEntrySchema.safeParse(raw);
  if (!parsed.success) return null;
  const entry = parsed.data;
  return {
    id: entry.id,
    displayName: entry.summaryOverride ?? entry.summary ?? entry.id,
    foregroundColor: entry.foregroundColor,
    backgroundColor: entry.backgroundColor,
    isPrimary: entry.primary
  };
}
