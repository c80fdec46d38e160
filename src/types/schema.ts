/**
 * @file schema.ts
 * @brief Defines the Zod schemas and TypeScript types for calendar events and sources.
 *
 * @description
 * This file defines the canonical shape of a `CalendarEvent` and a `CalendarSource`
 * within the engine. The same schemas validate events parsed from the remote API
 * and payloads read back from the persistent cache tier, so every event in memory
 * conforms to one predictable model regardless of where it came from.
 *
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { z, ZodError } from 'zod';

export const ACCOUNT_KINDS = ['personal', 'professional'] as const;
export const AccountKindSchema = z.enum(ACCOUNT_KINDS);
export type AccountKind = z.infer<typeof AccountKindSchema>;

export const ParsedDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd');
// Left unchecked: an instant that does not parse is kept and sorts last.
export const ParsedInstant = z.string();

/**
 * Either an instant with an optional IANA zone, or a date-only value.
 * The date-only variant is what makes an event all-day.
 */
export const EventDateTimeSchema = z.union([
  z.object({ date: ParsedDate }).strict(),
  z.object({ dateTime: ParsedInstant, timeZone: z.string().optional() }).strict()
]);

export type EventDateTime = z.infer<typeof EventDateTimeSchema>;

export const CalendarEventSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().optional(),
  location: z.string().optional(),
  start: EventDateTimeSchema,
  end: EventDateTimeSchema,
  sourceCalendarId: z.string(),
  recurringInstanceId: z.string().optional(),
  recurrenceRules: z.array(z.string()).optional()
});

export type CalendarEvent = z.infer<typeof CalendarEventSchema>;

export const CalendarSourceSchema = z.object({
  id: z.string().min(1),
  displayName: z.string(),
  foregroundColor: z.string().optional(),
  backgroundColor: z.string().optional(),
  isPrimary: z.boolean().optional()
});

export type CalendarSource = z.infer<typeof CalendarSourceSchema>;

export const CalendarEventListSchema = z.array(CalendarEventSchema);

export function parseEvent(obj: unknown): CalendarEvent {
  return CalendarEventSchema.parse(obj);
}

export function validateEvent(obj: unknown): CalendarEvent | null {
  try {
    return parseEvent(obj);
  } catch (e) {
    if (e instanceof ZodError) {
      return null;
    }
    throw e;
  }
}

export function isAllDay(event: CalendarEvent): boolean {
  return 'date' in event.start;
}

/**
 * True for instances of a recurring series and for series masters.
 * Only looks at the linkage fields; this is not a recurrence expander.
 */
export function isLikelyRecurring(event: CalendarEvent): boolean {
  if (event.recurringInstanceId) return true;
  return (event.recurrenceRules?.length ?? 0) > 0;
}

/**
 * Resolves an `EventDateTime` to a luxon `DateTime`.
 * Date-only values resolve to the start of that day in `zone`; instants are
 * shifted into `zone` so wall-clock fields read in the consumer's calendar.
 */
export function resolveDateTime(value: EventDateTime, zone: string = 'local'): DateTime | null {
  const parsed =
    'date' in value
      ? DateTime.fromISO(value.date, { zone })
      : DateTime.fromISO(value.dateTime, { setZone: true }).setZone(zone);
  return parsed.isValid ? parsed : null;
}

export function eventStart(event: CalendarEvent, zone?: string): DateTime | null {
  return resolveDateTime(event.start, zone);
}

export function eventEnd(event: CalendarEvent, zone?: string): DateTime | null {
  return resolveDateTime(event.end, zone);
}
