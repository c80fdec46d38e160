import { z } from 'zod';

/**
 * Wire shapes of the Google Calendar v3 responses the engine reads.
 * Unmodelled fields pass through untouched.
 */
export const GoogleEventDateTimeSchema = z
  .object({
    date: z.string().optional(),
    dateTime: z.string().optional(),
    timeZone: z.string().optional()
  })
  .passthrough();

export const GoogleEventSchema = z
  .object({
    id: z.string(),
    status: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    location: z.string().optional(),
    start: GoogleEventDateTimeSchema.optional(),
    end: GoogleEventDateTimeSchema.optional(),
    recurringEventId: z.string().optional(),
    recurrence: z.array(z.string()).optional()
  })
  .passthrough();

export type GoogleEventLike = z.infer<typeof GoogleEventSchema>;

export const GoogleCalendarListEntrySchema = z
  .object({
    id: z.string(),
    summary: z.string().optional(),
    summaryOverride: z.string().optional(),
    primary: z.boolean().optional(),
    accessRole: z.string().optional(),
    backgroundColor: z.string().optional(),
    foregroundColor: z.string().optional()
  })
  .passthrough();

export type GoogleCalendarListEntry = z.infer<typeof GoogleCalendarListEntrySchema>;

// Items stay `unknown` here so one bad entry does not reject the whole page.
export const GooglePageSchema = z
  .object({
    items: z.array(z.unknown()).optional(),
    nextPageToken: z.string().optional()
  })
  .passthrough();
