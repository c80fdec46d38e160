/**
 * @file api.ts
 * @brief Helper functions for making specific Google Calendar API calls.
 *
 * @description
 * Both endpoints are read as a single page. `nextPageToken` is never followed,
 * so a calendar with more events in the window than one page holds is truncated.
 *
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { CalendarEvent, CalendarSource } from '../../types/schema';
import { DecodeError } from '../../types/errors';
import { DateRange } from '../../types';
import { devLog } from '../../features/logging';
import { toApiInstant } from '../../core/dates';
import { makeAuthenticatedRequest, RequestOptions } from './request';
import { fromGoogleCalendar, fromGoogleEvent } from './parser_gcal';
import { GooglePageSchema } from './typesGCal';

export type ApiContext = {
  baseUrl: string;
  timeoutMs?: number;
};

function readPage(data: unknown, url: string): unknown[] {
  const page = GooglePageSchema.safeParse(data);
  if (!page.success) {
    throw new DecodeError(
      `Unexpected response shape from ${url}`,
      page.error.issues.map(issue => issue.message)
    );
  }
  if (page.data.nextPageToken) {
    devLog('Response has more pages; only the first is read.', { url });
  }
  return page.data.items ?? [];
}

export async function fetchGoogleCalendarList(
  ctx: ApiContext,
  token: string
): Promise<CalendarSource[]> {
  const url = `${ctx.baseUrl}/users/me/calendarList`;
  const data = await makeAuthenticatedRequest(token, url, { timeoutMs: ctx.timeoutMs });

  const calendars: CalendarSource[] = [];
  for (const item of readPage(data, url)) {
    const calendar = fromGoogleCalendar(item);
    if (calendar) {
      calendars.push(calendar);
    } else {
      devLog('Skipping malformed calendar list entry.', item);
    }
  }
  return calendars;
}

export async function fetchGoogleEvents(
  ctx: ApiContext,
  token: string,
  calendarId: string,
  range: DateRange
): Promise<CalendarEvent[]> {
  const url = `${ctx.baseUrl}/calendars/${encodeURIComponent(calendarId)}/events`;
  const options: RequestOptions = {
    timeoutMs: ctx.timeoutMs,
    query: {
      timeMin: toApiInstant(range.start),
      timeMax: toApiInstant(range.end),
      singleEvents: 'true',
      orderBy: 'startTime'
    }
  };
  const data = await makeAuthenticatedRequest(token, url, options);

  const events: CalendarEvent[] = [];
  for (const item of readPage(data, url)) {
    const event = fromGoogleEvent(item, calendarId);
    if (event) {
      events.push(event);
    } else {
      devLog('Skipping cancelled or malformed event.', { calendarId, item });
    }
  }
  return events;
}

export function describeRange(range: DateRange): string {
  const fmt = (d: DateTime) => d.toISODate() ?? d.toString();
  return `${fmt(range.start)}..${fmt(range.end)}`;
}
