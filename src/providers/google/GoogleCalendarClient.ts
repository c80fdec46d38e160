/**
 * @file GoogleCalendarClient.ts
 * @brief Fetches calendar lists and events for one linked account.
 *
 * @description
 * One instance serves every account; the account kind only selects which
 * token is attached. Event requests for the calendars of an account run in
 * parallel. A calendar whose request fails contributes no events, except for
 * auth failures, which fail the whole fetch since the token is shared.
 *
 * @see api.ts
 * @license See LICENSE.md
 */

import { AccountKind, CalendarEvent, CalendarSource, DateRange } from '../../types';
import { AuthError } from '../../types/errors';
import { compareByStart } from '../../core/dates';
import { devLog, logWarn } from '../../features/logging';
import { AccessTokenProvider, RemoteCalendarClient } from '../Provider';
import { ApiContext, describeRange, fetchGoogleCalendarList, fetchGoogleEvents } from './api';

export class GoogleCalendarClient implements RemoteCalendarClient {
  private tokens: AccessTokenProvider;
  private ctx: ApiContext;

  constructor(tokens: AccessTokenProvider, ctx: ApiContext) {
    this.tokens = tokens;
    this.ctx = ctx;
  }

  async fetchCalendars(account: AccountKind): Promise<CalendarSource[]> {
    const token = await this.tokens.getAccessToken(account);
    return fetchGoogleCalendarList(this.ctx, token);
  }

  async fetchEvents(
    account: AccountKind,
    range: DateRange,
    known?: CalendarSource[]
  ): Promise<CalendarEvent[]> {
    const calendars = known ?? (await this.fetchCalendars(account));
    const token = await this.tokens.getAccessToken(account);

    const results = await Promise.allSettled(
      calendars.map(calendar => fetchGoogleEvents(this.ctx, token, calendar.id, range))
    );

    const events: CalendarEvent[] = [];
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        events.push(...result.value);
        return;
      }
      if (result.reason instanceof AuthError) {
        throw result.reason;
      }
      logWarn(`Failed to load events for calendar "${calendars[i].displayName}".`, result.reason);
    });

    devLog(`Fetched ${events.length} ${account} events for ${describeRange(range)}.`);
    return events.sort(compareByStart);
  }
}
