import { AccountKind, CalendarEvent, CalendarSource, DateRange } from '../types';

/**
 * Supplies bearer tokens for linked accounts. Linking and refresh live
 * outside the engine; implementations throw `AuthError` when no token can be had.
 */
export interface AccessTokenProvider {
  isLinked(account: AccountKind): boolean;
  getAccessToken(account: AccountKind): Promise<string>;
}

export interface RemoteCalendarClient {
  fetchCalendars(account: AccountKind): Promise<CalendarSource[]>;

  /**
   * Events of every calendar of `account` that intersect `range`, expanded to
   * single occurrences and sorted by start time. Pass `calendars` when the list
   * was just fetched to skip fetching it again.
   */
  fetchEvents(
    account: AccountKind,
    range: DateRange,
    calendars?: CalendarSource[]
  ): Promise<CalendarEvent[]>;
}
