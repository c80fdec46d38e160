import { AccountKind, CalendarEvent, CalendarSource, DateRange } from '../src/types';
import { RemoteCalendarClient } from '../src/providers/Provider';
import { toCacheDate } from '../src/core/dates';

export type RecordedCall = {
  method: 'fetchCalendars' | 'fetchEvents';
  account: AccountKind;
  /** `yyyy-MM-dd..yyyy-MM-dd`, only for event fetches. */
  range?: string;
  /** Whether an event fetch was handed the calendar list. */
  withCalendars?: boolean;
};

/**
 * In-process stand-in for the remote API. Responses are set per account;
 * `hold` parks the next event fetch of an account until released.
 */
export class FakeCalendarClient implements RemoteCalendarClient {
  calls: RecordedCall[] = [];
  events: Partial<Record<AccountKind, CalendarEvent[]>> = {};
  calendars: Partial<Record<AccountKind, CalendarSource[]>> = {};
  /** Per-range overrides of `events`, keyed `${account} ${yyyy-MM-dd}..${yyyy-MM-dd}`. */
  rangeEvents: Record<string, CalendarEvent[]> = {};
  failures: Partial<Record<AccountKind, Error>> = {};
  private gates = new Map<AccountKind, Promise<void>>();

  eventCalls(account?: AccountKind): RecordedCall[] {
    return this.calls.filter(
      call => call.method === 'fetchEvents' && (!account || call.account === account)
    );
  }

  hold(account: AccountKind): () => void {
    let release: () => void = () => {};
    this.gates.set(
      account,
      new Promise<void>(resolve => {
        release = resolve;
      })
    );
    return () => release();
  }

  async fetchCalendars(account: AccountKind): Promise<CalendarSource[]> {
    this.calls.push({ method: 'fetchCalendars', account });
    const failure = this.failures[account];
    if (failure) throw failure;
    return this.calendars[account] ?? [];
  }

  async fetchEvents(
    account: AccountKind,
    range: DateRange,
    calendars?: CalendarSource[]
  ): Promise<CalendarEvent[]> {
    const span = `${toCacheDate(range.start)}..${toCacheDate(range.end)}`;
    this.calls.push({
      method: 'fetchEvents',
      account,
      range: span,
      withCalendars: calendars !== undefined
    });
    const gate = this.gates.get(account);
    if (gate) {
      this.gates.delete(account);
      await gate;
    }
    const failure = this.failures[account];
    if (failure) throw failure;
    return this.rangeEvents[`${account} ${span}`] ?? this.events[account] ?? [];
  }
}

/** Lets every pending promise continuation run. */
export function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
