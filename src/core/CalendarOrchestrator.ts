/**
 * @file CalendarOrchestrator.ts
 * @brief The façade the calendar views load and read events through.
 *
 * @description
 * For each linked account the orchestrator serves a range from the `EventCache`
 * when it can and fetches it otherwise, one task per account, publishing each
 * account's lists as soon as its own task finishes. Published state lives in an
 * immutable snapshot that is replaced, never mutated, and subscribers are told
 * after every replacement.
 *
 * @details
 * - Cache hits are published before any network call starts.
 * - A failure on one of two linked accounts is not an error state; both failing,
 *   or the only linked account failing, sets `errorMessage`.
 * - A failed account keeps whatever it had published before.
 * - Every `load` takes a generation number. Results of a superseded load still
 *   reach the cache but are not published.
 * - After a load that fetched without failures, neighbouring months are warmed
 *   in the background.
 *
 * @see EventCache.ts
 * @see modules/Preloader.ts
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { AccountKind, ACCOUNT_KINDS, CalendarEvent, CalendarSource } from '../types/schema';
import { DateRange } from '../types';
import { PlannerSettings } from '../types/settings';
import { describeError } from '../types/errors';
import { AccessTokenProvider, RemoteCalendarClient } from '../providers/Provider';
import { devLog, logWarn } from '../features/logging';
import EventCache, { cacheKey } from './EventCache';
import { NavigationDirection, Preloader } from './modules/Preloader';
import { compareEvents, monthRange, paddedDayRange, weekRange } from './dates';
import { groupEventsByDay } from './DayIndex';

export const BOTH_ACCOUNTS_FAILED_MESSAGE = 'Failed to load calendar data for both accounts';

export interface OrchestratorSnapshot {
  readonly personalEvents: readonly CalendarEvent[];
  readonly professionalEvents: readonly CalendarEvent[];
  readonly personalCalendars: readonly CalendarSource[];
  readonly professionalCalendars: readonly CalendarSource[];
  readonly isLoading: boolean;
  readonly errorMessage: string | null;
}

export type SnapshotListener = (snapshot: OrchestratorSnapshot) => void;

export interface LoadOptions {
  /** Restricts the load to these accounts; unlinked ones are ignored either way. */
  accounts?: AccountKind[];
  /** Skips the cache and fetches every account. */
  forceRefresh?: boolean;
}

export interface LoadResult {
  /** False when a newer load started before this one finished. */
  applied: boolean;
  fromCache: AccountKind[];
  fetched: AccountKind[];
  errors: Partial<Record<AccountKind, unknown>>;
}

export interface OrchestratorDeps {
  cache: EventCache;
  client: RemoteCalendarClient;
  tokens: AccessTokenProvider;
  preloader: Preloader;
  settings: Pick<PlannerSettings, 'dayFetchPaddingDays' | 'preloadAdjacentMonths'>;
  zone?: string;
}

const EMPTY_SNAPSHOT: OrchestratorSnapshot = Object.freeze({
  personalEvents: [],
  professionalEvents: [],
  personalCalendars: [],
  professionalCalendars: [],
  isLoading: false,
  errorMessage: null
});

/**
 * Builds the user-visible message for a round of per-account results.
 * Partial success is not an error.
 */
export function aggregateErrors(
  linked: AccountKind[],
  errors: Partial<Record<AccountKind, unknown>>
): string | null {
  const failed = linked.filter(account => errors[account] !== undefined);
  if (failed.length === 0) return null;
  if (linked.length > 1) {
    return failed.length === linked.length ? BOTH_ACCOUNTS_FAILED_MESSAGE : null;
  }
  return describeError(errors[failed[0]]);
}

/** Whether a load went to the network and every account came back. */
function isCleanFetch(result: LoadResult): boolean {
  return result.applied && result.fetched.length > 0 && Object.keys(result.errors).length === 0;
}

export class CalendarOrchestrator {
  private cache: EventCache;
  private client: RemoteCalendarClient;
  private tokens: AccessTokenProvider;
  private preloader: Preloader;
  private settings: OrchestratorDeps['settings'];
  private zone: string;

  private snapshot: OrchestratorSnapshot = EMPTY_SNAPSHOT;
  private listeners = new Set<SnapshotListener>();
  private byDay: Record<AccountKind, Map<string, CalendarEvent[]>> = {
    personal: new Map(),
    professional: new Map()
  };
  private generation = 0;
  private lastMonth: DateTime | null = null;
  private background = new Set<Promise<void>>();

  constructor(deps: OrchestratorDeps) {
    this.cache = deps.cache;
    this.client = deps.client;
    this.tokens = deps.tokens;
    this.preloader = deps.preloader;
    this.settings = deps.settings;
    this.zone = deps.zone ?? 'local';
  }

  // ====================================================================
  //                         PUBLISHED STATE
  // ====================================================================

  getSnapshot(): OrchestratorSnapshot {
    return this.snapshot;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** The only place published state changes. */
  private commit(patch: Partial<OrchestratorSnapshot>): void {
    this.snapshot = Object.freeze({ ...this.snapshot, ...patch });
    if (patch.personalEvents) {
      this.byDay.personal = groupEventsByDay([...patch.personalEvents], this.zone);
    }
    if (patch.professionalEvents) {
      this.byDay.professional = groupEventsByDay([...patch.professionalEvents], this.zone);
    }
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }

  private publishAccount(
    account: AccountKind,
    events: CalendarEvent[],
    calendars: CalendarSource[] | null
  ): void {
    this.commit(
      account === 'personal'
        ? {
            personalEvents: events,
            ...(calendars ? { personalCalendars: calendars } : {})
          }
        : {
            professionalEvents: events,
            ...(calendars ? { professionalCalendars: calendars } : {})
          }
    );
  }

  /**
   * Events shown on `date` for one account, or for both merged in
   * start order when `account` is omitted.
   */
  eventsFor(date: DateTime, account?: AccountKind): CalendarEvent[] {
    const key = date.setZone(this.zone).toISODate();
    if (!key) return [];
    if (account) {
      return this.byDay[account].get(key) ?? [];
    }
    const personal = this.byDay.personal.get(key) ?? [];
    const professional = this.byDay.professional.get(key) ?? [];
    if (personal.length === 0) return professional;
    if (professional.length === 0) return personal;
    return [...personal, ...professional].sort(compareEvents);
  }

  // ====================================================================
  //                         LOADING
  // ====================================================================

  private linkedAccounts(restrictTo?: AccountKind[]): AccountKind[] {
    return ACCOUNT_KINDS.filter(
      account => this.tokens.isLinked(account) && (!restrictTo || restrictTo.includes(account))
    );
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation;
  }

  async load(range: DateRange, options: LoadOptions = {}): Promise<LoadResult> {
    const result = await this.loadRange(range, options);
    if (isCleanFetch(result)) {
      this.runInBackground(() => this.preloader.warmAdjacent(range.start));
    }
    return result;
  }

  private async loadRange(range: DateRange, options: LoadOptions): Promise<LoadResult> {
    const generation = ++this.generation;
    const epoch = this.cache.epoch;
    const linked = this.linkedAccounts(options.accounts);
    const result: LoadResult = { applied: true, fromCache: [], fetched: [], errors: {} };

    const toFetch: AccountKind[] = [];
    for (const account of linked) {
      const key = cacheKey(account, range.start, range.end);
      const cached = options.forceRefresh ? null : await this.cache.get(key);
      if (!this.isCurrent(generation)) {
        return { ...result, applied: false };
      }
      if (cached) {
        this.publishAccount(account, cached, this.cache.getCalendars(key));
        result.fromCache.push(account);
      } else {
        toFetch.push(account);
      }
    }

    if (toFetch.length === 0) {
      devLog(`Served ${linked.join(', ') || 'no accounts'} from cache.`);
      if (this.snapshot.isLoading || this.snapshot.errorMessage !== null) {
        this.commit({ isLoading: false, errorMessage: null });
      }
      return result;
    }

    this.commit({ isLoading: true, errorMessage: null });

    await Promise.all(
      toFetch.map(async account => {
        const key = cacheKey(account, range.start, range.end);
        try {
          const calendars = await this.client.fetchCalendars(account);
          const events = await this.client.fetchEvents(account, range, calendars);
          this.cache.putCalendars(key, calendars, epoch);
          this.cache.put(key, events, epoch);
          result.fetched.push(account);
          if (this.isCurrent(generation)) {
            this.publishAccount(account, events, calendars);
          } else {
            devLog(`Discarded superseded ${account} results for ${key}.`);
          }
        } catch (e) {
          result.errors[account] = e;
          logWarn(`Loading ${account} calendar data failed: ${describeError(e)}`);
        }
      })
    );

    if (!this.isCurrent(generation)) {
      return { ...result, applied: false };
    }
    this.commit({ isLoading: false, errorMessage: aggregateErrors(linked, result.errors) });
    return result;
  }

  /** Loads the month containing `date` and warms in the direction of travel. */
  async loadMonth(date: DateTime, options: LoadOptions = {}): Promise<LoadResult> {
    const range = monthRange(date.setZone(this.zone));
    const direction = this.trackDirection(range.start);
    const result = await this.loadRange(range, options);
    if (isCleanFetch(result)) {
      this.runInBackground(() => this.preloader.warmAround(range.start, direction));
    }
    return result;
  }

  /** Loads the Monday-first week containing `date`. */
  loadWeek(date: DateTime, options: LoadOptions = {}): Promise<LoadResult> {
    return this.load(weekRange(date.setZone(this.zone)), options);
  }

  /** Loads `date` padded by `dayFetchPaddingDays` on both sides. */
  loadDay(date: DateTime, options: LoadOptions = {}): Promise<LoadResult> {
    return this.load(
      paddedDayRange(date.setZone(this.zone), this.settings.dayFetchPaddingDays),
      options
    );
  }

  private trackDirection(monthStart: DateTime): NavigationDirection {
    const previous = this.lastMonth;
    this.lastMonth = monthStart;
    if (!previous || previous.equals(monthStart)) return 0;
    return monthStart > previous ? 1 : -1;
  }

  private runInBackground(task: () => Promise<void>): void {
    if (!this.settings.preloadAdjacentMonths) return;
    const running: Promise<void> = task()
      .catch(e => {
        logWarn(`Background preload failed: ${describeError(e)}`);
      })
      .finally(() => {
        this.background.delete(running);
      });
    this.background.add(running);
  }

  /** Resolves once background preloads and queued cache writes have settled. */
  async whenIdle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
    await this.cache.flush();
  }

  // ====================================================================
  //                         INVALIDATION
  // ====================================================================

  invalidateMonth(date: DateTime): Promise<void> {
    return this.cache.invalidateMonth(date.setZone(this.zone));
  }

  /** Empties the cache and every published list; in-flight loads are discarded. */
  async clearAll(): Promise<void> {
    this.generation++;
    this.lastMonth = null;
    this.commit({ ...EMPTY_SNAPSHOT });
    await this.cache.clearAll();
  }
}
