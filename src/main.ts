/**
 * @file main.ts
 * @brief Entry point that wires the planner's calendar engine together.
 *
 * @description
 * `PlannerEngine` owns one instance of every collaborator: the token provider,
 * the remote client, the two-tier cache, the preloader and the orchestrator. A
 * host constructs it from (partial) settings, feeds it access tokens and calls
 * the orchestrator's loaders. Any collaborator can be swapped through
 * `EngineDeps`, which is how tests run the whole engine without a network.
 *
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { AccountKind } from './types';
import { parseSettings, PlannerSettings, PlannerSettingsInput } from './types/settings';
import { setVerboseLogging, devLog } from './features/logging';
import { StaticTokenProvider } from './features/google_auth/StaticTokenProvider';
import { AccessTokenProvider, RemoteCalendarClient } from './providers/Provider';
import { GoogleCalendarClient } from './providers/google/GoogleCalendarClient';
import EventCache, { Clock } from './core/EventCache';
import { PersistentStore } from './core/persistence/PersistentStore';
import { FileCacheStore } from './core/persistence/FileCacheStore';
import { MemoryStore } from './core/persistence/MemoryStore';
import { Preloader } from './core/modules/Preloader';
import { CalendarOrchestrator } from './core/CalendarOrchestrator';
import { DayLayout, layoutDay } from './core/TimelineLayout';

export interface EngineDeps {
  tokens?: AccessTokenProvider;
  client?: RemoteCalendarClient;
  store?: PersistentStore;
  now?: Clock;
  /** IANA zone used for day boundaries; defaults to the system zone. */
  zone?: string;
}

export interface LayoutRequest {
  date: DateTime;
  columnWidth: number;
  now?: DateTime;
}

export default class PlannerEngine {
  readonly settings: PlannerSettings;
  readonly tokens: AccessTokenProvider;
  readonly client: RemoteCalendarClient;
  readonly cache: EventCache;
  readonly preloader: Preloader;
  readonly orchestrator: CalendarOrchestrator;
  private zone: string;
  private staticTokens: StaticTokenProvider | null = null;

  constructor(input: PlannerSettingsInput = {}, deps: EngineDeps = {}) {
    this.settings = parseSettings(input);
    setVerboseLogging(this.settings.verboseLogging);
    this.zone = deps.zone ?? 'local';

    if (deps.tokens) {
      this.tokens = deps.tokens;
    } else {
      this.staticTokens = new StaticTokenProvider(this.settings.accounts);
      this.tokens = this.staticTokens;
    }

    this.client =
      deps.client ??
      new GoogleCalendarClient(this.tokens, {
        baseUrl: this.settings.apiBaseUrl,
        timeoutMs: this.settings.requestTimeoutMs
      });

    const store =
      deps.store ??
      (this.settings.cacheDirectory
        ? new FileCacheStore(this.settings.cacheDirectory)
        : new MemoryStore());

    this.cache = new EventCache(store, {
      memoryTtlMs: this.settings.memoryTtlMs,
      persistentTtlMs: this.settings.persistentTtlMs,
      maxMemoryEntries: this.settings.maxMemoryEntries,
      now: deps.now
    });
    this.preloader = new Preloader(this.cache, this.client, this.tokens);
    this.orchestrator = new CalendarOrchestrator({
      cache: this.cache,
      client: this.client,
      tokens: this.tokens,
      preloader: this.preloader,
      settings: this.settings,
      zone: this.zone
    });
    devLog('Engine ready.');
  }

  /**
   * Links, relinks or (with `undefined`) unlinks an account. Unlinking clears
   * every cached and published event, since the cache is not partitioned by user.
   */
  async setAccessToken(account: AccountKind, token: string | null | undefined): Promise<void> {
    if (!this.staticTokens) {
      throw new Error('Tokens are supplied by a custom provider; update it directly.');
    }
    this.staticTokens.setToken(account, token);
    if (token === undefined) {
      await this.orchestrator.clearAll();
    }
  }

  /** Lays out the published events of both accounts for one day column. */
  layoutDay(request: LayoutRequest): DayLayout {
    const timeline = this.settings.timeline;
    const snapshot = this.orchestrator.getSnapshot();
    const personalIds = new Set(snapshot.personalEvents.map(event => event.id));
    return layoutDay(this.orchestrator.eventsFor(request.date), {
      date: request.date,
      columnWidth: request.columnWidth,
      now: request.now,
      zone: this.zone,
      hourHeight: timeline.hourHeight,
      baseHour: timeline.baseHour,
      minEventHeight: timeline.minEventHeight,
      columnGap: timeline.columnGap,
      allDayRowHeight: timeline.allDayRowHeight,
      allDayRowPadding: timeline.allDayRowPadding,
      personalEventIds: personalIds,
      visibleHours: { start: timeline.baseHour, end: timeline.endHour }
    });
  }
}
