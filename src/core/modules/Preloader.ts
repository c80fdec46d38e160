/**
 * @file Preloader.ts
 * @brief Warms the event cache for months around the one being viewed.
 *
 * @description
 * This class is an internal module of the CalendarOrchestrator. It fetches the
 * neighbouring months of each linked account straight into the `EventCache`
 * and never touches published state, so a warm-up can finish in any order
 * without disturbing what the user sees. Keys that already hit the cache cost
 * no network call, and a month already being warmed is not fetched twice.
 *
 * @see EventCache.ts
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { AccountKind, ACCOUNT_KINDS } from '../../types/schema';
import { AccessTokenProvider, RemoteCalendarClient } from '../../providers/Provider';
import { describeError } from '../../types/errors';
import { devLog, logWarn } from '../../features/logging';
import EventCache, { monthCacheKey } from '../EventCache';
import { monthRange } from '../dates';

/** -1 moving back in time, 1 moving forward, 0 no known direction. */
export type NavigationDirection = -1 | 0 | 1;

export class Preloader {
  private cache: EventCache;
  private client: RemoteCalendarClient;
  private tokens: AccessTokenProvider;
  private inflight = new Map<string, Promise<void>>();

  constructor(cache: EventCache, client: RemoteCalendarClient, tokens: AccessTokenProvider) {
    this.cache = cache;
    this.client = client;
    this.tokens = tokens;
  }

  /** Warms the months immediately before and after the month of `pivot`, in parallel. */
  async warmAdjacent(pivot: DateTime): Promise<void> {
    await Promise.all([
      this.warmMonth(pivot.minus({ months: 1 })),
      this.warmMonth(pivot.plus({ months: 1 }))
    ]);
  }

  /**
   * Warms in the direction of travel first: two months ahead, then one behind.
   * Without a direction this is `warmAdjacent`.
   */
  async warmAround(pivot: DateTime, direction: NavigationDirection): Promise<void> {
    if (direction === 0) {
      return this.warmAdjacent(pivot);
    }
    await this.warmMonth(pivot.plus({ months: direction }));
    await this.warmMonth(pivot.plus({ months: 2 * direction }));
    await this.warmMonth(pivot.minus({ months: direction }));
  }

  /** Fetches the month containing `date` for every linked account whose entry misses. */
  async warmMonth(date: DateTime): Promise<void> {
    const linked = ACCOUNT_KINDS.filter(account => this.tokens.isLinked(account));
    await Promise.all(linked.map(account => this.warmAccountMonth(account, date)));
  }

  private async warmAccountMonth(account: AccountKind, date: DateTime): Promise<void> {
    const key = monthCacheKey(account, date);
    if (this.cache.isValid(key)) return;
    const running = this.inflight.get(key);
    if (running) return running;

    const task = this.fetchIfMissing(account, date, key).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, task);
    return task;
  }

  private async fetchIfMissing(account: AccountKind, date: DateTime, key: string): Promise<void> {
    if ((await this.cache.get(key)) !== null) {
      return;
    }

    const range = monthRange(date);
    const epoch = this.cache.epoch;
    try {
      const calendars = await this.client.fetchCalendars(account);
      const events = await this.client.fetchEvents(account, range, calendars);
      this.cache.putCalendars(key, calendars, epoch);
      this.cache.put(key, events, epoch);
      devLog(`Preloaded ${events.length} events into ${key}.`);
    } catch (e) {
      // Left to the next foreground load.
      logWarn(`Preloading ${key} failed: ${describeError(e)}`);
    }
  }
}
