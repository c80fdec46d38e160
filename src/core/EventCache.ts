/**
 * @file EventCache.ts
 * @brief Two-tier cache of fetched events, keyed by account and date range.
 *
 * @description
 * The `EventCache` keeps fetched event lists in an in-memory map backed by a
 * `PersistentStore`. Each tier has its own TTL: a memory entry lives for
 * `memoryTtlMs`, a persisted one for `persistentTtlMs`. A read that misses
 * memory but finds a valid persisted value promotes it back into memory with a
 * fresh timestamp.
 *
 * @details
 * - Memory writes are synchronous; persistent writes are queued and never block the caller.
 * - Persistent operations run one at a time in issue order, so the last write wins.
 * - Reads wait for queued writes before touching the store.
 * - Stale, missing or undecodable persisted entries are misses and get purged.
 * - The memory tier is bounded; least recently used keys are evicted first and
 *   remain available from the persistent tier.
 * - Calendar lists are cached alongside events under the same key, memory tier only.
 * - Store read failures are misses.
 * - `clearAll` starts a new epoch. A write tagged with an older epoch is dropped,
 *   and a read that overlaps any removal does not promote what it found.
 *
 * @see Preloader.ts
 * @see CalendarOrchestrator.ts
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import {
  AccountKind,
  ACCOUNT_KINDS,
  CalendarEvent,
  CalendarEventListSchema,
  CalendarSource
} from '../types/schema';
import { DecodeError } from '../types/errors';
import { devLog, logWarn } from '../features/logging';
import { PersistentStore } from './persistence/PersistentStore';
import { monthRange, toCacheDate } from './dates';

export type CacheEntry<T> = { payload: T; writtenAt: number };

export type Clock = () => number;

export interface EventCacheOptions {
  memoryTtlMs: number;
  persistentTtlMs: number;
  maxMemoryEntries: number;
  now?: Clock;
}

export const EVENTS_KEY_PREFIX = 'CalendarCache_';
export const TIMESTAMP_KEY_PREFIX = 'CacheTimestamp_';

export function cacheKey(account: AccountKind, start: DateTime, end: DateTime): string {
  return `${account}_${toCacheDate(start)}_${toCacheDate(end)}`;
}

export function monthCacheKey(account: AccountKind, date: DateTime): string {
  const { start, end } = monthRange(date);
  return cacheKey(account, start, end);
}

export default class EventCache {
  private store: PersistentStore;
  private options: Required<EventCacheOptions>;

  // Map iteration order doubles as the LRU order: oldest access first.
  private memory = new Map<string, CacheEntry<CalendarEvent[]>>();
  private calendars = new Map<string, CacheEntry<CalendarSource[]>>();
  private pending: Promise<void> = Promise.resolve();
  private resets = 0;
  // Bumped by every removal, so in-flight reads can tell they raced one.
  private removals = 0;

  constructor(store: PersistentStore, options: EventCacheOptions) {
    this.store = store;
    this.options = { ...options, now: options.now ?? Date.now };
  }

  private now(): number {
    return this.options.now();
  }

  private isFresh(entry: CacheEntry<unknown> | undefined, ttl: number): boolean {
    return entry !== undefined && this.now() - entry.writtenAt < ttl;
  }

  // ====================================================================
  //                         MEMORY TIER
  // ====================================================================

  /** True when the memory tier holds a fresh entry for `key`. */
  isValid(key: string): boolean {
    return this.isFresh(this.memory.get(key), this.options.memoryTtlMs);
  }

  private remember(key: string, events: CalendarEvent[]): void {
    this.memory.delete(key);
    this.memory.set(key, { payload: events, writtenAt: this.now() });
    this.evictIfNeeded();
  }

  private touch(key: string, entry: CacheEntry<CalendarEvent[]>): void {
    this.memory.delete(key);
    this.memory.set(key, entry);
  }

  private evictIfNeeded(): void {
    while (this.memory.size > this.options.maxMemoryEntries) {
      const oldest = this.memory.keys().next();
      if (oldest.done) return;
      this.memory.delete(oldest.value);
      this.calendars.delete(oldest.value);
      devLog(`Evicted ${oldest.value} from the memory cache.`);
    }
  }

  /** Changes on every `clearAll`; pass it to `put` to drop writes from before a reset. */
  get epoch(): number {
    return this.resets;
  }

  private isStale(epoch: number | undefined, key: string): boolean {
    if (epoch === undefined || epoch === this.resets) return false;
    devLog(`Dropped a write to ${key} from before the last reset.`);
    return true;
  }

  // ====================================================================
  //                         PERSISTENT TIER
  // ====================================================================

  /**
   * Queues a persistent-store operation behind every earlier one.
   * Failures are logged; the memory tier stays authoritative.
   */
  private enqueue(label: string, op: () => Promise<void>): Promise<void> {
    const next = this.pending.then(op).catch(e => {
      logWarn(`Persistent cache ${label} failed.`, e);
    });
    this.pending = next;
    return next;
  }

  /** Resolves once every queued persistent write has settled. */
  flush(): Promise<void> {
    return this.pending;
  }

  private async removePersisted(key: string): Promise<void> {
    await this.store.remove(EVENTS_KEY_PREFIX + key);
    await this.store.remove(TIMESTAMP_KEY_PREFIX + key);
  }

  private decode(raw: string): CalendarEvent[] {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new DecodeError(`Cached payload is not JSON: ${String(e)}`);
    }
    const parsed = CalendarEventListSchema.safeParse(json);
    if (!parsed.success) {
      throw new DecodeError(
        'Cached payload does not match the event schema.',
        parsed.error.issues.map(issue => issue.message)
      );
    }
    return parsed.data;
  }

  private async readRaw(key: string): Promise<{ raw: string; stamp: number } | null> {
    try {
      const raw = await this.store.read(EVENTS_KEY_PREFIX + key);
      if (raw === null) return null;
      const stamp = Number(await this.store.read(TIMESTAMP_KEY_PREFIX + key));
      return { raw, stamp };
    } catch (e) {
      logWarn(`Persistent cache read of ${key} failed; treating it as a miss.`, e);
      return null;
    }
  }

  private async readPersisted(key: string): Promise<CacheEntry<CalendarEvent[]> | null> {
    await this.pending;
    const stored = await this.readRaw(key);
    if (!stored) return null;
    const { raw, stamp } = stored;

    let payload: CalendarEvent[];
    try {
      payload = this.decode(raw);
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e;
      devLog(`Discarding corrupt cache entry ${key}.`, e.issues);
      await this.enqueue('purge', () => this.removePersisted(key));
      return null;
    }

    const entry = { payload, writtenAt: stamp };
    if (!Number.isFinite(stamp) || !this.isFresh(entry, this.options.persistentTtlMs)) {
      await this.enqueue('purge', () => this.removePersisted(key));
      return null;
    }
    return entry;
  }

  // ====================================================================
  //                         PUBLIC API
  // ====================================================================

  /**
   * Returns the cached events for `key`, or null on a miss.
   * A persisted hit is promoted into memory with a fresh timestamp.
   */
  async get(key: string): Promise<CalendarEvent[] | null> {
    const inMemory = this.memory.get(key);
    if (inMemory && this.isFresh(inMemory, this.options.memoryTtlMs)) {
      this.touch(key, inMemory);
      return inMemory.payload;
    }
    this.memory.delete(key);

    const removals = this.removals;
    const persisted = await this.readPersisted(key);

    // A put may have landed while the store was being read.
    const raced = this.memory.get(key);
    if (raced && this.isFresh(raced, this.options.memoryTtlMs)) {
      return raced.payload;
    }
    if (!persisted) return null;
    if (removals !== this.removals) {
      devLog(`Not promoting ${key}: the cache was invalidated during the read.`);
      return null;
    }

    devLog(`Promoted ${key} from the persistent cache.`);
    this.remember(key, persisted.payload);
    return persisted.payload;
  }

  /**
   * Stores `events` in memory and queues the persistent write.
   * Empty lists are kept out of the persistent tier. With `epoch`, the write
   * is dropped when `clearAll` ran since that epoch was read.
   */
  put(key: string, events: CalendarEvent[], epoch?: number): void {
    if (this.isStale(epoch, key)) return;
    this.remember(key, events);
    if (events.length === 0) return;

    const writtenAt = this.now();
    const payload = JSON.stringify(events);
    void this.enqueue('write', async () => {
      await this.store.write(EVENTS_KEY_PREFIX + key, payload);
      await this.store.write(TIMESTAMP_KEY_PREFIX + key, String(writtenAt));
    });
  }

  getCalendars(key: string): CalendarSource[] | null {
    const entry = this.calendars.get(key);
    if (!entry) return null;
    if (!this.isFresh(entry, this.options.memoryTtlMs)) {
      this.calendars.delete(key);
      return null;
    }
    return entry.payload;
  }

  putCalendars(key: string, calendars: CalendarSource[], epoch?: number): void {
    if (this.isStale(epoch, key)) return;
    this.calendars.set(key, { payload: calendars, writtenAt: this.now() });
  }

  invalidate(key: string): Promise<void> {
    this.removals++;
    this.memory.delete(key);
    this.calendars.delete(key);
    return this.enqueue('invalidate', () => this.removePersisted(key));
  }

  /** Drops both accounts' entries for the month containing `date`. */
  invalidateMonth(date: DateTime): Promise<void> {
    return Promise.all(
      ACCOUNT_KINDS.map(account => this.invalidate(monthCacheKey(account, date)))
    ).then(() => undefined);
  }

  /** Empties both tiers. Used on account unlink and data reset. */
  clearAll(): Promise<void> {
    this.resets++;
    this.removals++;
    this.memory.clear();
    this.calendars.clear();
    return this.enqueue('clear', async () => {
      const keys = await this.store.keys();
      for (const key of keys) {
        if (key.startsWith(EVENTS_KEY_PREFIX) || key.startsWith(TIMESTAMP_KEY_PREFIX)) {
          await this.store.remove(key);
        }
      }
    });
  }
}
