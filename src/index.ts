/**
 * @file index.ts
 * @brief Public surface of the package.
 * @license See LICENSE.md
 */

export { default as PlannerEngine } from './main';
export type { EngineDeps, LayoutRequest } from './main';

export * from './types';
export type { PlannerSettingsInput } from './types/settings';
export { describeError } from './types/errors';

export type { AccessTokenProvider, RemoteCalendarClient } from './providers/Provider';
export { GoogleCalendarClient } from './providers/google/GoogleCalendarClient';
export { StaticTokenProvider } from './features/google_auth/StaticTokenProvider';

export { default as EventCache, cacheKey, monthCacheKey } from './core/EventCache';
export type { EventCacheOptions } from './core/EventCache';
export type { PersistentStore } from './core/persistence/PersistentStore';
export { FileCacheStore } from './core/persistence/FileCacheStore';
export { MemoryStore } from './core/persistence/MemoryStore';
export { Preloader } from './core/modules/Preloader';
export type { NavigationDirection } from './core/modules/Preloader';
export { CalendarOrchestrator, BOTH_ACCOUNTS_FAILED_MESSAGE } from './core/CalendarOrchestrator';
export type {
  OrchestratorSnapshot,
  LoadOptions,
  LoadResult,
  SnapshotListener
} from './core/CalendarOrchestrator';
export {
  layoutDay,
  layoutAllDay,
  clusterIntervals,
  timeToOffset,
  currentTimeOffset
} from './core/TimelineLayout';
export type { DayLayout, EventLayout, AllDayLayout, LayoutOptions } from './core/TimelineLayout';
export { eventsForDay, groupEventsByDay, occursOn } from './core/DayIndex';
export { monthRange, weekRange, paddedDayRange } from './core/dates';
