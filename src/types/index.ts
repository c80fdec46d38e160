/**
 * @file index.ts
 * @brief A central export point for all public types used across the engine.
 *
 * @description
 * Consolidates and re-exports the event model, the settings model and the error
 * taxonomy so the rest of the code base has a single import point.
 *
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';

export type {
  AccountKind,
  CalendarEvent,
  CalendarSource,
  EventDateTime
} from './schema';
export {
  ACCOUNT_KINDS,
  validateEvent,
  isAllDay,
  isLikelyRecurring,
  eventStart,
  eventEnd
} from './schema';

export type { PlannerSettings, TimelineSettings, LinkedAccount } from './settings';
export { DEFAULT_SETTINGS, parseSettings, isAccountLinked } from './settings';

export {
  PlannerCalendarError,
  AuthError,
  NetworkError,
  ApiError,
  DecodeError
} from './errors';

/** A half-open `[start, end)` window of instants. */
export type DateRange = {
  start: DateTime;
  end: DateTime;
};
