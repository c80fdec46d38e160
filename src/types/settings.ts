import { z } from 'zod';
import { AccountKind } from './schema';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;

export interface TimelineSettings {
  hourHeight: number;
  baseHour: number; // First hour drawn at offset 0.
  endHour: number;
  minEventHeight: number; // Keeps short events tappable.
  columnGap: number;
  allDayRowHeight: number;
  allDayRowPadding: number;
}

export interface LinkedAccount {
  accessToken: string | null;
}

export interface PlannerSettings {
  memoryTtlMs: number;
  persistentTtlMs: number;
  maxMemoryEntries: number; // e.g. three months for two accounts
  dayFetchPaddingDays: number;
  preloadAdjacentMonths: boolean;
  verboseLogging: boolean;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  cacheDirectory: string | null; // null keeps the persistent tier in memory
  accounts: Partial<Record<AccountKind, LinkedAccount>>;
  timeline: TimelineSettings;
}

export const DEFAULT_TIMELINE_SETTINGS: TimelineSettings = {
  hourHeight: 80,
  baseHour: 0,
  endHour: 24,
  minEventHeight: 20,
  columnGap: 4,
  allDayRowHeight: 16,
  allDayRowPadding: 4
};

export const DEFAULT_SETTINGS: PlannerSettings = {
  memoryTtlMs: 30 * MINUTE,
  persistentTtlMs: 24 * HOUR,
  maxMemoryEntries: 6,
  dayFetchPaddingDays: 7,
  preloadAdjacentMonths: true,
  verboseLogging: false,
  apiBaseUrl: 'https://www.googleapis.com/calendar/v3',
  requestTimeoutMs: 15 * SECOND,
  cacheDirectory: null,
  accounts: {},
  timeline: DEFAULT_TIMELINE_SETTINGS
};

const TimelineSettingsSchema = z
  .object({
    hourHeight: z.number().positive(),
    baseHour: z.number().int().min(0).max(23),
    endHour: z.number().int().min(1).max(24),
    minEventHeight: z.number().nonnegative(),
    columnGap: z.number().nonnegative(),
    allDayRowHeight: z.number().nonnegative(),
    allDayRowPadding: z.number().nonnegative()
  })
  .partial();

const LinkedAccountSchema = z.object({ accessToken: z.string().nullable() });

const PlannerSettingsSchema = z
  .object({
    memoryTtlMs: z.number().int().positive(),
    persistentTtlMs: z.number().int().positive(),
    maxMemoryEntries: z.number().int().positive(),
    dayFetchPaddingDays: z.number().int().nonnegative(),
    preloadAdjacentMonths: z.boolean(),
    verboseLogging: z.boolean(),
    apiBaseUrl: z.string().url(),
    requestTimeoutMs: z.number().int().positive(),
    cacheDirectory: z.string().nullable(),
    accounts: z
      .object({
        personal: LinkedAccountSchema.optional(),
        professional: LinkedAccountSchema.optional()
      })
      .strict(),
    timeline: TimelineSettingsSchema
  })
  .partial();

export type PlannerSettingsInput = z.input<typeof PlannerSettingsSchema>;

/**
 * Merges user-supplied overrides onto `DEFAULT_SETTINGS`.
 * @throws {ZodError} When an override has the wrong shape.
 */
export function parseSettings(obj: unknown = {}): PlannerSettings {
  const overrides = PlannerSettingsSchema.parse(obj);
  return {
    ...DEFAULT_SETTINGS,
    ...overrides,
    accounts: { ...DEFAULT_SETTINGS.accounts, ...overrides.accounts },
    timeline: { ...DEFAULT_TIMELINE_SETTINGS, ...overrides.timeline }
  };
}

export function isAccountLinked(settings: PlannerSettings, kind: AccountKind): boolean {
  return settings.accounts[kind] !== undefined;
}
