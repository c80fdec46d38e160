import { ZodError } from 'zod';
import { DEFAULT_SETTINGS, isAccountLinked, parseSettings } from './settings';

describe('parseSettings', () => {
  it('returns the defaults for an empty object', () => {
    expect(parseSettings()).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS.memoryTtlMs).toBe(1800 * 1000);
    expect(DEFAULT_SETTINGS.persistentTtlMs).toBe(86400 * 1000);
  });

  it('merges nested timeline overrides onto the defaults', () => {
    const settings = parseSettings({ timeline: { hourHeight: 60 }, verboseLogging: true });

    expect(settings.verboseLogging).toBe(true);
    expect(settings.timeline).toEqual({ ...DEFAULT_SETTINGS.timeline, hourHeight: 60 });
  });

  it('links only the accounts that are configured', () => {
    const settings = parseSettings({ accounts: { professional: { accessToken: 'test-token' } } });

    expect(isAccountLinked(settings, 'professional')).toBe(true);
    expect(isAccountLinked(settings, 'personal')).toBe(false);
  });

  it('rejects values of the wrong shape', () => {
    expect(() => parseSettings({ memoryTtlMs: -5 })).toThrow(ZodError);
    expect(() => parseSettings({ accounts: { shared: { accessToken: 'x' } } })).toThrow(ZodError);
    expect(() => parseSettings({ timeline: { baseHour: 24 } })).toThrow(ZodError);
  });
});
