import { FakeCalendarClient, settle } from '../../../test_helpers/FakeCalendarClient';
import { ManualClock, timedEvent, utc } from '../../../test_helpers/fixtures';
import { StaticTokenProvider } from '../../features/google_auth/StaticTokenProvider';
import { PlannerSettings } from '../../types/settings';
import { MemoryStore } from '../persistence/MemoryStore';
import EventCache, { monthCacheKey } from '../EventCache';
import { Preloader } from './Preloader';

const BOTH_LINKED: PlannerSettings['accounts'] = {
  personal: { accessToken: 'test-token' },
  professional: { accessToken: 'test-token' }
};

const MAY = utc('2024-05-15');

describe('Preloader', () => {
  let client: FakeCalendarClient;
  let cache: EventCache;

  function makePreloader(accounts: PlannerSettings['accounts'] = BOTH_LINKED): Preloader {
    return new Preloader(cache, client, new StaticTokenProvider(accounts));
  }

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    client = new FakeCalendarClient();
    client.events.personal = [timedEvent('p', '2024-04-10T09:00:00Z', '2024-04-10T10:00:00Z')];
    client.events.professional = [timedEvent('w', '2024-04-11T09:00:00Z', '2024-04-11T10:00:00Z')];
    cache = new EventCache(new MemoryStore(), {
      memoryTtlMs: 1800 * 1000,
      persistentTtlMs: 86400 * 1000,
      maxMemoryEntries: 12,
      now: new ManualClock().now
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('fetches the previous and next month for every linked account', async () => {
    await makePreloader().warmAdjacent(MAY);

    const fetched = client.eventCalls().map(call => `${call.account} ${call.range}`);
    expect(fetched.sort()).toEqual([
      'personal 2024-04-01..2024-05-01',
      'personal 2024-06-01..2024-07-01',
      'professional 2024-04-01..2024-05-01',
      'professional 2024-06-01..2024-07-01'
    ]);
    expect(cache.isValid(monthCacheKey('personal', utc('2024-04-01')))).toBe(true);
    expect(cache.getCalendars(monthCacheKey('professional', utc('2024-06-01')))).toEqual([]);
  });

  it('skips months that are already cached', async () => {
    cache.put(monthCacheKey('personal', utc('2024-04-01')), []);

    await makePreloader().warmAdjacent(MAY);

    expect(client.eventCalls('personal').map(call => call.range)).toEqual([
      '2024-06-01..2024-07-01'
    ]);
    expect(client.eventCalls('professional')).toHaveLength(2);
  });

  it('ignores unlinked accounts', async () => {
    await makePreloader({ personal: { accessToken: 'test-token' } }).warmAdjacent(MAY);

    expect(client.eventCalls('professional')).toHaveLength(0);
    expect(client.eventCalls('personal')).toHaveLength(2);
  });

  it('swallows fetch failures and leaves the key uncached', async () => {
    client.failures.professional = new Error('boom');

    await expect(makePreloader().warmMonth(utc('2024-06-03'))).resolves.toBeUndefined();

    expect(cache.isValid(monthCacheKey('personal', utc('2024-06-01')))).toBe(true);
    expect(cache.isValid(monthCacheKey('professional', utc('2024-06-01')))).toBe(false);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('warms ahead in the direction of travel before looking back', async () => {
    await makePreloader({ personal: { accessToken: 'test-token' } }).warmAround(MAY, 1);

    expect(client.eventCalls().map(call => call.range)).toEqual([
      '2024-06-01..2024-07-01',
      '2024-07-01..2024-08-01',
      '2024-04-01..2024-05-01'
    ]);
  });

  it('warms backwards when moving back in time', async () => {
    await makePreloader({ personal: { accessToken: 'test-token' } }).warmAround(MAY, -1);

    expect(client.eventCalls().map(call => call.range)).toEqual([
      '2024-04-01..2024-05-01',
      '2024-03-01..2024-04-01',
      '2024-06-01..2024-07-01'
    ]);
  });

  it('drops a warm-up that finishes after clearAll', async () => {
    const preloader = makePreloader({ personal: { accessToken: 'test-token' } });
    const release = client.hold('personal');

    const warming = preloader.warmMonth(MAY);
    await settle();
    await cache.clearAll();
    release();
    await warming;
    await cache.flush();

    const key = monthCacheKey('personal', MAY);
    expect(cache.isValid(key)).toBe(false);
    expect(await cache.get(key)).toBeNull();
    expect(client.eventCalls()[0].withCalendars).toBe(true);
  });

  it('does not fetch a month twice while it is being warmed', async () => {
    const preloader = makePreloader({ personal: { accessToken: 'test-token' } });

    await Promise.all([preloader.warmMonth(MAY), preloader.warmMonth(MAY)]);

    expect(client.eventCalls()).toHaveLength(1);
  });
});
