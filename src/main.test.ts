import { FakeCalendarClient } from '../test_helpers/FakeCalendarClient';
import { ManualClock, allDayEvent, timedEvent, utc } from '../test_helpers/fixtures';
import { monthCacheKey } from './core/EventCache';
import PlannerEngine from './main';

describe('PlannerEngine', () => {
  let client: FakeCalendarClient;

  beforeEach(() => {
    client = new FakeCalendarClient();
    client.events.personal = [
      timedEvent('gym', '2024-05-06T09:00:00Z', '2024-05-06T10:00:00Z'),
      allDayEvent('birthday', '2024-05-06', '2024-05-07')
    ];
    client.events.professional = [
      timedEvent('sync', '2024-05-06T09:30:00Z', '2024-05-06T10:00:00Z')
    ];
  });

  function makeEngine(): PlannerEngine {
    return new PlannerEngine(
      {
        accounts: {
          personal: { accessToken: 'test-token' },
          professional: { accessToken: 'test-token' }
        },
        preloadAdjacentMonths: false,
        timeline: { hourHeight: 60 }
      },
      { client, zone: 'UTC', now: new ManualClock().now }
    );
  }

  it('applies logging settings on construction', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});

    new PlannerEngine({ verboseLogging: true }, { client });
    expect(debug).toHaveBeenCalledWith('Planner: Engine ready.');

    debug.mockClear();
    makeEngine();
    expect(debug).not.toHaveBeenCalled();
    debug.mockRestore();
  });

  it('lays out the published events of both accounts', async () => {
    const engine = makeEngine();
    await engine.orchestrator.loadMonth(utc('2024-05-06'));

    const layout = engine.layoutDay({
      date: utc('2024-05-06'),
      columnWidth: 300,
      now: utc('2024-05-06T12:30')
    });

    expect(
      layout.timed.map(l => [l.event.id, l.verticalOffset, l.height, l.columnWidth, l.isPersonal])
    ).toEqual([
      ['gym', 540, 60, 146, true],
      ['sync', 570, 30, 146, false]
    ]);
    expect(layout.allDay.rows.map(row => [row.event.id, row.isPersonal])).toEqual([
      ['birthday', true]
    ]);
    expect(layout.currentTimeOffset).toBe(750);
  });

  it('clears everything when an account is unlinked', async () => {
    const engine = makeEngine();
    await engine.orchestrator.loadMonth(utc('2024-05-06'));

    await engine.setAccessToken('professional', undefined);

    expect(engine.tokens.isLinked('professional')).toBe(false);
    expect(engine.orchestrator.getSnapshot().personalEvents).toEqual([]);
    expect(engine.cache.isValid(monthCacheKey('personal', utc('2024-05-06')))).toBe(false);
    expect(await engine.cache.get(monthCacheKey('personal', utc('2024-05-06')))).toBeNull();
  });

  it('refuses token updates when a custom provider is injected', async () => {
    const engine = new PlannerEngine(
      {},
      { client, tokens: { isLinked: () => true, getAccessToken: async () => 'test-token' } }
    );

    await expect(engine.setAccessToken('personal', 'other')).rejects.toThrow(
      'Tokens are supplied by a custom provider; update it directly.'
    );
  });
});
