import { DateTime } from 'luxon';
import { timedEvent, utc } from '../../test_helpers/fixtures';
import {
  compareByStart,
  compareEvents,
  monthRange,
  paddedDayRange,
  toApiInstant,
  toCacheDate,
  weekRange
} from './dates';

describe('date ranges', () => {
  it('covers the whole month containing a date', () => {
    const { start, end } = monthRange(utc('2024-02-15T10:00'));

    expect(toCacheDate(start)).toBe('2024-02-01');
    expect(toCacheDate(end)).toBe('2024-03-01');
  });

  it('starts weeks on Monday', () => {
    const { start, end } = weekRange(utc('2024-05-08T18:00'));

    expect(toCacheDate(start)).toBe('2024-05-06');
    expect(toCacheDate(end)).toBe('2024-05-13');
  });

  it('pads a single day on both sides', () => {
    const { start, end } = paddedDayRange(utc('2024-05-08T18:00'), 7);

    expect(toCacheDate(start)).toBe('2024-05-01');
    expect(toCacheDate(end)).toBe('2024-05-16');
  });
});

describe('toApiInstant', () => {
  it('formats in UTC without milliseconds', () => {
    const local = DateTime.fromISO('2024-05-01T00:00:00.250', { zone: 'America/New_York' });

    expect(toApiInstant(local)).toBe('2024-05-01T04:00:00.250Z');
    expect(toApiInstant(utc('2024-05-01T00:00'))).toBe('2024-05-01T00:00:00Z');
  });
});

describe('event ordering', () => {
  const early = timedEvent('early', '2024-05-01T08:00:00Z', '2024-05-01T09:00:00Z');
  const late = timedEvent('late', '2024-05-01T10:00:00Z', '2024-05-01T11:00:00Z');
  const noStartB = timedEvent('b', 'garbage', 'garbage');
  const noStartA = timedEvent('a', 'garbage', 'garbage');

  it('puts events without a usable start last, ordered by id', () => {
    const sorted = [noStartB, late, noStartA, early].sort(compareByStart).map(e => e.id);

    expect(sorted).toEqual(['early', 'late', 'a', 'b']);
  });

  it('breaks start ties by end', () => {
    const longer = timedEvent('longer', '2024-05-01T08:00:00Z', '2024-05-01T12:00:00Z');

    expect([longer, early].sort(compareEvents).map(e => e.id)).toEqual(['early', 'longer']);
  });
});
