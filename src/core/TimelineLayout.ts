/**
 * @file TimelineLayout.ts
 * @brief Converts one day's events into positioned bands for a timeline column.
 *
 * @description
 * `layoutDay` is a pure function: the same events and options always produce the
 * same layout, and nothing is cached between calls. It separates all-day events
 * into a stacked row block, groups overlapping timed events into clusters and
 * splits the column width between the members of each cluster.
 *
 * Clustering is a single greedy pass over events in start order. Each event joins
 * the first existing cluster holding any event it overlaps, or opens a new one.
 * This is not minimal interval-graph colouring: two events that miss each other
 * but both overlap a third still get separate bands in the shared cluster.
 * Events in different clusters never overlap, since a later event overlapping an
 * earlier one would have joined that event's cluster.
 *
 * @license See LICENSE.md
 */

import { DateTime } from 'luxon';
import { CalendarEvent, eventEnd, eventStart, isAllDay } from '../types/schema';
import { devLog } from '../features/logging';
import { compareEvents } from './dates';

export const DEFAULT_MIN_EVENT_HEIGHT = 20;
export const DEFAULT_COLUMN_GAP = 4;
export const DEFAULT_ALL_DAY_ROW_HEIGHT = 16;
export const DEFAULT_ALL_DAY_ROW_PADDING = 4;
const MIN_ALL_DAY_BLOCK_HEIGHT = 20;

export interface LayoutOptions {
  /** The day this column renders. */
  date: DateTime;
  hourHeight: number;
  baseHour: number;
  columnWidth: number;
  zone?: string;
  minEventHeight?: number;
  /** Space between bands; capped at half a band in crowded clusters. */
  columnGap?: number;
  allDayRowHeight?: number;
  allDayRowPadding?: number;
  /** Defaults to the wall clock. */
  now?: DateTime;
  personalEventIds?: ReadonlySet<string>;
  /** Hides the current-time indicator outside `[start, end)` hours. */
  visibleHours?: { start: number; end: number };
}

export interface EventLayout {
  event: CalendarEvent;
  verticalOffset: number;
  height: number;
  columnWidth: number;
  horizontalOffset: number;
  isPersonal: boolean;
}

export interface AllDayRow {
  event: CalendarEvent;
  top: number;
  height: number;
  isPersonal: boolean;
}

export interface AllDayLayout {
  rows: AllDayRow[];
  blockHeight: number;
}

export interface DayLayout {
  allDay: AllDayLayout;
  timed: EventLayout[];
  clusters: CalendarEvent[][];
  currentTimeOffset: number | null;
}

/** A half-open `[start, end)` interval in epoch milliseconds. */
export type Interval = { start: number; end: number };

export function intervalsOverlap(a: Interval, b: Interval): boolean {
  return a.start < b.end && a.end > b.start;
}

/**
 * Greedy first-match clustering. `items` must already be in start order;
 * the result preserves that order inside each cluster.
 */
export function clusterIntervals<T extends Interval>(items: T[]): T[][] {
  const clusters: T[][] = [];
  for (const item of items) {
    const home = clusters.find(cluster => cluster.some(member => intervalsOverlap(member, item)));
    if (home) {
      home.push(item);
    } else {
      clusters.push([item]);
    }
  }
  return clusters;
}

/** Pixel offset of a wall-clock time below the top of the timeline. */
export function timeToOffset(time: DateTime, baseHour: number, hourHeight: number): number {
  return (time.hour - baseHour) * hourHeight + time.minute * (hourHeight / 60);
}

export function layoutAllDay(
  events: CalendarEvent[],
  rowHeight: number = DEFAULT_ALL_DAY_ROW_HEIGHT,
  padding: number = DEFAULT_ALL_DAY_ROW_PADDING,
  personalEventIds?: ReadonlySet<string>
): AllDayLayout {
  const pitch = rowHeight + padding;
  const rows = [...events].sort(compareEvents).map((event, i) => ({
    event,
    top: i * pitch,
    height: rowHeight,
    isPersonal: personalEventIds?.has(event.id) ?? false
  }));
  return {
    rows,
    blockHeight: Math.max(MIN_ALL_DAY_BLOCK_HEIGHT, events.length * pitch)
  };
}

/**
 * Where the current-time line sits, or null when it should not be drawn:
 * `now` is on another day than `date`, or outside `visibleHours`.
 */
export function currentTimeOffset(
  options: Pick<LayoutOptions, 'date' | 'zone' | 'now' | 'baseHour' | 'hourHeight' | 'visibleHours'>
): number | null {
  const zone = options.zone ?? 'local';
  const now = (options.now ?? DateTime.now()).setZone(zone);
  if (!now.hasSame(options.date.setZone(zone), 'day')) return null;

  const window = options.visibleHours;
  if (window && (now.hour < window.start || now.hour >= window.end)) return null;

  return timeToOffset(now, options.baseHour, options.hourHeight);
}

type TimedItem = Interval & { event: CalendarEvent; from: DateTime; to: DateTime };

export function layoutDay(events: CalendarEvent[], options: LayoutOptions): DayLayout {
  const zone = options.zone ?? 'local';
  const minHeight = options.minEventHeight ?? DEFAULT_MIN_EVENT_HEIGHT;
  const columnGap = options.columnGap ?? DEFAULT_COLUMN_GAP;
  const dayStart = options.date.setZone(zone).startOf('day');
  const dayEnd = dayStart.plus({ days: 1 });
  const isPersonal = (event: CalendarEvent) => options.personalEventIds?.has(event.id) ?? false;

  const allDayEvents = events.filter(isAllDay);

  const items: TimedItem[] = [];
  for (const event of events) {
    if (isAllDay(event)) continue;
    const start = eventStart(event, zone);
    const end = eventEnd(event, zone);
    if (!start || !end) continue;
    if (end <= dayStart || start >= dayEnd) {
      devLog(`"${event.title}" does not fall on ${dayStart.toISODate()}; skipped.`);
      continue;
    }
    items.push({
      event,
      start: start.toMillis(),
      end: end.toMillis(),
      // Clipped to the rendered day for multi-day events.
      from: start < dayStart ? dayStart : start,
      to: end > dayEnd ? dayEnd : end
    });
  }
  items.sort((a, b) => a.start - b.start);

  const clusters = clusterIntervals(items);
  const timed: EventLayout[] = [];
  for (const cluster of clusters) {
    const band = options.columnWidth / cluster.length;
    // Narrow bands give up half their width to the gap at most.
    const gap = Math.min(columnGap, band / 2);
    cluster.forEach((item, index) => {
      const hours = item.to.diff(item.from).as('hours');
      timed.push({
        event: item.event,
        verticalOffset: timeToOffset(item.from, options.baseHour, options.hourHeight),
        height: Math.max(minHeight, hours * options.hourHeight),
        columnWidth: band - gap,
        horizontalOffset: index * band + gap / 2,
        isPersonal: isPersonal(item.event)
      });
    });
  }

  return {
    allDay: layoutAllDay(
      allDayEvents,
      options.allDayRowHeight,
      options.allDayRowPadding,
      options.personalEventIds
    ),
    timed,
    clusters: clusters.map(cluster => cluster.map(item => item.event)),
    currentTimeOffset: currentTimeOffset({ ...options, zone })
  };
}
