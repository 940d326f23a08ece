/**
 * Time-Window Resolver
 * Date ranges, momentum split points and interval truncation (all UTC)
 */

import { Interval, TimeWindow } from '../store/entityStore';
import { InvalidParameterError } from './errors';

export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;

export interface SplitWindow {
  full: TimeWindow;
  first: TimeWindow;
  second: TimeWindow;
}

function assertDaysBack(daysBack: number): void {
  if (!Number.isInteger(daysBack) || daysBack <= 0) {
    throw new InvalidParameterError('daysBack must be a positive integer');
  }
}

export function resolveWindow(daysBack: number, now: Date): TimeWindow {
  assertDaysBack(daysBack);
  const end = new Date(now.getTime());
  return { start: new Date(end.getTime() - daysBack * DAY_MS), end };
}

/**
 * Two adjacent halves [start, mid) and [mid, end). Odd day counts split at
 * the exact midpoint rather than a whole day.
 */
export function splitWindow(daysBack: number, now: Date): SplitWindow {
  const full = resolveWindow(daysBack, now);
  const mid = new Date(full.end.getTime() - (daysBack * DAY_MS) / 2);
  return {
    full,
    first: { start: full.start, end: mid },
    second: { start: mid, end: full.end },
  };
}

export function truncateToInterval(date: Date, interval: Interval): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  const day = date.getUTCDate();

  switch (interval) {
    case 'hour':
      return new Date(Date.UTC(year, month, day, date.getUTCHours()));
    case 'day':
      return new Date(Date.UTC(year, month, day));
    case 'week': {
      // ISO weeks start on Monday
      const offset = (date.getUTCDay() + 6) % 7;
      return new Date(Date.UTC(year, month, day - offset));
    }
    case 'month':
      return new Date(Date.UTC(year, month, 1));
  }
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function formatPeriod(window: TimeWindow): string {
  return `${formatDate(window.start)} to ${formatDate(window.end)}`;
}

export function formatBucketLabel(bucket: Date, interval: Interval): string {
  switch (interval) {
    case 'hour':
      return `${formatDate(bucket)} ${bucket.toISOString().slice(11, 13)}:00`;
    case 'day':
      return formatDate(bucket);
    case 'week':
      return `Week of ${formatDate(bucket)}`;
    case 'month':
      return bucket.toISOString().slice(0, 7);
  }
}

export function isWithin(date: Date, window: TimeWindow): boolean {
  const t = date.getTime();
  return t >= window.start.getTime() && t < window.end.getTime();
}
