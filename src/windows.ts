/**
 * Calendar-month query windows
 */

import { endOfMonth, format, startOfDay, startOfMonth, subMonths } from 'date-fns';
import { InvalidArgumentError } from './errors.js';
import type { Window } from '../schemas/index.js';

/**
 * Generate one window per calendar month, oldest first, ending today
 *
 * Offset i runs from monthsBack down to 0. Each window spans the month of
 * `today - i months`; the current month is cut off at today.
 *
 * @returns monthsBack + 1 contiguous, non-overlapping windows
 */
export function generateWindows(monthsBack: number, today: Date = new Date()): Window[] {
  if (!Number.isInteger(monthsBack) || monthsBack < 0) {
    throw new InvalidArgumentError(`monthsBack must be a non-negative integer, got ${monthsBack}`);
  }

  const day = startOfDay(today);
  const windows: Window[] = [];

  for (let i = monthsBack; i >= 0; i--) {
    const month = subMonths(day, i);
    windows.push({
      start: startOfMonth(month),
      end: i === 0 ? day : startOfDay(endOfMonth(month)),
    });
  }

  return windows;
}

/**
 * Single window spanning all given windows
 */
export function coveringWindow(windows: readonly Window[]): Window {
  if (windows.length === 0) {
    throw new InvalidArgumentError('Cannot cover an empty window list');
  }
  return { start: windows[0].start, end: windows[windows.length - 1].end };
}

/**
 * Render a date as YYYY-MM-DD (local calendar day)
 */
export function formatDay(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}
