/**
 * Sample date arithmetic
 */

import { addDays, addWeeks, format, startOfWeek, subDays, subWeeks } from 'date-fns';
import type { SamplingFrequency } from '../types.js';

const MONTH_LENGTH_DAYS = 30;

export const SAMPLE_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Weekly runs anchor on Monday 00:00 of the current week; monthly runs
 * anchor on `now` itself. All arithmetic and formatting is in the host's
 * local time zone.
 */
export function computeAnchor(frequency: SamplingFrequency, now: Date): Date {
  return frequency === 'weekly' ? startOfWeek(now, { weekStartsOn: 1 }) : now;
}

function stepBack(frequency: SamplingFrequency, date: Date, periods: number): Date {
  return frequency === 'weekly' ? subWeeks(date, periods) : subDays(date, periods * MONTH_LENGTH_DAYS);
}

function stepForward(frequency: SamplingFrequency, date: Date, periods: number): Date {
  return frequency === 'weekly' ? addWeeks(date, periods) : addDays(date, periods * MONTH_LENGTH_DAYS);
}

/**
 * periods + 1 ascending dates, the last one being the anchor
 */
export function computeSampleDates(frequency: SamplingFrequency, periods: number, now: Date = new Date()): string[] {
  if (!Number.isInteger(periods) || periods < 0) {
    throw new RangeError(`periods must be a non-negative integer, got ${periods}`);
  }

  const start = stepBack(frequency, computeAnchor(frequency, now), periods);
  const dates: string[] = [];

  for (let i = 0; i <= periods; i++) {
    dates.push(format(stepForward(frequency, start, i), SAMPLE_DATE_FORMAT));
  }

  return dates;
}
