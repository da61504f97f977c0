/**
 * Time-of-week bucketing for activity timestamps, in local time.
 */

import type { Condition, TemporalContext, TimeCategory } from '../types.js';
import { weekdayOf } from '../engine/conditions.js';

const WEEKDAYS = [2, 3, 4, 5, 6];
const WEEKEND = [1, 7];

export function temporalContext(timestamp: string | Date): TemporalContext {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  const hourOfDay = date.getHours();
  const dayOfWeek = weekdayOf(date);
  return {
    hourOfDay,
    dayOfWeek,
    isWorkHours: WEEKDAYS.includes(dayOfWeek) && hourOfDay >= 9 && hourOfDay <= 17,
  };
}

/** Bucket for a single activity. Every timestamp lands in exactly one bucket. */
export function timeBucket(context: TemporalContext): Exclude<TimeCategory, 'anyTime'> {
  if (!context.isWorkHours && WEEKEND.includes(context.dayOfWeek)) return 'weekends';
  if (context.isWorkHours) return 'workHours';
  if (context.hourOfDay >= 5 && context.hourOfDay < 12) return 'mornings';
  return 'evenings';
}

export function conditionsForBucket(bucket: Exclude<TimeCategory, 'anyTime'>): Condition[] {
  switch (bucket) {
    case 'workHours':
      return [
        { type: 'timeOfDay', startHour: 9, endHour: 17 },
        { type: 'dayOfWeek', days: [...WEEKDAYS] },
      ];
    case 'evenings':
      return [{ type: 'timeOfDay', startHour: 17, endHour: 23 }];
    case 'mornings':
      return [{ type: 'timeOfDay', startHour: 5, endHour: 12 }];
    case 'weekends':
      return [{ type: 'dayOfWeek', days: [...WEEKEND] }];
  }
}

export const TIME_CATEGORY_LABELS: Record<TimeCategory, string> = {
  workHours: 'work hours',
  mornings: 'mornings',
  evenings: 'evenings',
  weekends: 'weekends',
  anyTime: 'any time',
};

/**
 * Overall category for accumulated contexts: needs at least 3 observations
 * and 60% of them in one category.
 */
export function categorizeContexts(contexts: readonly TemporalContext[]): TimeCategory {
  if (contexts.length < 3) return 'anyTime';

  let workHours = 0;
  let evenings = 0;
  let mornings = 0;
  let weekends = 0;
  for (const ctx of contexts) {
    if (WEEKEND.includes(ctx.dayOfWeek)) weekends++;
    else if (ctx.isWorkHours) workHours++;
    else if (ctx.hourOfDay >= 18 && ctx.hourOfDay <= 23) evenings++;
    else if (ctx.hourOfDay >= 5 && ctx.hourOfDay < 9) mornings++;
  }

  const threshold = Math.floor(contexts.length * 0.6);
  if (workHours >= threshold) return 'workHours';
  if (evenings >= threshold) return 'evenings';
  if (mornings >= threshold) return 'mornings';
  if (weekends >= threshold) return 'weekends';
  return 'anyTime';
}
