/**
 * Condition interpreter -- evaluates and describes the tagged Condition union.
 *
 * Evaluation never throws. Conditions that cannot be satisfied as written
 * (a non-positive day count, an inverted hour window) evaluate to false.
 */

import { extensionHasKind } from '../lookup.js';
import type { Condition, ConditionType, FileItem } from '../types.js';
import { formatBytes } from '../utils.js';
import type { EvaluationContext } from './types.js';

const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

const LOCATION_NAMES: Record<string, string> = {
  home: 'Home',
  desktop: 'Desktop',
  downloads: 'Downloads',
  documents: 'Documents',
  pictures: 'Pictures',
  music: 'Music',
  custom: 'Custom',
  unknown: 'Unknown',
};

// ── Helpers ────────────────────────────────────────────────────────

function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\./, '').toLowerCase();
}

/** Start of the window: the same local time, `days` calendar days earlier. */
function daysBefore(now: Date, days: number): Date {
  const threshold = new Date(now.getTime());
  threshold.setDate(threshold.getDate() - days);
  return threshold;
}

function olderThan(timestamp: string, days: number, label: string, ctx: EvaluationContext): boolean {
  if (!Number.isInteger(days) || days <= 0) {
    ctx.logger.warn(`[rule-engine] ${label}: days must be positive, got ${days}; condition never matches`);
    return false;
  }
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return false;
  return time < daysBefore(ctx.now, days).getTime();
}

/** Weekday numbering used throughout: 1 = Sunday … 7 = Saturday. */
export function weekdayOf(date: Date): number {
  return date.getDay() + 1;
}

// ── Evaluation ─────────────────────────────────────────────────────

export function evaluateCondition(file: FileItem, condition: Condition, ctx: EvaluationContext): boolean {
  switch (condition.type) {
    case 'extensionEquals':
      return normalizeExtension(file.extension) === normalizeExtension(condition.value);

    case 'nameStartsWith':
      return file.name.toLowerCase().startsWith(condition.value.toLowerCase());

    case 'nameContains':
      return file.name.toLowerCase().includes(condition.value.toLowerCase());

    case 'nameEndsWith':
      return file.name.toLowerCase().endsWith(condition.value.toLowerCase());

    case 'olderThan': {
      if (condition.extension) {
        if (normalizeExtension(file.extension) !== normalizeExtension(condition.extension)) {
          return false;
        }
      }
      return olderThan(file.creationDate, condition.days, 'olderThan', ctx);
    }

    case 'modifiedOlderThan':
      return olderThan(file.modificationDate, condition.days, 'modifiedOlderThan', ctx);

    case 'accessedOlderThan':
      return olderThan(file.lastAccessedDate, condition.days, 'accessedOlderThan', ctx);

    case 'largerThan':
      return file.sizeInBytes > condition.bytes;

    case 'kindEquals':
      return extensionHasKind(file.extension, condition.kind);

    case 'fromLocation':
      return file.location === condition.location;

    case 'timeOfDay': {
      if (condition.startHour >= condition.endHour) return false;
      const hour = ctx.now.getHours();
      return hour >= condition.startHour && hour < condition.endHour;
    }

    case 'dayOfWeek':
      return condition.days.includes(weekdayOf(ctx.now));

    case 'negated':
      return !evaluateCondition(file, condition.condition, ctx);
  }
}

/**
 * Joins a rule's primary conditions. `single` reads only the first condition;
 * an empty list never matches under any combinator.
 */
export function evaluateConditions(
  file: FileItem,
  conditions: readonly Condition[],
  combinator: 'single' | 'and' | 'or',
  ctx: EvaluationContext,
): boolean {
  if (conditions.length === 0) return false;
  switch (combinator) {
    case 'and':
      return conditions.every(c => evaluateCondition(file, c, ctx));
    case 'or':
      return conditions.some(c => evaluateCondition(file, c, ctx));
    case 'single':
      return evaluateCondition(file, conditions[0], ctx);
  }
}

// ── Description ────────────────────────────────────────────────────

export function describeCondition(condition: Condition): string {
  switch (condition.type) {
    case 'extensionEquals':
      return `extension is .${normalizeExtension(condition.value)}`;
    case 'nameContains':
      return `name contains '${condition.value}'`;
    case 'nameStartsWith':
      return `name starts with '${condition.value}'`;
    case 'nameEndsWith':
      return `name ends with '${condition.value}'`;
    case 'olderThan':
      return condition.extension
        ? `.${normalizeExtension(condition.extension)} older than ${condition.days} days`
        : `older than ${condition.days} days`;
    case 'modifiedOlderThan':
      return `not modified in ${condition.days} days`;
    case 'accessedOlderThan':
      return `not opened in ${condition.days} days`;
    case 'largerThan':
      return `larger than ${formatBytes(condition.bytes)}`;
    case 'kindEquals':
      return `file kind is ${condition.kind}`;
    case 'fromLocation':
      return `from ${LOCATION_NAMES[condition.location] ?? condition.location}`;
    case 'timeOfDay':
      return `between ${condition.startHour}:00 and ${condition.endHour}:00`;
    case 'dayOfWeek': {
      const names = condition.days
        .filter(d => d >= 1 && d <= 7)
        .map(d => DAY_NAMES[d - 1]);
      return `on ${names.join(', ')}`;
    }
    case 'negated':
      return `NOT (${describeCondition(condition.condition)})`;
  }
}

/** The kind a condition scores and compares as; `negated` delegates to its operand. */
export function baseConditionType(condition: Condition): Exclude<ConditionType, 'negated'> {
  return condition.type === 'negated' ? baseConditionType(condition.condition) : condition.type;
}

/** Canonical text for a condition, for set comparison and signatures. */
export function conditionKey(condition: Condition): string {
  switch (condition.type) {
    case 'extensionEquals':
      return `extensionEquals:${normalizeExtension(condition.value)}`;
    case 'nameStartsWith':
    case 'nameContains':
    case 'nameEndsWith':
      return `${condition.type}:${condition.value.toLowerCase()}`;
    case 'olderThan':
      return `olderThan:${condition.days}:${condition.extension ? normalizeExtension(condition.extension) : ''}`;
    case 'modifiedOlderThan':
    case 'accessedOlderThan':
      return `${condition.type}:${condition.days}`;
    case 'largerThan':
      return `largerThan:${condition.bytes}`;
    case 'kindEquals':
      return `kindEquals:${condition.kind.toLowerCase()}`;
    case 'fromLocation':
      return `fromLocation:${condition.location}`;
    case 'timeOfDay':
      return `timeOfDay:${condition.startHour}-${condition.endHour}`;
    case 'dayOfWeek':
      return `dayOfWeek:${[...new Set(condition.days)].sort((a, b) => a - b).join(',')}`;
    case 'negated':
      return `not(${conditionKey(condition.condition)})`;
  }
}

export function conditionsEqual(a: Condition, b: Condition): boolean {
  return conditionKey(a) === conditionKey(b);
}
