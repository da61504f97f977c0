/**
 * Condition relation algebra: how the match sets of two conditions (or two
 * condition sets) relate.
 *
 *   identical   same files
 *   subset      the first matches only files the second also matches
 *   superset    the reverse
 *   partial     some files may match both
 *   none        no file can match both
 */

import type { Combinator, Condition } from '../types.js';
import { conditionKey } from '../engine/conditions.js';

export type ConditionRelation = 'identical' | 'subset' | 'superset' | 'partial' | 'none';

/**
 * Different condition kinds test different attributes, so any file could
 * satisfy both. This is the only default for pairs not compared below.
 */
export const ASSUME_PARTIAL: ConditionRelation = 'partial';

// ── Value comparators ──────────────────────────────────────────────

function normalizeExt(ext: string | undefined): string {
  return (ext ?? '').trim().replace(/^\./, '').toLowerCase();
}

function equalOrNone(a: string, b: string): ConditionRelation {
  return a.toLowerCase() === b.toLowerCase() ? 'identical' : 'none';
}

/** `narrows(x, y)`: every name satisfying x also satisfies y. */
function textRelation(a: string, b: string, narrows: (x: string, y: string) => boolean): ConditionRelation {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  if (x === y) return 'identical';
  if (narrows(x, y)) return 'subset';
  if (narrows(y, x)) return 'superset';
  // Non-nesting values are treated as unrelated, substrings included.
  return 'none';
}

/** Higher lower-bound is stricter: "older than 30 days" ⊂ "older than 7 days". */
function lowerBoundRelation(a: number, b: number): ConditionRelation {
  if (a === b) return 'identical';
  return a > b ? 'subset' : 'superset';
}

function olderThanRelation(
  a: Extract<Condition, { type: 'olderThan' }>,
  b: Extract<Condition, { type: 'olderThan' }>,
): ConditionRelation {
  const extA = normalizeExt(a.extension);
  const extB = normalizeExt(b.extension);
  if (extA === extB) return lowerBoundRelation(a.days, b.days);
  if (extA && extB) return 'none';
  // Exactly one is filtered by extension: it is narrower if its bound is too.
  if (extA && a.days >= b.days) return 'subset';
  if (extB && b.days >= a.days) return 'superset';
  return 'partial';
}

function windowRelation(
  a: Extract<Condition, { type: 'timeOfDay' }>,
  b: Extract<Condition, { type: 'timeOfDay' }>,
): ConditionRelation {
  if (a.startHour >= a.endHour || b.startHour >= b.endHour) return 'none';
  if (a.startHour === b.startHour && a.endHour === b.endHour) return 'identical';
  if (a.startHour >= b.startHour && a.endHour <= b.endHour) return 'subset';
  if (b.startHour >= a.startHour && b.endHour <= a.endHour) return 'superset';
  if (a.endHour <= b.startHour || b.endHour <= a.startHour) return 'none';
  return 'partial';
}

function setRelation(a: readonly number[], b: readonly number[]): ConditionRelation {
  const sa = new Set(a);
  const sb = new Set(b);
  const aInB = [...sa].every(d => sb.has(d));
  const bInA = [...sb].every(d => sa.has(d));
  if (aInB && bInA) return 'identical';
  if (aInB) return 'subset';
  if (bInA) return 'superset';
  return [...sa].some(d => sb.has(d)) ? 'partial' : 'none';
}

/** NOT flips containment; two negations can almost always co-match. */
function invert(relation: ConditionRelation): ConditionRelation {
  switch (relation) {
    case 'identical':
      return 'identical';
    case 'subset':
      return 'superset';
    case 'superset':
      return 'subset';
    case 'partial':
    case 'none':
      return 'partial';
  }
}

// ── Pairwise dispatch ──────────────────────────────────────────────

/** Relation for two conditions of the same kind; undefined when kinds differ. */
function compareSameKind(a: Condition, b: Condition): ConditionRelation | undefined {
  switch (a.type) {
    case 'extensionEquals':
      return b.type === a.type ? equalOrNone(normalizeExt(a.value), normalizeExt(b.value)) : undefined;
    case 'nameContains':
      return b.type === a.type ? textRelation(a.value, b.value, (x, y) => x.includes(y)) : undefined;
    case 'nameStartsWith':
      return b.type === a.type ? textRelation(a.value, b.value, (x, y) => x.startsWith(y)) : undefined;
    case 'nameEndsWith':
      return b.type === a.type ? textRelation(a.value, b.value, (x, y) => x.endsWith(y)) : undefined;
    case 'largerThan':
      return b.type === a.type ? lowerBoundRelation(a.bytes, b.bytes) : undefined;
    case 'olderThan':
      return b.type === a.type ? olderThanRelation(a, b) : undefined;
    case 'modifiedOlderThan':
    case 'accessedOlderThan':
      return b.type === a.type ? lowerBoundRelation(a.days, b.days) : undefined;
    case 'kindEquals':
      return b.type === a.type ? equalOrNone(a.kind, b.kind) : undefined;
    case 'fromLocation':
      return b.type === a.type ? equalOrNone(a.location, b.location) : undefined;
    case 'timeOfDay':
      return b.type === a.type ? windowRelation(a, b) : undefined;
    case 'dayOfWeek':
      return b.type === a.type ? setRelation(a.days, b.days) : undefined;
    case 'negated':
      return b.type === a.type ? invert(relateConditions(a.condition, b.condition)) : undefined;
  }
}

export function relateConditions(a: Condition, b: Condition): ConditionRelation {
  const same = compareSameKind(a, b);
  if (same !== undefined) return same;

  // A condition and its own negation are complementary.
  if (a.type === 'negated' && conditionKey(a.condition) === conditionKey(b)) return 'none';
  if (b.type === 'negated' && conditionKey(b.condition) === conditionKey(a)) return 'none';

  return ASSUME_PARTIAL;
}

// ── Condition sets ─────────────────────────────────────────────────

export interface ConditionSet {
  conditions: readonly Condition[];
  combinator: Combinator;
}

/** The conditions the engine actually evaluates: `single` reads only the first. */
function effectiveConditions(set: ConditionSet): readonly Condition[] {
  return set.combinator === 'single' ? set.conditions.slice(0, 1) : set.conditions;
}

function isConjunctive(set: ConditionSet, effective: readonly Condition[]): boolean {
  return set.combinator !== 'or' || effective.length === 1;
}

function containsAll(outer: readonly Condition[], inner: readonly Condition[]): boolean {
  const keys = new Set(outer.map(conditionKey));
  return inner.every(c => keys.has(conditionKey(c)));
}

/**
 * Relation between two rules' primary conditions.
 * With AND, more conditions means fewer files, so a rule whose conditions are
 * a proper subset of the other's is the broader (superset) rule.
 */
export function relateConditionSets(first: ConditionSet, second: ConditionSet): ConditionRelation {
  const a = effectiveConditions(first);
  const b = effectiveConditions(second);
  if (a.length === 0 || b.length === 0) return 'none';

  if (a.length === 1 && b.length === 1) return relateConditions(a[0], b[0]);

  const sameCombinator = first.combinator === second.combinator || (a.length === 1 && b.length === 1);
  if (a.length === b.length && sameCombinator && containsAll(a, b) && containsAll(b, a)) {
    return 'identical';
  }

  if (isConjunctive(first, a) && isConjunctive(second, b)) {
    if (a.length < b.length && containsAll(b, a)) return 'superset';
    if (b.length < a.length && containsAll(a, b)) return 'subset';
  }

  const anyOverlap = a.some(x => b.some(y => relateConditions(x, y) !== 'none'));
  return anyOverlap ? 'partial' : 'none';
}
