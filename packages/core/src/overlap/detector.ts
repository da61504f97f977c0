/**
 * Overlap Detector -- warns about redundant or conflicting rules before a
 * candidate rule is saved.
 */

import type { CategoryScope, Destination, Rule } from '../types.js';
import { scopesMayOverlap } from '../engine/scope.js';
import { relateConditionSets, type ConditionRelation } from './relation.js';

export type OverlapType =
  | 'exactDuplicate'
  | 'conflictingDestination'
  | 'subset'
  | 'superset'
  | 'partialOverlap';

export const OVERLAP_SEVERITY: Record<OverlapType, number> = {
  exactDuplicate: 3,
  conflictingDestination: 2,
  subset: 1,
  superset: 1,
  partialOverlap: 0,
};

export interface RuleOverlap {
  existingRule: Rule;
  type: OverlapType;
  severity: number;
  explanation: string;
  suggestion?: string;
}

export interface DetectOverlapOptions {
  /** The rule being edited, so it isn't compared against itself. */
  excludeRuleId?: string;
}

export function sameDestination(a: Destination | undefined, b: Destination | undefined): boolean {
  if (!a || !b) return !a && !b;
  if (a.kind === 'trash' || b.kind === 'trash') return a.kind === b.kind;
  return a.displayPath === b.displayPath;
}

/** Combines the condition relation with destination equality. */
export function classifyOverlap(relation: ConditionRelation, destinationsMatch: boolean): OverlapType | null {
  switch (relation) {
    case 'identical':
      return destinationsMatch ? 'exactDuplicate' : 'conflictingDestination';
    case 'subset':
      return 'subset';
    case 'superset':
      return 'superset';
    case 'partial':
      return destinationsMatch ? null : 'partialOverlap';
    case 'none':
      return null;
  }
}

const GLOBAL_SCOPE: CategoryScope = { kind: 'global' };

function scopeOf(rule: Rule): CategoryScope {
  return rule.category?.scope ?? GLOBAL_SCOPE;
}

function label(rule: Rule): string {
  return `'${rule.category?.name ?? 'General'}/${rule.name}'`;
}

function destinationLabel(destination: Destination | undefined): string {
  if (!destination) return 'no destination';
  return destination.kind === 'trash' ? 'Trash' : destination.displayPath;
}

function describe(type: OverlapType, candidate: Rule, existing: Rule): Pick<RuleOverlap, 'explanation' | 'suggestion'> {
  const other = label(existing);
  switch (type) {
    case 'exactDuplicate':
      return {
        explanation: `This rule is identical to ${other}.`,
        suggestion: `Remove one of them, or change the conditions of ${other}.`,
      };
    case 'conflictingDestination':
      return {
        explanation: `Same conditions as ${other}, but files go to ${destinationLabel(candidate.destination)} instead of ${destinationLabel(existing.destination)}.`,
        suggestion: 'Only the higher-priority rule will ever apply. Merge them or narrow one.',
      };
    case 'subset':
      return {
        explanation: `Every file this rule matches is also matched by ${other}.`,
        suggestion: `Give this rule a higher priority than ${other} so it can take effect.`,
      };
    case 'superset':
      return {
        explanation: `This rule also matches every file ${other} matches.`,
        suggestion: `Keep ${other} at a higher priority so its narrower match is not shadowed.`,
      };
    case 'partialOverlap':
      return {
        explanation: `Some files may match both this rule and ${other}, with different destinations.`,
      };
  }
}

/**
 * Pairs the candidate with each enabled existing rule and reports how their
 * match sets relate, most severe first. Rules whose scopes cannot meet are
 * skipped, as are benign partial overlaps that share a destination.
 */
export function detectOverlaps(
  candidate: Rule,
  existingRules: readonly Rule[],
  options: DetectOverlapOptions = {},
): RuleOverlap[] {
  const overlaps: RuleOverlap[] = [];

  for (const existing of existingRules) {
    if (!existing.isEnabled) continue;
    if (options.excludeRuleId !== undefined && existing.id === options.excludeRuleId) continue;
    if (!scopesMayOverlap(scopeOf(candidate), scopeOf(existing))) continue;

    const relation = relateConditionSets(candidate, existing);
    const type = classifyOverlap(relation, sameDestination(candidate.destination, existing.destination));
    if (!type) continue;

    overlaps.push({
      existingRule: existing,
      type,
      severity: OVERLAP_SEVERITY[type],
      ...describe(type, candidate, existing),
    });
  }

  // Array.prototype.sort is stable, so equal severities keep rule order.
  return overlaps.sort((a, b) => b.severity - a.severity);
}
