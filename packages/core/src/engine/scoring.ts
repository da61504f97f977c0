/**
 * Rule-level confidence and match explanations.
 * Confidence reflects how specific the rule is, not how well a file fits it.
 */

import type { Condition, ConditionType, Rule } from '../types.js';
import { baseConditionType, describeCondition } from './conditions.js';

export const COMPOUND_CONFIDENCE = 0.9;
export const FALLBACK_CONFIDENCE = 0.5;

const SINGLE_CONDITION_CONFIDENCE: Record<Exclude<ConditionType, 'negated'>, number> = {
  extensionEquals: 0.5,
  nameContains: 0.7,
  nameStartsWith: 0.7,
  nameEndsWith: 0.7,
  olderThan: 0.7,
  modifiedOlderThan: 0.7,
  accessedOlderThan: 0.7,
  timeOfDay: 0.7,
  dayOfWeek: 0.7,
  largerThan: 0.7,
  kindEquals: 0.6,
  fromLocation: 0.8,
};

export function confidenceForConditions(conditions: readonly Condition[]): number {
  if (conditions.length > 1) return COMPOUND_CONFIDENCE;
  if (conditions.length === 0) return FALLBACK_CONFIDENCE;
  return SINGLE_CONDITION_CONFIDENCE[baseConditionType(conditions[0])];
}

export function ruleConfidence(rule: Pick<Rule, 'conditions'>): number {
  return confidenceForConditions(rule.conditions);
}

export function matchReason(rule: Pick<Rule, 'conditions' | 'combinator'>): string {
  if (rule.conditions.length === 0) return 'Matches rule condition';
  const joiner = rule.combinator === 'and' ? ' AND ' : ' OR ';
  const text = rule.conditions.map(describeCondition).join(joiner);
  return text.charAt(0).toUpperCase() + text.slice(1);
}
