export { ClassificationEngine, sortRules, clearDecision, applyDecision } from './classifier.js';
export {
  evaluateCondition,
  evaluateConditions,
  describeCondition,
  baseConditionType,
  conditionKey,
  conditionsEqual,
  weekdayOf,
} from './conditions.js';
export { ruleConfidence, confidenceForConditions, matchReason, COMPOUND_CONFIDENCE } from './scoring.js';
export { checkCategoryScope, scopeContains, scopesMayOverlap, isWithinFolder } from './scope.js';
export type { ScopeVerdict } from './scope.js';
export { silentLogger } from './types.js';
export type { DestinationResolver, EngineOptions, EvaluationContext, Logger, Clock } from './types.js';
