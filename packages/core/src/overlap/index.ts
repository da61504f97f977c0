export { relateConditions, relateConditionSets, ASSUME_PARTIAL } from './relation.js';
export type { ConditionRelation, ConditionSet } from './relation.js';
export { detectOverlaps, classifyOverlap, sameDestination, OVERLAP_SEVERITY } from './detector.js';
export type { OverlapType, RuleOverlap, DetectOverlapOptions } from './detector.js';
