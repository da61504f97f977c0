export {
  inducePatterns,
  detectSimplePatterns,
  detectMultiConditionPatterns,
  detectTemporalPatterns,
  detectNegativePatterns,
  deduplicatePatterns,
  buildPattern,
  patternSignature,
} from './learner.js';
export type { InduceOptions } from './learner.js';

export {
  findMatchingPattern,
  shouldSuppress,
  filterSuggestionsWithNegativePatterns,
  filterSuggestions,
  shouldSuggest,
  confidenceLevel,
  patternToRule,
  recordNewOccurrence,
  convertToNegativePattern,
  recordRejection,
  markAsConverted,
  mergePatterns,
  recordPredictionOutcome,
} from './patterns.js';
export type { PatternMatchOptions, RuleOverrides, PredictionOutcome } from './patterns.js';

export { extractDestination, extractRejectedDestination, abbreviatePath } from './extract.js';
export { temporalContext, timeBucket, categorizeContexts } from './temporal.js';
export {
  LearnerConfigSchema,
  DEFAULT_LEARNER_CONFIG,
  resolveLearnerConfig,
} from './config.js';
export type { LearnerConfig, LearnerConfigInput } from './config.js';
