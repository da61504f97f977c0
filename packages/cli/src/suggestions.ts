import {
  type LearnedPattern,
  type LearnerConfig,
  filterSuggestions,
  shouldSuggest,
} from '@filewise/core';

/** Patterns worth offering as rules, most confident first. */
export function liveSuggestions(patterns: readonly LearnedPattern[], config: LearnerConfig): LearnedPattern[] {
  const negative = patterns.filter(p => p.isNegative);
  const candidates = patterns.filter(p => shouldSuggest(p, config));
  return filterSuggestions(candidates, negative, [], config).sort((a, b) => b.confidenceScore - a.confidenceScore);
}
