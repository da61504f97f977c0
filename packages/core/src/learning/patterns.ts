/**
 * Operations on learned patterns: matching files, filtering suggestions,
 * converting to rules, and recording feedback.
 *
 * Patterns are values. Every update returns a new pattern.
 */

import type { Condition, FileItem, LearnedPattern, Rule } from '../types.js';
import { folderPlaceholder } from '../types.js';
import { describeCondition, evaluateCondition } from '../engine/conditions.js';
import type { EvaluationContext, Logger } from '../engine/types.js';
import { clamp01 } from '../utils.js';
import { DEFAULT_LEARNER_CONFIG, type LearnerConfig } from './config.js';
import { folderName } from './extract.js';
import { categorizeContexts, temporalContext } from './temporal.js';

// ── Matching ───────────────────────────────────────────────────────

export interface PatternMatchOptions {
  now?: Date;
  logger?: Logger;
  config?: Pick<LearnerConfig, 'maxPatternRejections'>;
}

function byConfidence(patterns: readonly LearnedPattern[]): LearnedPattern[] {
  return [...patterns].sort((a, b) => b.confidenceScore - a.confidenceScore);
}

/**
 * The most confident positive pattern whose every condition holds for the file.
 * Negative patterns, patterns rejected too often, and patterns with no
 * conditions never match.
 */
export function findMatchingPattern(
  file: FileItem,
  patterns: readonly LearnedPattern[],
  options: PatternMatchOptions = {},
): LearnedPattern | undefined {
  const maxRejections = options.config?.maxPatternRejections ?? DEFAULT_LEARNER_CONFIG.maxPatternRejections;
  const ctx: EvaluationContext = { now: options.now ?? new Date(), logger: options.logger ?? console };

  return byConfidence(patterns).find(
    pattern =>
      !pattern.isNegative &&
      pattern.rejectionCount < maxRejections &&
      pattern.conditions.length > 0 &&
      pattern.conditions.every(c => evaluateCondition(file, c, ctx)),
  );
}

// ── Suggestion filtering ───────────────────────────────────────────

function primaryExtension(pattern: Pick<LearnedPattern, 'conditions' | 'fileExtension'>): string {
  const condition = pattern.conditions.find(
    (c): c is Extract<Condition, { type: 'extensionEquals' }> => c.type === 'extensionEquals',
  );
  return (condition?.value ?? pattern.fileExtension).toLowerCase();
}

/** Whether a negative pattern vetoes suggesting `destination` for `extension`. */
export function shouldSuppress(negative: LearnedPattern, extension: string, destination: string): boolean {
  if (!negative.isNegative) return false;
  return primaryExtension(negative) === extension.toLowerCase() && negative.destinationPath === destination;
}

export function filterSuggestionsWithNegativePatterns(
  suggestions: readonly LearnedPattern[],
  negativePatterns: readonly LearnedPattern[],
): LearnedPattern[] {
  return suggestions.filter(
    suggestion =>
      !negativePatterns.some(negative =>
        shouldSuppress(negative, suggestion.fileExtension, suggestion.destinationPath),
      ),
  );
}

/**
 * Drops suggestions vetoed by a negative pattern, then those that more than
 * half of the same-extension files have individually rejected.
 */
export function filterSuggestions(
  suggestions: readonly LearnedPattern[],
  negativePatterns: readonly LearnedPattern[],
  files: readonly FileItem[],
  config: Pick<LearnerConfig, 'fileRejectionThreshold' | 'fileRejectionRate'> = DEFAULT_LEARNER_CONFIG,
): LearnedPattern[] {
  return filterSuggestionsWithNegativePatterns(suggestions, negativePatterns).filter(suggestion => {
    const ext = suggestion.fileExtension.toLowerCase();
    const relevant = files.filter(f => f.extension.toLowerCase() === ext);
    if (relevant.length === 0) return true;

    const rejecting = relevant.filter(
      f =>
        f.rejectedDestination === suggestion.destinationPath &&
        f.rejectionCount >= config.fileRejectionThreshold,
    );
    return rejecting.length / relevant.length <= config.fileRejectionRate;
  });
}

export function shouldSuggest(
  pattern: LearnedPattern,
  config: Pick<LearnerConfig, 'maxPatternRejections' | 'suggestionConfidence'> = DEFAULT_LEARNER_CONFIG,
): boolean {
  return (
    !pattern.isNegative &&
    !pattern.convertedToRule &&
    pattern.rejectionCount < config.maxPatternRejections &&
    pattern.confidenceScore >= config.suggestionConfidence
  );
}

export function confidenceLevel(score: number): 'High' | 'Medium' | 'Low' {
  if (score >= 0.7) return 'High';
  if (score >= 0.5) return 'Medium';
  return 'Low';
}

// ── Conversion ─────────────────────────────────────────────────────

export interface RuleOverrides {
  id?: string;
  name?: string;
  isEnabled?: boolean;
  sortOrder?: number;
  creationDate?: string;
}

/**
 * Builds a rule with the pattern's conditions and combinator unchanged and a
 * placeholder destination. Disabled unless the caller says otherwise.
 */
export function patternToRule(pattern: LearnedPattern, overrides: RuleOverrides = {}): Rule {
  const folder = folderName(pattern.destinationPath);
  const defaultName =
    pattern.conditions.length > 1
      ? `${pattern.conditions.slice(0, 2).map(describeCondition).join(' + ')} → ${folder}`
      : `${pattern.fileExtension.toUpperCase()} → ${folder}`;

  return {
    id: overrides.id ?? `rule_${pattern.id.replace(/^pat_/, '')}`,
    name: overrides.name ?? defaultName,
    conditions: pattern.conditions.map(c => structuredClone(c)),
    combinator: pattern.combinator,
    exclusions: [],
    action: 'move',
    destination: folderPlaceholder(pattern.destinationPath),
    isEnabled: overrides.isEnabled ?? false,
    sortOrder: overrides.sortOrder ?? 0,
    creationDate: overrides.creationDate ?? pattern.lastSeenDate,
  };
}

// ── Feedback ───────────────────────────────────────────────────────

export function recordNewOccurrence(
  pattern: LearnedPattern,
  confidenceScore: number,
  timestamp: string,
): LearnedPattern {
  const temporalContexts = [...pattern.temporalContexts, temporalContext(timestamp)];
  return {
    ...pattern,
    occurrenceCount: pattern.occurrenceCount + 1,
    confidenceScore: clamp01(confidenceScore),
    lastSeenDate: timestamp,
    temporalContexts,
    timeCategory: categorizeContexts(temporalContexts),
  };
}

/** The user never wants this suggestion: full confidence in the veto. */
export function convertToNegativePattern(pattern: LearnedPattern): LearnedPattern {
  return { ...pattern, isNegative: true, confidenceScore: 1 };
}

export function recordRejection(pattern: LearnedPattern): LearnedPattern {
  return { ...pattern, rejectionCount: pattern.rejectionCount + 1 };
}

export function markAsConverted(pattern: LearnedPattern, ruleId: string): LearnedPattern {
  return { ...pattern, convertedToRule: true, convertedRuleId: ruleId };
}

function samePair(a: LearnedPattern, b: LearnedPattern): boolean {
  return (
    a.isNegative === b.isNegative &&
    a.fileExtension === b.fileExtension &&
    a.destinationPath === b.destinationPath
  );
}

/**
 * Folds a fresh induction into stored patterns. Stored patterns whose
 * (extension, destination, polarity) was seen again record an occurrence with
 * the new confidence; the rest are appended.
 */
export function mergePatterns(
  existing: readonly LearnedPattern[],
  induced: readonly LearnedPattern[],
  timestamp: string,
): LearnedPattern[] {
  const updated = existing.map(stored => {
    const match = induced.find(p => samePair(p, stored));
    return match ? recordNewOccurrence(stored, match.confidenceScore, timestamp) : stored;
  });
  const added = induced.filter(p => !existing.some(stored => samePair(stored, p)));
  return [...updated, ...added];
}

export type PredictionOutcome = 'accepted' | 'overridden' | 'dismissed' | 'unknown';

/** Rejection bookkeeping on the file after the user reacts to a suggestion. */
export function recordPredictionOutcome(
  file: FileItem,
  predictedPath: string,
  outcome: PredictionOutcome,
): FileItem {
  switch (outcome) {
    case 'overridden':
    case 'dismissed':
      return { ...file, rejectedDestination: predictedPath, rejectionCount: file.rejectionCount + 1 };
    case 'accepted': {
      const { rejectedDestination: _rejected, ...rest } = file;
      return { ...rest, rejectionCount: 0 };
    }
    case 'unknown':
      return file;
  }
}
