/**
 * Pattern Learner -- mines the activity log for repeated organisation habits.
 *
 * Four independent passes feed one candidate list:
 *   simple      extension → destination
 *   multi       extension + name prefix / keyword → destination
 *   temporal    extension → destination, concentrated in one time bucket
 *   negative    extension → destination the user keeps rejecting
 * Candidates are then deduplicated so the most specific pattern for a pair wins.
 *
 * Pure: no clock, no randomness, no I/O. The same log always yields the same list.
 */

import type { ActivityRecord, Combinator, Condition, LearnedPattern, TemporalContext } from '../types.js';
import { conditionKey } from '../engine/conditions.js';
import { clamp01, stableId } from '../utils.js';
import { DEFAULT_LEARNER_CONFIG, type LearnerConfig } from './config.js';
import {
  abbreviatePath,
  activityExtension,
  extractDestination,
  extractRejectedDestination,
} from './extract.js';
import {
  TIME_CATEGORY_LABELS,
  conditionsForBucket,
  temporalContext,
  timeBucket,
} from './temporal.js';

// ── Types ──────────────────────────────────────────────────────────

export interface InduceOptions {
  /** Collapsed to "~" in pattern descriptions. */
  homeDir?: string;
}

interface PatternDraft {
  description: string;
  fileExtension: string;
  destinationPath: string;
  conditions: Condition[];
  combinator: Combinator;
  occurrenceCount: number;
  confidenceScore: number;
  lastSeenDate: string;
  isNegative?: boolean;
  rejectionCount?: number;
  timeCategory?: LearnedPattern['timeCategory'];
  temporalContexts?: TemporalContext[];
  keywords?: string[];
}

// ── Helpers ────────────────────────────────────────────────────────

const ORGANIZE_TYPES = new Set<ActivityRecord['type']>(['organized', 'moved']);

function groupBy<T, K extends string>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

function latest(activities: readonly ActivityRecord[]): string {
  let max = Number.NEGATIVE_INFINITY;
  for (const a of activities) {
    const t = Date.parse(a.timestamp);
    if (t > max) max = t;
  }
  return new Date(max).toISOString();
}

export function patternSignature(p: Pick<LearnedPattern, 'fileExtension' | 'destinationPath' | 'conditions' | 'isNegative'>): string {
  const conditions = p.conditions.map(conditionKey).sort().join(',');
  return `${p.isNegative ? 'neg' : 'pos'}|${p.fileExtension}|${p.destinationPath}|${conditions}`;
}

export function buildPattern(draft: PatternDraft): LearnedPattern {
  const pattern: LearnedPattern = {
    id: '',
    description: draft.description,
    fileExtension: draft.fileExtension,
    destinationPath: draft.destinationPath,
    conditions: draft.conditions,
    combinator: draft.combinator,
    occurrenceCount: draft.occurrenceCount,
    confidenceScore: clamp01(draft.confidenceScore),
    lastSeenDate: draft.lastSeenDate,
    isNegative: draft.isNegative ?? false,
    rejectionCount: draft.rejectionCount ?? 0,
    timeCategory: draft.timeCategory ?? 'anyTime',
    temporalContexts: draft.temporalContexts ?? [],
    keywords: draft.keywords ?? [],
    convertedToRule: false,
  };
  pattern.id = stableId('pat', patternSignature(pattern));
  return pattern;
}

/** Records whose timestamp does not parse are left out of every pass. */
function hasValidTimestamp(activity: ActivityRecord): boolean {
  return !Number.isNaN(Date.parse(activity.timestamp));
}

function organizeActivities(activities: readonly ActivityRecord[]): ActivityRecord[] {
  return activities.filter(a => ORGANIZE_TYPES.has(a.type) && hasValidTimestamp(a));
}

// ── Passes ─────────────────────────────────────────────────────────

export function detectSimplePatterns(
  activities: readonly ActivityRecord[],
  config: LearnerConfig = DEFAULT_LEARNER_CONFIG,
  options: InduceOptions = {},
): LearnedPattern[] {
  const patterns: LearnedPattern[] = [];
  const byExtension = groupBy(organizeActivities(activities), activityExtension);

  for (const [ext, forExtension] of byExtension) {
    if (!ext) continue;
    const byDestination = groupBy(forExtension, a => extractDestination(a.details));

    for (const [destination, forDestination] of byDestination) {
      if (!destination) continue;
      const count = forDestination.length;
      if (count < config.minimumOccurrences) continue;

      patterns.push(
        buildPattern({
          description: `Move ${ext.toUpperCase()} files to ${abbreviatePath(destination, options.homeDir)}`,
          fileExtension: ext,
          destinationPath: destination,
          conditions: [{ type: 'extensionEquals', value: ext }],
          combinator: 'single',
          occurrenceCount: count,
          confidenceScore: count / forExtension.length,
          lastSeenDate: latest(forDestination),
        }),
      );
    }
  }
  return patterns;
}

interface NameFeature {
  condition: Condition;
  keyword: string;
  boost: number;
  describe: (ext: string, destination: string) => string;
  matches: (fileName: string) => boolean;
}

function nameFeatures(config: LearnerConfig, options: InduceOptions): NameFeature[] {
  const prefixes = config.prefixes.map<NameFeature>(prefix => ({
    condition: { type: 'nameStartsWith', value: prefix },
    keyword: prefix.toLowerCase(),
    boost: config.prefixBoost,
    describe: (ext, dest) => `Move ${prefix} ${ext.toUpperCase()} files to ${abbreviatePath(dest, options.homeDir)}`,
    matches: name => name.toLowerCase().startsWith(prefix.toLowerCase()),
  }));
  const keywords = config.keywords.map<NameFeature>(keyword => ({
    condition: { type: 'nameContains', value: keyword },
    keyword: keyword.toLowerCase(),
    boost: config.keywordBoost,
    describe: (ext, dest) =>
      `Move ${ext.toUpperCase()} files containing '${keyword}' to ${abbreviatePath(dest, options.homeDir)}`,
    matches: name => name.toLowerCase().includes(keyword.toLowerCase()),
  }));
  return [...prefixes, ...keywords];
}

export function detectMultiConditionPatterns(
  activities: readonly ActivityRecord[],
  config: LearnerConfig = DEFAULT_LEARNER_CONFIG,
  options: InduceOptions = {},
): LearnedPattern[] {
  const patterns: LearnedPattern[] = [];
  const byExtension = groupBy(organizeActivities(activities), activityExtension);
  const features = nameFeatures(config, options);

  for (const [ext, forExtension] of byExtension) {
    if (!ext) continue;

    for (const feature of features) {
      const matching = forExtension.filter(a => feature.matches(a.fileName));
      if (matching.length < config.minimumOccurrences) continue;

      const byDestination = groupBy(matching, a => extractDestination(a.details));
      for (const [destination, forDestination] of byDestination) {
        if (!destination) continue;
        const count = forDestination.length;
        if (count < config.minimumOccurrences) continue;

        patterns.push(
          buildPattern({
            description: feature.describe(ext, destination),
            fileExtension: ext,
            destinationPath: destination,
            conditions: [{ type: 'extensionEquals', value: ext }, feature.condition],
            combinator: 'and',
            occurrenceCount: count,
            confidenceScore: Math.min(1, (count / matching.length) * feature.boost),
            lastSeenDate: latest(forDestination),
            keywords: [feature.keyword],
          }),
        );
      }
    }
  }
  return patterns;
}

export function detectTemporalPatterns(
  activities: readonly ActivityRecord[],
  config: LearnerConfig = DEFAULT_LEARNER_CONFIG,
  options: InduceOptions = {},
): LearnedPattern[] {
  const organize = organizeActivities(activities);
  const patterns: LearnedPattern[] = [];
  const overallByExtension = groupBy(organize, activityExtension);
  const byBucket = groupBy(organize, a => timeBucket(temporalContext(a.timestamp)));

  for (const [bucket, inBucket] of byBucket) {
    if (inBucket.length < config.minimumOccurrences) continue;

    for (const [ext, forExtension] of groupBy(inBucket, activityExtension)) {
      if (!ext) continue;
      const overall = overallByExtension.get(ext) ?? forExtension;

      for (const [destination, forDestination] of groupBy(forExtension, a => extractDestination(a.details))) {
        if (!destination) continue;
        const count = forDestination.length;
        if (count < config.minimumOccurrences) continue;

        const overallToDestination = overall.filter(a => extractDestination(a.details) === destination).length;
        const overallRatio = overallToDestination / overall.length;
        const slotRatio = count / forExtension.length;
        if (!(slotRatio > overallRatio * config.temporalRatio)) continue;

        patterns.push(
          buildPattern({
            description: `During ${TIME_CATEGORY_LABELS[bucket]}: Move ${ext.toUpperCase()} files to ${abbreviatePath(destination, options.homeDir)}`,
            fileExtension: ext,
            destinationPath: destination,
            conditions: [{ type: 'extensionEquals', value: ext }, ...conditionsForBucket(bucket)],
            combinator: 'and',
            occurrenceCount: count,
            confidenceScore: slotRatio,
            lastSeenDate: latest(forDestination),
            timeCategory: bucket,
            temporalContexts: forDestination.map(a => temporalContext(a.timestamp)),
          }),
        );
      }
    }
  }
  return patterns;
}

export function detectNegativePatterns(
  activities: readonly ActivityRecord[],
  config: LearnerConfig = DEFAULT_LEARNER_CONFIG,
  options: InduceOptions = {},
): LearnedPattern[] {
  const skipped = activities.filter(a => a.type === 'skipped' && hasValidTimestamp(a));
  if (skipped.length < config.minimumRejections) return [];

  const patterns: LearnedPattern[] = [];
  for (const [ext, forExtension] of groupBy(skipped, activityExtension)) {
    if (!ext || forExtension.length < config.minimumRejections) continue;

    for (const [destination, rejections] of groupBy(forExtension, a => extractRejectedDestination(a.details))) {
      if (!destination) continue;
      const count = rejections.length;
      if (count < config.minimumRejections) continue;

      patterns.push(
        buildPattern({
          description: `Don't suggest ${abbreviatePath(destination, options.homeDir)} for ${ext.toUpperCase()} files`,
          fileExtension: ext,
          destinationPath: destination,
          conditions: [{ type: 'extensionEquals', value: ext }],
          combinator: 'single',
          occurrenceCount: count,
          confidenceScore: Math.min(config.negativeCap, count / config.negativeDivisor),
          lastSeenDate: latest(rejections),
          isNegative: true,
          rejectionCount: count,
        }),
      );
    }
  }
  return patterns;
}

// ── Deduplication ──────────────────────────────────────────────────

/**
 * Keeps the most specific pattern per (extension, destination). Multi-condition
 * patterns are unique by their condition set; a single-condition pattern is
 * dropped once a more specific one for the same pair of the same polarity is kept.
 */
export function deduplicatePatterns(patterns: readonly LearnedPattern[]): LearnedPattern[] {
  const sorted = [...patterns].sort(
    (a, b) => b.conditions.length - a.conditions.length || b.confidenceScore - a.confidenceScore,
  );

  const kept: LearnedPattern[] = [];
  const seen = new Set<string>();

  for (const pattern of sorted) {
    if (pattern.conditions.length > 1) {
      const signature = patternSignature(pattern);
      if (seen.has(signature)) continue;
      seen.add(signature);
      kept.push(pattern);
      continue;
    }

    const pairKey = `${pattern.isNegative ? 'neg' : 'pos'}|${pattern.fileExtension}|${pattern.destinationPath}`;
    const superseded = kept.some(
      existing =>
        existing.isNegative === pattern.isNegative &&
        existing.fileExtension === pattern.fileExtension &&
        existing.destinationPath === pattern.destinationPath &&
        existing.conditions.length > pattern.conditions.length,
    );
    if (superseded || seen.has(pairKey)) continue;
    seen.add(pairKey);
    kept.push(pattern);
  }
  return kept;
}

// ── Entry point ────────────────────────────────────────────────────

/** All passes, deduplicated, most confident first. */
export function inducePatterns(
  activities: readonly ActivityRecord[],
  config: LearnerConfig = DEFAULT_LEARNER_CONFIG,
  options: InduceOptions = {},
): LearnedPattern[] {
  const candidates = [
    ...detectSimplePatterns(activities, config, options),
    ...detectMultiConditionPatterns(activities, config, options),
    ...detectTemporalPatterns(activities, config, options),
    ...detectNegativePatterns(activities, config, options),
  ];
  return deduplicatePatterns(candidates).sort((a, b) => b.confidenceScore - a.confidenceScore);
}
