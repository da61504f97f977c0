import { z } from 'zod';
import { DEFAULT_VOCABULARY } from '../lookup.js';

/**
 * Learner thresholds. Every number the induction passes compare against
 * lives here so a workspace can tune it.
 */
export const LearnerConfigSchema = z.object({
  /** Occurrences needed before a positive pattern is proposed. */
  minimumOccurrences: z.number().int().positive().default(3),
  /** Rejections of one (extension, destination) pair before it is suppressed. */
  minimumRejections: z.number().int().positive().default(2),
  /** In-bucket ratio must beat the overall ratio by more than this factor. */
  temporalRatio: z.number().positive().default(1.3),
  negativeDivisor: z.number().positive().default(5),
  negativeCap: z.number().min(0).max(1).default(0.9),
  prefixBoost: z.number().positive().default(1.15),
  keywordBoost: z.number().positive().default(1.1),
  /** Patterns rejected this many times are no longer matched or suggested. */
  maxPatternRejections: z.number().int().positive().default(3),
  suggestionConfidence: z.number().min(0).max(1).default(0.5),
  /** A file counts as rejecting a destination after this many rejections. */
  fileRejectionThreshold: z.number().int().positive().default(2),
  /** Suggestions rejected by more than this share of same-extension files are dropped. */
  fileRejectionRate: z.number().min(0).max(1).default(0.5),
  prefixes: z.array(z.string().min(1)).default([...DEFAULT_VOCABULARY.prefixes]),
  keywords: z.array(z.string().min(1)).default([...DEFAULT_VOCABULARY.keywords]),
});

export type LearnerConfig = z.infer<typeof LearnerConfigSchema>;
export type LearnerConfigInput = z.input<typeof LearnerConfigSchema>;

export const DEFAULT_LEARNER_CONFIG: LearnerConfig = LearnerConfigSchema.parse({});

export function resolveLearnerConfig(overrides: LearnerConfigInput = {}): LearnerConfig {
  return LearnerConfigSchema.parse(overrides);
}
