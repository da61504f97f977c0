import type { ClassificationEngine } from './engine/classifier.js';
import { applyDecision } from './engine/classifier.js';
import type { Destination, ExternalPrediction, FileItem, LearnedPattern, Rule } from './types.js';
import { folderPlaceholder } from './types.js';
import { DEFAULT_LEARNER_CONFIG, type LearnerConfig } from './learning/config.js';
import { filterSuggestionsWithNegativePatterns, findMatchingPattern } from './learning/patterns.js';
import { clamp01 } from './utils.js';

export type PredictionSource = Map<string, ExternalPrediction> | Readonly<Record<string, ExternalPrediction>>;

export interface SuggestionOptions {
  engine: ClassificationEngine;
  rules: readonly Rule[];
  patterns?: readonly LearnedPattern[];
  /** Predictions keyed by file path. */
  predictions?: PredictionSource;
  config?: Pick<LearnerConfig, 'maxPatternRejections'>;
  now?: Date;
}

function predictionFor(source: PredictionSource | undefined, path: string): ExternalPrediction | undefined {
  if (!source) return undefined;
  if (source instanceof Map) return source.get(path);
  return Object.hasOwn(source, path) ? source[path] : undefined;
}

function usable(engine: ClassificationEngine, destination: Destination): Destination | null {
  return destination.kind === 'trash' ? destination : engine.resolveDestination(destination);
}

/**
 * Rules first, then learned patterns for files no rule placed, then external
 * predictions for whatever is still pending. Each decided file records which
 * source placed it.
 */
export function applySuggestions(files: readonly FileItem[], options: SuggestionOptions): FileItem[] {
  const { engine, rules } = options;
  const negative = (options.patterns ?? []).filter(p => p.isNegative);
  const positive = filterSuggestionsWithNegativePatterns(
    (options.patterns ?? []).filter(p => !p.isNegative),
    negative,
  );
  const config = options.config ?? DEFAULT_LEARNER_CONFIG;
  const now = options.now ?? engine.now();

  return engine.classifyBatch(files, rules).map(file => {
    if (file.status !== 'pending') return file;

    const pattern = findMatchingPattern(file, positive, { now, config, logger: engine.logger });
    if (pattern) {
      const destination = usable(engine, folderPlaceholder(pattern.destinationPath));
      if (destination) {
        return applyDecision(file, {
          destination,
          matchReason: `Based on learned pattern: ${pattern.description}`,
          confidenceScore: pattern.confidenceScore,
          suggestionSource: 'pattern',
        });
      }
    }

    const prediction = predictionFor(options.predictions, file.path);
    if (prediction) {
      const destination = usable(engine, prediction.destination);
      if (destination) {
        return applyDecision(file, {
          destination,
          matchReason: prediction.explanation,
          confidenceScore: clamp01(prediction.confidence),
          suggestionSource: 'prediction',
        });
      }
    }

    return file;
  });
}
