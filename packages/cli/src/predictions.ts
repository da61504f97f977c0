import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type ExternalPrediction, folderPlaceholder } from '@filewise/core';
import { z } from 'zod';

/**
 * A predictions file maps file names (or paths relative to the scanned
 * directory) to a suggested folder, or "trash".
 */
export const PredictionsFileSchema = z.record(
  z.string(),
  z.object({
    to: z.string().min(1),
    confidence: z.number(),
    explanation: z.string().default('Suggested by prediction'),
  }),
);

export function parsePredictions(raw: unknown, dir: string): Map<string, ExternalPrediction> {
  const entries = Object.entries(PredictionsFileSchema.parse(raw)).map(
    ([key, entry]): [string, ExternalPrediction] => [
      resolve(dir, key),
      {
        destination: entry.to === 'trash' ? { kind: 'trash' } : folderPlaceholder(entry.to),
        confidence: entry.confidence,
        explanation: entry.explanation,
      },
    ],
  );
  return new Map(entries);
}

export function loadPredictions(file: string, dir: string): Map<string, ExternalPrediction> {
  return parsePredictions(JSON.parse(readFileSync(file, 'utf-8')), dir);
}
