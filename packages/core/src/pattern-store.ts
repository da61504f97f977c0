import { z } from 'zod';
import { JsonStore } from './storage.js';
import { type LearnedPattern, LearnedPatternSchema } from './types.js';

const PatternsFileSchema = z.object({
  patterns: z.array(LearnedPatternSchema).default([]),
});
type PatternsData = z.infer<typeof PatternsFileSchema>;

export class PatternStore {
  private store: JsonStore<PatternsData>;

  constructor(root: string) {
    this.store = new JsonStore(root, 'patterns.json', PatternsFileSchema, { patterns: [] });
  }

  list(): LearnedPattern[] {
    return this.store.read().patterns;
  }

  get(id: string): LearnedPattern | undefined {
    return this.list().find(p => p.id === id);
  }

  replaceAll(patterns: readonly LearnedPattern[]): void {
    this.store.write({ patterns: [...patterns] });
  }

  /** Applies `fn` to one stored pattern and saves the result. */
  update(id: string, fn: (pattern: LearnedPattern) => LearnedPattern): LearnedPattern {
    let updated: LearnedPattern | undefined;
    this.store.update(data => ({
      patterns: data.patterns.map(p => {
        if (p.id !== id) return p;
        updated = LearnedPatternSchema.parse(fn(p));
        return updated;
      }),
    }));

    if (!updated) throw new Error(`Pattern not found: ${id}`);
    return updated;
  }

  remove(id: string): void {
    this.store.update(data => ({ patterns: data.patterns.filter(p => p.id !== id) }));
  }
}
