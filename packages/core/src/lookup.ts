/**
 * Static lookup data shipped in the package's data/ directory.
 * Resolved relative to this module so it works from src/ and dist/ alike.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const FileKindTable = z.record(z.string(), z.array(z.string()));
const Vocabulary = z.object({
  prefixes: z.array(z.string()),
  keywords: z.array(z.string()),
});

function loadJson<T>(name: string, schema: z.ZodType<T>): T {
  const url = new URL(`../data/${name}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, 'utf-8')));
}

const KIND_TABLE = loadJson('file-kinds.json', FileKindTable);

const KIND_EXTENSIONS = new Map<string, Set<string>>(
  Object.entries(KIND_TABLE).map(([kind, exts]) => [kind, new Set(exts)]),
);

export const FILE_KINDS: readonly string[] = Object.keys(KIND_TABLE);

export const DEFAULT_VOCABULARY: Readonly<z.infer<typeof Vocabulary>> = loadJson(
  'vocabulary.json',
  Vocabulary,
);

/** "images" and "image" name the same kind. */
function normalizeKind(kind: string): string {
  const lower = kind.trim().toLowerCase();
  if (KIND_EXTENSIONS.has(lower)) return lower;
  if (lower.endsWith('s') && KIND_EXTENSIONS.has(lower.slice(0, -1))) return lower.slice(0, -1);
  return lower;
}

export function extensionHasKind(extension: string, kind: string): boolean {
  const exts = KIND_EXTENSIONS.get(normalizeKind(kind));
  if (!exts) return false;
  return exts.has(extension.replace(/^\./, '').toLowerCase());
}
