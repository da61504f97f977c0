import type { Category, CategoryScope, FileItem } from '../types.js';

function normalizePath(path: string): string {
  const forward = path.replace(/\\/g, '/');
  return forward.length > 1 ? forward.replace(/\/+$/, '') : forward;
}

/** True when `path` is `folder` itself or anything below it. */
export function isWithinFolder(path: string, folder: string): boolean {
  const p = normalizePath(path);
  const f = normalizePath(folder);
  if (f === '/') return p.startsWith('/');
  return p === f || p.startsWith(`${f}/`);
}

export function scopeContains(scope: CategoryScope, path: string): boolean {
  if (scope.kind === 'global') return true;
  return scope.folders.some(folder => isWithinFolder(path, folder.path));
}

export type ScopeVerdict = 'in-scope' | 'category-disabled' | 'out-of-scope';

/** A rule without a category is global. */
export function checkCategoryScope(file: Pick<FileItem, 'path'>, category: Category | undefined): ScopeVerdict {
  if (!category) return 'in-scope';
  if (!category.isEnabled) return 'category-disabled';
  return scopeContains(category.scope, file.path) ? 'in-scope' : 'out-of-scope';
}

/** Two scopes may see the same files when either is global or their folders nest. */
export function scopesMayOverlap(a: CategoryScope, b: CategoryScope): boolean {
  if (a.kind === 'global' || b.kind === 'global') return true;
  return a.folders.some(fa =>
    b.folders.some(fb => isWithinFolder(fa.path, fb.path) || isWithinFolder(fb.path, fa.path)),
  );
}
