import { readdirSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { type FileItem, type LocationKind, extensionOf } from '@filewise/core';

const KNOWN_FOLDERS: ReadonlyArray<[string, LocationKind]> = [
  ['Desktop', 'desktop'],
  ['Downloads', 'downloads'],
  ['Documents', 'documents'],
  ['Pictures', 'pictures'],
  ['Music', 'music'],
];

export function guessLocation(dir: string, home = homedir()): LocationKind {
  const target = resolve(dir);
  if (target === resolve(home)) return 'home';
  for (const [folder, kind] of KNOWN_FOLDERS) {
    if (target === join(resolve(home), folder)) return kind;
  }
  return 'custom';
}

/** The regular, non-hidden files directly inside `dir`, sorted by name. */
export function scanDirectory(dir: string, home = homedir()): FileItem[] {
  const root = resolve(dir);
  const location = guessLocation(root, home);

  return readdirSync(root, { withFileTypes: true })
    .filter(entry => entry.isFile() && !entry.name.startsWith('.'))
    .map(entry => entry.name)
    .sort()
    .map((name): FileItem => {
      const path = join(root, name);
      const stats = statSync(path);
      const created = stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;
      return {
        name,
        path,
        extension: extensionOf(name),
        creationDate: created.toISOString(),
        modificationDate: stats.mtime.toISOString(),
        lastAccessedDate: stats.atime.toISOString(),
        sizeInBytes: stats.size,
        location,
        status: 'pending',
        rejectionCount: 0,
      };
    });
}
