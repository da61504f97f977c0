import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type { DestinationResolver, FolderDestination, ResolvedDestination } from '@filewise/core';

/** Display paths are relative to the workspace root, absolute, or start with `~`. */
export function expandPath(displayPath: string, root: string, home = homedir()): string {
  if (displayPath === '~') return home;
  if (displayPath.startsWith('~/')) return join(home, displayPath.slice(2));
  return isAbsolute(displayPath) ? displayPath : resolve(root, displayPath);
}

/** Resolves a placeholder to an existing directory; the token is its absolute path. */
export class FsDestinationResolver implements DestinationResolver {
  constructor(
    private readonly root: string,
    private readonly home: string = homedir(),
  ) {}

  resolve(destination: FolderDestination): ResolvedDestination | null {
    const path = expandPath(destination.displayPath, this.root, this.home);
    if (!existsSync(path) || !statSync(path).isDirectory()) return null;
    return { ...destination, resolution: { state: 'resolved', token: path } };
  }
}
