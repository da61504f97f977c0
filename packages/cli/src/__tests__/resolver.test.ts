import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { folderPlaceholder } from '@filewise/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FsDestinationResolver, expandPath } from '../resolver.js';

describe('expandPath', () => {
  it('expands the home directory', () => {
    expect(expandPath('~', '/ws', '/home/test')).toBe('/home/test');
    expect(expandPath('~/Documents/Tax', '/ws', '/home/test')).toBe('/home/test/Documents/Tax');
  });

  it('keeps absolute paths and resolves the rest against the workspace', () => {
    expect(expandPath('/srv/archive', '/ws', '/home/test')).toBe('/srv/archive');
    expect(expandPath('Documents/Tax', '/ws', '/home/test')).toBe('/ws/Documents/Tax');
  });
});

describe('FsDestinationResolver', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'fw-resolver-'));
    mkdirSync(join(tmpDir, 'Documents'));
    writeFileSync(join(tmpDir, 'notes.txt'), 'hello', 'utf-8');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('resolves existing directories to their absolute path', () => {
    const resolver = new FsDestinationResolver(tmpDir, '/home/test');

    expect(resolver.resolve(folderPlaceholder('Documents'))).toEqual({
      kind: 'folder',
      displayPath: 'Documents',
      resolution: { state: 'resolved', token: join(tmpDir, 'Documents') },
    });
  });

  it('returns null for missing folders and plain files', () => {
    const resolver = new FsDestinationResolver(tmpDir, '/home/test');

    expect(resolver.resolve(folderPlaceholder('Missing'))).toBeNull();
    expect(resolver.resolve(folderPlaceholder('notes.txt'))).toBeNull();
  });
});
