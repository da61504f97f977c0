import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import type { z } from 'zod';
import type { Logger } from './engine/types.js';
import { WORKSPACE_DIR } from './types.js';

/**
 * JSON file-backed storage with atomic writes, a backup copy, and schema
 * validation on read.
 *
 * Write: data goes to `.tmp`, the current file is copied to `.backup`, then
 * `.tmp` is renamed over the target (retrying while the file is locked).
 * Read: the main file, else the backup (which is restored), else defaults.
 */
export class JsonStore<T> {
  private data: T | null = null;
  private readonly filePath: string;

  constructor(
    private readonly root: string,
    private readonly fileName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly defaultData: T,
    private readonly logger: Logger = console,
  ) {
    this.filePath = join(root, WORKSPACE_DIR, fileName);
  }

  read(): T {
    if (this.data) return this.data;

    const main = this.load(this.filePath);
    if (main !== null) {
      this.data = main;
      return main;
    }

    const backupPath = `${this.filePath}.backup`;
    const backup = this.load(backupPath);
    if (backup !== null) {
      this.logger.warn(`[storage] ${this.fileName} unreadable; restored from backup`);
      writeFileSync(this.filePath, readFileSync(backupPath, 'utf-8'), 'utf-8');
      this.data = backup;
      return backup;
    }

    this.data = structuredClone(this.defaultData);
    return this.data;
  }

  write(data: T): void {
    this.data = data;
    const dir = join(this.root, WORKSPACE_DIR);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    const tmpPath = `${this.filePath}.tmp`;
    const backupPath = `${this.filePath}.backup`;
    const content = JSON.stringify(data, null, 2);

    writeFileSync(tmpPath, content, 'utf-8');

    if (existsSync(this.filePath)) {
      try {
        copyFileSync(this.filePath, backupPath);
      } catch (err) {
        this.logger.warn(`[storage] could not back up ${this.fileName}:`, describeError(err));
      }
    }

    if (!this.atomicRename(tmpPath, this.filePath)) {
      // Not atomic, but keeps the data
      writeFileSync(this.filePath, content, 'utf-8');
      if (existsSync(tmpPath)) unlinkSync(tmpPath);
    }
  }

  update(fn: (data: T) => T): T {
    const updated = fn(this.read());
    this.write(updated);
    return updated;
  }

  invalidate(): void {
    this.data = null;
  }

  /** Parsed, validated contents of `path`, or null when missing or invalid. */
  private load(path: string): T | null {
    if (!existsSync(path)) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      this.logger.warn(`[storage] ${path} is not valid JSON:`, describeError(err));
      return null;
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`[storage] ${path} failed validation: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      return null;
    }
    return parsed.data;
  }

  /** Rename with a retry loop for Windows, where a watcher may hold the file. */
  private atomicRename(src: string, dest: string): boolean {
    const MAX_RETRIES = 5;
    const RETRY_MS = 50;

    for (let i = 0; i < MAX_RETRIES; i++) {
      try {
        renameSync(src, dest);
        return true;
      } catch (err: unknown) {
        const code = errorCode(err);
        if (code !== 'EPERM' && code !== 'EACCES' && code !== 'EBUSY') {
          return false;
        }
        if (i < MAX_RETRIES - 1) {
          const start = Date.now();
          while (Date.now() - start < RETRY_MS * (i + 1)) {
            // spin
          }
        }
      }
    }
    return false;
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
