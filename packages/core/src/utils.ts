import { createHash, randomUUID } from 'node:crypto';

export function generateId(prefix?: string): string {
  const short = randomUUID().replace(/-/g, '').slice(0, 8);
  return prefix ? `${prefix}_${short}` : short;
}

/** Same input, same id. Used where output must be reproducible. */
export function stableId(prefix: string, ...parts: string[]): string {
  const digest = createHash('sha1').update(parts.join('\u0000')).digest('hex').slice(0, 10);
  return `${prefix}_${digest}`;
}

export function now(): string {
  return new Date().toISOString();
}

const BYTE_UNITS = ['bytes', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  if (unit === 0) return `${bytes} bytes`;
  const rounded = Math.round(value * 10) / 10;
  return `${Number.isInteger(rounded) ? rounded.toFixed(0) : rounded.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** File extension without the dot, lower-cased. `""` when there is none. */
export function extensionOf(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) return '';
  return base.slice(dot + 1).toLowerCase();
}
