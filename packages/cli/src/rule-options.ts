import { type Combinator, type Condition, FILE_KINDS, LocationKind, RuleAction } from '@filewise/core';
import { InvalidArgumentError } from 'commander';

/** Condition flags shared by `rules add`. */
export interface ConditionOptions {
  ext?: string;
  nameContains?: string;
  nameStarts?: string;
  nameEnds?: string;
  olderThan?: number;
  notModified?: number;
  notOpened?: number;
  largerThan?: number;
  kind?: string;
  from?: LocationKind;
  exclude?: string[];
  any?: boolean;
}

export interface ConditionSetFromOptions {
  conditions: Condition[];
  combinator: Combinator;
  exclusions: Condition[];
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return parsed;
}

const SIZE_UNITS: Record<string, number> = { '': 1, b: 1, kb: 1024, mb: 1024 ** 2, gb: 1024 ** 3 };

/** "500", "20KB", "1.5mb" */
export function parseSize(value: string): number {
  const match = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/i.exec(value.trim());
  const unit = match ? SIZE_UNITS[match[2].toLowerCase()] : undefined;
  if (!match || unit === undefined) {
    throw new InvalidArgumentError('Expected a size such as 500, 20KB or 1.5MB.');
  }
  return Math.round(Number(match[1]) * unit);
}

export function parseLocation(value: string): LocationKind {
  const parsed = LocationKind.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${LocationKind.options.join(', ')}.`);
  }
  return parsed.data;
}

/** "images" and "image" both name the image kind. */
export function parseKind(value: string): string {
  const lower = value.trim().toLowerCase();
  const kind = FILE_KINDS.includes(lower) || !lower.endsWith('s') ? lower : lower.slice(0, -1);
  if (!FILE_KINDS.includes(kind)) {
    throw new InvalidArgumentError(`Expected one of: ${FILE_KINDS.join(', ')}.`);
  }
  return kind;
}

export function parseAction(value: string): RuleAction {
  const parsed = RuleAction.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${RuleAction.options.join(', ')}.`);
  }
  return parsed.data;
}

/** Collects a repeatable option into a list. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Conditions in flag order; more than one is joined with AND unless `--any`. */
export function conditionsFromOptions(opts: ConditionOptions): ConditionSetFromOptions {
  const conditions: Condition[] = [];

  if (opts.ext !== undefined) conditions.push({ type: 'extensionEquals', value: opts.ext });
  if (opts.nameContains !== undefined) conditions.push({ type: 'nameContains', value: opts.nameContains });
  if (opts.nameStarts !== undefined) conditions.push({ type: 'nameStartsWith', value: opts.nameStarts });
  if (opts.nameEnds !== undefined) conditions.push({ type: 'nameEndsWith', value: opts.nameEnds });
  if (opts.olderThan !== undefined) conditions.push({ type: 'olderThan', days: opts.olderThan });
  if (opts.notModified !== undefined) conditions.push({ type: 'modifiedOlderThan', days: opts.notModified });
  if (opts.notOpened !== undefined) conditions.push({ type: 'accessedOlderThan', days: opts.notOpened });
  if (opts.largerThan !== undefined) conditions.push({ type: 'largerThan', bytes: opts.largerThan });
  if (opts.kind !== undefined) conditions.push({ type: 'kindEquals', kind: opts.kind });
  if (opts.from !== undefined) conditions.push({ type: 'fromLocation', location: opts.from });

  const combinator: Combinator = conditions.length <= 1 ? 'single' : opts.any ? 'or' : 'and';
  const exclusions: Condition[] = (opts.exclude ?? []).map(value => ({ type: 'nameContains', value }));

  return { conditions, combinator, exclusions };
}
