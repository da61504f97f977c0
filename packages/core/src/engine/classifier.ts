/**
 * Classification Engine -- decides where a file goes by running it through
 * priority-ordered rules. The first enabled, in-scope, matching rule whose
 * destination can be used wins.
 *
 * The only state is the destination resolution cache, owned by the instance.
 * Use one engine per batch (or call clearCache) so resolutions don't go stale.
 */

import {
  type Destination,
  type FileItem,
  type FolderDestination,
  type ResolvedDestination,
  type Rule,
  isResolved,
} from '../types.js';
import { evaluateCondition, evaluateConditions } from './conditions.js';
import { checkCategoryScope } from './scope.js';
import { matchReason, ruleConfidence } from './scoring.js';
import type { Clock, DestinationResolver, EngineOptions, EvaluationContext, Logger } from './types.js';

type DecisionFields = 'destination' | 'matchReason' | 'confidenceScore' | 'matchedRuleId' | 'suggestionSource';

/** The file with every decision output removed and status reset to pending. */
export function clearDecision(file: FileItem): FileItem {
  const {
    destination: _destination,
    matchReason: _reason,
    confidenceScore: _confidence,
    matchedRuleId: _ruleId,
    suggestionSource: _source,
    ...rest
  } = file;
  return { ...rest, status: 'pending' };
}

/** The file with a complete decision applied. */
export function applyDecision(
  file: FileItem,
  decision: Required<Pick<FileItem, Exclude<DecisionFields, 'matchedRuleId'>>> & { matchedRuleId?: string },
): FileItem {
  const base = clearDecision(file);
  const result: FileItem = {
    ...base,
    status: 'ready',
    destination: decision.destination,
    matchReason: decision.matchReason,
    confidenceScore: decision.confidenceScore,
    suggestionSource: decision.suggestionSource,
  };
  if (decision.matchedRuleId !== undefined) result.matchedRuleId = decision.matchedRuleId;
  return result;
}

/** Priority order: sortOrder ascending, then oldest first. */
export function sortRules<R extends Pick<Rule, 'sortOrder' | 'creationDate'>>(rules: readonly R[]): R[] {
  return [...rules].sort(
    (a, b) => a.sortOrder - b.sortOrder || Date.parse(a.creationDate) - Date.parse(b.creationDate),
  );
}

export class ClassificationEngine {
  private readonly resolver: DestinationResolver;
  private readonly clock: Clock;
  readonly logger: Logger;
  private readonly resolvedCache = new Map<string, ResolvedDestination>();

  constructor(options: EngineOptions) {
    this.resolver = options.resolver;
    this.clock = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
  }

  /** Evaluates rules in the order given and returns a new, fully decided file. */
  classify(file: FileItem, rules: readonly Rule[]): FileItem {
    const ctx = this.context();

    for (const rule of rules) {
      if (!this.matches(file, rule, ctx)) continue;

      const destination = this.destinationFor(rule);
      if (!destination) continue;

      return applyDecision(file, {
        destination,
        matchReason: matchReason(rule),
        confidenceScore: ruleConfidence(rule),
        matchedRuleId: rule.id,
        suggestionSource: 'rule',
      });
    }

    return clearDecision(file);
  }

  classifyBatch(files: readonly FileItem[], rules: readonly Rule[]): FileItem[] {
    return files.map(file => this.classify(file, rules));
  }

  /** Whether the rule's scope and conditions accept the file. Ignores destinations. */
  fileMatchesRule(file: FileItem, rule: Rule): boolean {
    return this.matches(file, rule, this.context());
  }

  /**
   * Resolves a placeholder through the cache, then the resolver.
   * Returns null when the destination cannot be used.
   */
  resolveDestination(destination: FolderDestination): ResolvedDestination | null {
    if (isResolved(destination)) return destination;

    const key = destination.displayPath;
    const cached = this.resolvedCache.get(key);
    if (cached) return cached;

    let resolved: ResolvedDestination | null;
    try {
      resolved = this.resolver.resolve(destination);
    } catch (err) {
      this.logger.warn(
        `[rule-engine] resolver failed for '${key}':`,
        err instanceof Error ? err.message : err,
      );
      resolved = null;
    }
    if (!resolved) return null;

    this.resolvedCache.set(key, resolved);
    return resolved;
  }

  /** The engine's clock reading, for callers evaluating conditions alongside it. */
  now(): Date {
    return this.clock();
  }

  clearCache(): void {
    this.resolvedCache.clear();
  }

  get cacheSize(): number {
    return this.resolvedCache.size;
  }

  // ── Internals ──────────────────────────────────────────────────

  private context(): EvaluationContext {
    return { now: this.now(), logger: this.logger };
  }

  private matches(file: FileItem, rule: Rule, ctx: EvaluationContext): boolean {
    if (!rule.isEnabled) return false;

    const scope = checkCategoryScope(file, rule.category);
    if (scope !== 'in-scope') {
      ctx.logger.debug(`[rule-engine] skipping '${rule.name}' for '${file.name}': ${scope}`);
      return false;
    }

    if (!evaluateConditions(file, rule.conditions, rule.combinator, ctx)) return false;

    const excluded = rule.exclusions.some(c => evaluateCondition(file, c, ctx));
    if (excluded) {
      ctx.logger.debug(`[rule-engine] '${file.name}' excluded from '${rule.name}'`);
      return false;
    }
    return true;
  }

  private destinationFor(rule: Rule): Destination | null {
    if (rule.action === 'delete') return { kind: 'trash' };

    const destination = rule.destination;
    if (!destination) {
      this.logger.warn(`[rule-engine] rule '${rule.name}' matched but has no destination; skipping`);
      return null;
    }
    if (destination.kind === 'trash') return destination;

    const resolved = this.resolveDestination(destination);
    if (!resolved) {
      this.logger.warn(
        `[rule-engine] rule '${rule.name}' matched but destination '${destination.displayPath}' could not be resolved; trying later rules`,
      );
    }
    return resolved;
  }
}
