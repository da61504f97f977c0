import {
  type Condition,
  type Destination,
  type LearnedPattern,
  type Rule,
  type RuleOverlap,
  confidenceLevel,
  describeCondition,
} from '@filewise/core';
import chalk from 'chalk';

export function destinationLabel(destination: Destination | undefined): string {
  if (!destination) return '(no destination)';
  return destination.kind === 'trash' ? 'Trash' : destination.displayPath;
}

export function conditionSummary(conditions: readonly Condition[], combinator: Rule['combinator']): string {
  if (conditions.length === 0) return '(no conditions)';
  return conditions.map(describeCondition).join(combinator === 'or' ? ' OR ' : ' AND ');
}

export function confidenceBadge(score: number): string {
  const label = `${confidenceLevel(score)} ${Math.round(score * 100)}%`;
  if (score >= 0.7) return chalk.green(label);
  if (score >= 0.5) return chalk.yellow(label);
  return chalk.gray(label);
}

export function printRule(rule: Rule): void {
  const state = rule.isEnabled ? chalk.green('[on] ') : chalk.gray('[off]');
  const category = rule.category ? chalk.cyan(` [${rule.category.name}]`) : '';
  console.log(`  ${state} ${chalk.gray(rule.id)} ${chalk.bold(rule.name)}${category}`);

  const excluding =
    rule.exclusions.length > 0 ? chalk.gray(` unless ${conditionSummary(rule.exclusions, 'or')}`) : '';
  console.log(
    `        ${conditionSummary(rule.conditions, rule.combinator)}${excluding} → ${rule.action} ${destinationLabel(rule.destination)}`,
  );
}

export function printPattern(pattern: LearnedPattern): void {
  const seen = chalk.gray(`seen ${pattern.occurrenceCount}×`);
  const rejected = pattern.rejectionCount > 0 ? chalk.gray(`, rejected ${pattern.rejectionCount}×`) : '';
  console.log(`  ${chalk.gray(pattern.id)} ${pattern.description}`);
  console.log(`        ${confidenceBadge(pattern.confidenceScore)} ${seen}${rejected}`);
}

const OVERLAP_COLORS: Record<RuleOverlap['type'], (text: string) => string> = {
  exactDuplicate: chalk.red,
  conflictingDestination: chalk.red,
  subset: chalk.yellow,
  superset: chalk.yellow,
  partialOverlap: chalk.gray,
};

export function printOverlaps(overlaps: readonly RuleOverlap[]): void {
  for (const overlap of overlaps) {
    const color = OVERLAP_COLORS[overlap.type];
    console.log(`  ${color('!')} ${overlap.explanation}`);
    if (overlap.suggestion) console.log(chalk.gray(`    ${overlap.suggestion}`));
  }
}
