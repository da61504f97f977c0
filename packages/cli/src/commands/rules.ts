import {
  type Destination,
  type Rule,
  type RuleAction,
  detectOverlaps,
  folderPlaceholder,
  generateId,
  now,
} from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type WorkspaceOption, fail, openWorkspace } from '../context.js';
import { printOverlaps, printRule } from '../format.js';
import {
  type ConditionOptions,
  collect,
  conditionsFromOptions,
  parseAction,
  parseCount,
  parseKind,
  parseLocation,
  parseSize,
} from '../rule-options.js';

interface AddOptions extends ConditionOptions, WorkspaceOption {
  to?: string;
  action: RuleAction;
  category?: string;
  priority?: number;
  disabled?: boolean;
  force?: boolean;
}

export const rulesCommand = new Command('rules').description('List and manage rules');

rulesCommand
  .command('list')
  .description('List rules in priority order')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((opts: WorkspaceOption) => {
    try {
      const rules = openWorkspace(opts.workspace).rules.listRules();
      if (rules.length === 0) {
        console.log(chalk.gray('  No rules yet. Add one with `filewise rules add`.'));
        return;
      }

      console.log();
      rules.forEach(printRule);
      console.log();
    } catch (err) {
      fail(err);
    }
  });

rulesCommand
  .command('add')
  .description('Add a rule; it is checked against existing rules first')
  .argument('<name>', 'Rule name')
  .option('--ext <extension>', 'Extension equals')
  .option('--name-contains <text>', 'Name contains')
  .option('--name-starts <text>', 'Name starts with')
  .option('--name-ends <text>', 'Name ends with')
  .option('--older-than <days>', 'Created more than N days ago', parseCount)
  .option('--not-modified <days>', 'Not modified for N days', parseCount)
  .option('--not-opened <days>', 'Not opened for N days', parseCount)
  .option('--larger-than <size>', 'Larger than a size (500, 20KB, 1.5MB)', parseSize)
  .option('--kind <kind>', 'File kind (image, document, archive, ...)', parseKind)
  .option('--from <location>', 'Source location (downloads, desktop, ...)', parseLocation)
  .option('--any', 'Match when any condition holds instead of all')
  .option('--exclude <text>', 'Skip files whose name contains this (repeatable)', collect)
  .option('--to <folder>', 'Destination folder: relative to the workspace, absolute, or ~/...')
  .option('--action <action>', 'move, copy or delete', parseAction, 'move')
  .option('--category <id>', 'Category id')
  .option('--priority <n>', 'Sort order; lower runs first', parseCount)
  .option('--disabled', 'Create the rule disabled')
  .option('--force', 'Save even if an identical rule exists')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((name: string, opts: AddOptions) => {
    try {
      const workspace = openWorkspace(opts.workspace);
      const { conditions, combinator, exclusions } = conditionsFromOptions(opts);
      if (conditions.length === 0) {
        throw new Error('A rule needs at least one condition (see --help)');
      }

      let destination: Destination;
      if (opts.action === 'delete') destination = { kind: 'trash' };
      else if (opts.to) destination = folderPlaceholder(opts.to);
      else throw new Error(`A ${opts.action} rule needs --to <folder>`);

      const category = opts.category === undefined ? undefined : workspace.rules.getCategory(opts.category);
      if (opts.category !== undefined && !category) {
        throw new Error(`Category not found: ${opts.category}`);
      }

      const rule: Rule = {
        id: generateId('rule'),
        name,
        conditions,
        combinator,
        exclusions,
        action: opts.action,
        destination,
        category,
        isEnabled: !opts.disabled,
        sortOrder: opts.priority ?? workspace.rules.nextSortOrder(),
        creationDate: now(),
      };

      const overlaps = detectOverlaps(rule, workspace.rules.listRules());
      if (overlaps.length > 0) {
        console.log(chalk.yellow(`Overlaps with ${overlaps.length} existing rule(s):`));
        printOverlaps(overlaps);
      }
      if (!opts.force && overlaps.some(o => o.type === 'exactDuplicate')) {
        throw new Error('An identical rule already exists. Use --force to save anyway.');
      }

      workspace.rules.insertRule(rule);
      workspace.activity.append({ type: 'ruleCreated', fileName: rule.name, details: `Created rule ${rule.name}` });
      console.log(chalk.green('Rule created:'), rule.id, chalk.bold(rule.name));
    } catch (err) {
      fail(err);
    }
  });

rulesCommand
  .command('remove')
  .description('Delete a rule')
  .argument('<id>', 'Rule id')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((id: string, opts: WorkspaceOption) => {
    try {
      openWorkspace(opts.workspace).rules.removeRule(id);
      console.log(chalk.green('Rule removed:'), id);
    } catch (err) {
      fail(err);
    }
  });

for (const [verb, isEnabled] of [
  ['enable', true],
  ['disable', false],
] as const) {
  rulesCommand
    .command(verb)
    .description(`${isEnabled ? 'Enable' : 'Disable'} a rule`)
    .argument('<id>', 'Rule id')
    .option('-w, --workspace <path>', 'Workspace directory', '.')
    .action((id: string, opts: WorkspaceOption) => {
      try {
        const rule = openWorkspace(opts.workspace).rules.setRuleEnabled(id, isEnabled);
        console.log(chalk.green(`Rule ${verb}d:`), rule.id, chalk.bold(rule.name));
      } catch (err) {
        fail(err);
      }
    });
}
