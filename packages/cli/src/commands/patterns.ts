import {
  convertToNegativePattern,
  detectOverlaps,
  generateId,
  markAsConverted,
  now,
  patternToRule,
  recordRejection,
} from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type WorkspaceOption, fail, openWorkspace } from '../context.js';
import { printOverlaps, printPattern } from '../format.js';
import { liveSuggestions } from '../suggestions.js';

export const suggestionsCommand = new Command('suggestions')
  .description('Show learned patterns that could become rules')
  .option('-a, --all', 'Include converted, rejected and negative patterns')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((opts: WorkspaceOption & { all?: boolean }) => {
    try {
      const workspace = openWorkspace(opts.workspace);
      const patterns = workspace.patterns.list();
      const shown = opts.all ? patterns : liveSuggestions(patterns, workspace.learnerConfig);

      if (shown.length === 0) {
        console.log(chalk.gray('  No suggestions. Record more activity and run `filewise learn`.'));
        return;
      }

      console.log();
      shown.forEach(printPattern);
      console.log();
    } catch (err) {
      fail(err);
    }
  });

export const acceptCommand = new Command('accept')
  .description('Turn a suggested pattern into a rule')
  .argument('<patternId>', 'Pattern id')
  .option('-n, --name <name>', 'Rule name')
  .option('--enable', 'Enable the rule straight away')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((patternId: string, opts: WorkspaceOption & { name?: string; enable?: boolean }) => {
    try {
      const workspace = openWorkspace(opts.workspace);
      const pattern = workspace.patterns.get(patternId);
      if (!pattern) throw new Error(`Pattern not found: ${patternId}`);
      if (pattern.isNegative) throw new Error(`Pattern ${patternId} records rejections and cannot become a rule`);
      if (pattern.convertedToRule) {
        throw new Error(`Pattern ${patternId} is already rule ${pattern.convertedRuleId ?? '(removed)'}`);
      }

      const rule = patternToRule(pattern, {
        id: generateId('rule'),
        name: opts.name,
        isEnabled: opts.enable ?? false,
        sortOrder: workspace.rules.nextSortOrder(),
        creationDate: now(),
      });

      const overlaps = detectOverlaps(rule, workspace.rules.listRules());
      if (overlaps.length > 0) {
        console.log(chalk.yellow(`Overlaps with ${overlaps.length} existing rule(s):`));
        printOverlaps(overlaps);
      }

      workspace.rules.insertRule(rule);
      workspace.patterns.update(pattern.id, p => markAsConverted(p, rule.id));
      workspace.activity.append({
        type: 'patternAccepted',
        fileName: rule.name,
        details: `Accepted pattern: ${pattern.description}`,
      });

      console.log(chalk.green('Rule created:'), rule.id, chalk.bold(rule.name));
      if (!rule.isEnabled) console.log(chalk.gray(`  Disabled. Enable it with \`filewise rules enable ${rule.id}\`.`));
    } catch (err) {
      fail(err);
    }
  });

export const rejectCommand = new Command('reject')
  .description('Dismiss a suggested pattern')
  .argument('<patternId>', 'Pattern id')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((patternId: string, opts: WorkspaceOption) => {
    try {
      const workspace = openWorkspace(opts.workspace);
      const { maxPatternRejections } = workspace.learnerConfig;

      const updated = workspace.patterns.update(patternId, pattern => {
        const rejected = recordRejection(pattern);
        return rejected.rejectionCount >= maxPatternRejections ? convertToNegativePattern(rejected) : rejected;
      });
      workspace.activity.append({
        type: 'patternRejected',
        fileName: updated.fileExtension ? `*.${updated.fileExtension}` : updated.destinationPath,
        details: `Rejected pattern: ${updated.description}`,
      });

      if (updated.isNegative) {
        console.log(chalk.yellow('Pattern suppressed:'), chalk.gray(`${updated.description} will no longer be suggested.`));
      } else {
        console.log(chalk.green('Pattern rejected:'), `${updated.rejectionCount} of ${maxPatternRejections}`);
      }
    } catch (err) {
      fail(err);
    }
  });
