import { detectOverlaps } from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type WorkspaceOption, fail, openWorkspace } from '../context.js';
import { printOverlaps } from '../format.js';

export const overlapsCommand = new Command('overlaps')
  .description('Check a rule against the other enabled rules')
  .argument('[ruleId]', 'Rule id; every rule when omitted')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((ruleId: string | undefined, opts: WorkspaceOption) => {
    try {
      const rules = openWorkspace(opts.workspace).rules.listRules();
      const targets = ruleId === undefined ? rules : rules.filter(r => r.id === ruleId);
      if (ruleId !== undefined && targets.length === 0) throw new Error(`Rule not found: ${ruleId}`);

      let found = 0;
      for (const rule of targets) {
        const overlaps = detectOverlaps(rule, rules, { excludeRuleId: rule.id });
        if (overlaps.length === 0) continue;
        found += overlaps.length;
        console.log(chalk.bold(`${rule.name}`), chalk.gray(rule.id));
        printOverlaps(overlaps);
      }

      if (found === 0) console.log(chalk.green('No overlapping rules.'));
    } catch (err) {
      fail(err);
    }
  });
