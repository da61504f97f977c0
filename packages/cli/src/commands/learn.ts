import { homedir } from 'node:os';
import { inducePatterns, mergePatterns, now } from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type WorkspaceOption, fail, openWorkspace } from '../context.js';
import { printPattern } from '../format.js';
import { liveSuggestions } from '../suggestions.js';

export const learnCommand = new Command('learn')
  .description('Learn patterns from the recorded activity')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((opts: WorkspaceOption) => {
    try {
      const workspace = openWorkspace(opts.workspace);
      const config = workspace.learnerConfig;
      const activities = workspace.activity.getAll();

      const induced = inducePatterns(activities, config, { homeDir: homedir() });
      const merged = mergePatterns(workspace.patterns.list(), induced, now());
      workspace.patterns.replaceAll(merged);

      console.log(
        chalk.green(`Found ${induced.length} pattern(s) in ${activities.length} activit${activities.length === 1 ? 'y' : 'ies'}.`),
      );

      const suggestions = liveSuggestions(merged, config);
      if (suggestions.length === 0) return;

      console.log();
      console.log(chalk.bold('Suggested rules:'));
      suggestions.forEach(printPattern);
      console.log();
      console.log(chalk.gray('  Accept one with `filewise accept <id>`, or dismiss it with `filewise reject <id>`.'));
    } catch (err) {
      fail(err);
    }
  });
