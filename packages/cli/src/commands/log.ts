import { ActivityType } from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type WorkspaceOption, fail, openWorkspace } from '../context.js';
import { parseCount } from '../rule-options.js';

export const logCommand = new Command('log')
  .description('Record a file activity for the learner, or show recent activity')
  .argument('[type]', `Activity type (${ActivityType.options.join(', ')})`)
  .argument('[fileName]', 'File name, e.g. invoice-march.pdf')
  .argument('[details]', 'e.g. "Moved to ~/Documents/Finance"', '')
  .option('-n, --limit <count>', 'Entries to show when listing', parseCount, 20)
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action(
    (
      type: string | undefined,
      fileName: string | undefined,
      details: string,
      opts: WorkspaceOption & { limit: number },
    ) => {
      try {
        const workspace = openWorkspace(opts.workspace);

        if (type === undefined) {
          const recent = workspace.activity.getRecent(opts.limit);
          if (recent.length === 0) {
            console.log(chalk.gray('  No activity recorded.'));
            return;
          }
          for (const entry of recent) {
            const detail = entry.details ? chalk.gray(` ${entry.details}`) : '';
            console.log(`  ${chalk.gray(entry.timestamp)} ${chalk.cyan(entry.type)} ${entry.fileName}${detail}`);
          }
          return;
        }

        const parsed = ActivityType.safeParse(type);
        if (!parsed.success) {
          throw new Error(`Unknown activity type: ${type} (expected one of ${ActivityType.options.join(', ')})`);
        }
        if (!fileName) throw new Error('A file name is required');

        const record = workspace.activity.append({ type: parsed.data, fileName, details });
        console.log(chalk.green('Logged:'), record.type, chalk.bold(record.fileName));
      } catch (err) {
        fail(err);
      }
    },
  );
