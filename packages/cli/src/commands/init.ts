import { basename, join, resolve } from 'node:path';
import { WORKSPACE_DIR, Workspace } from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { fail } from '../context.js';

export const initCommand = new Command('init')
  .description('Initialize a filewise workspace')
  .argument('[path]', 'Workspace directory', '.')
  .option('-n, --name <name>', 'Workspace name')
  .action((path: string, opts: { name?: string }) => {
    const root = resolve(path);
    const name = opts.name ?? (basename(root) || 'files');

    try {
      const workspace = Workspace.init(root, name);
      console.log(chalk.green('Workspace initialized:'), chalk.bold(workspace.config.name));
      console.log(chalk.gray(`  Path: ${join(root, WORKSPACE_DIR)}/`));
    } catch (err) {
      fail(err);
    }
  });
