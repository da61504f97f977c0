import { basename, resolve } from 'node:path';
import type { CategoryScope } from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type WorkspaceOption, fail, openWorkspace } from '../context.js';
import { collect } from '../rule-options.js';

export const categoriesCommand = new Command('categories').description('Group rules and limit them to folders');

categoriesCommand
  .command('list')
  .description('List categories')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((opts: WorkspaceOption) => {
    try {
      const categories = openWorkspace(opts.workspace).rules.listCategories();
      if (categories.length === 0) {
        console.log(chalk.gray('  No categories.'));
        return;
      }

      console.log();
      for (const category of categories) {
        const state = category.isEnabled ? chalk.green('[on] ') : chalk.gray('[off]');
        const scope =
          category.scope.kind === 'global'
            ? chalk.gray('everywhere')
            : category.scope.folders.map(f => f.path).join(', ');
        console.log(`  ${state} ${chalk.gray(category.id)} ${chalk.bold(category.name)} ${scope}`);
      }
      console.log();
    } catch (err) {
      fail(err);
    }
  });

categoriesCommand
  .command('add')
  .description('Add a category, global unless limited to folders')
  .argument('<name>', 'Category name')
  .option('--folder <path>', 'Only apply its rules to files under this folder (repeatable)', collect)
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((name: string, opts: WorkspaceOption & { folder?: string[] }) => {
    try {
      const folders = (opts.folder ?? []).map(folder => {
        const path = resolve(folder);
        return { path, displayName: basename(path) || path };
      });
      const scope: CategoryScope = folders.length > 0 ? { kind: 'folders', folders } : { kind: 'global' };

      const category = openWorkspace(opts.workspace).rules.addCategory(name, { scope });
      console.log(chalk.green('Category created:'), category.id, chalk.bold(category.name));
    } catch (err) {
      fail(err);
    }
  });

categoriesCommand
  .command('remove')
  .description('Delete a category; its rules become global')
  .argument('<id>', 'Category id')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((id: string, opts: WorkspaceOption) => {
    try {
      openWorkspace(opts.workspace).rules.removeCategory(id);
      console.log(chalk.green('Category removed:'), id);
    } catch (err) {
      fail(err);
    }
  });

for (const [verb, isEnabled] of [
  ['enable', true],
  ['disable', false],
] as const) {
  categoriesCommand
    .command(verb)
    .description(`${isEnabled ? 'Enable' : 'Disable'} every rule in a category`)
    .argument('<id>', 'Category id')
    .option('-w, --workspace <path>', 'Workspace directory', '.')
    .action((id: string, opts: WorkspaceOption) => {
      try {
        const category = openWorkspace(opts.workspace).rules.setCategoryEnabled(id, isEnabled);
        console.log(chalk.green(`Category ${verb}d:`), category.id, chalk.bold(category.name));
      } catch (err) {
        fail(err);
      }
    });
}
