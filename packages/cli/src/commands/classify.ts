import { resolve } from 'node:path';
import { ClassificationEngine, type FileItem, applySuggestions } from '@filewise/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type WorkspaceOption, cliLogger, fail, openWorkspace } from '../context.js';
import { confidenceBadge, destinationLabel } from '../format.js';
import { loadPredictions } from '../predictions.js';
import { FsDestinationResolver } from '../resolver.js';
import { scanDirectory } from '../scan.js';

interface ClassifyOptions extends WorkspaceOption {
  predictions?: string;
  json?: boolean;
  verbose?: boolean;
}

function printDecision(file: FileItem): void {
  if (file.status !== 'ready') {
    console.log(`  ${chalk.gray('·')} ${file.name} ${chalk.gray('no suggestion')}`);
    return;
  }
  const source = chalk.gray(`[${file.suggestionSource ?? 'rule'}]`);
  const confidence = file.confidenceScore === undefined ? '' : ` ${confidenceBadge(file.confidenceScore)}`;
  console.log(`  ${chalk.green('→')} ${file.name} → ${chalk.bold(destinationLabel(file.destination))} ${source}${confidence}`);
  if (file.matchReason) console.log(chalk.gray(`      ${file.matchReason}`));
}

export const classifyCommand = new Command('classify')
  .description('Suggest a destination for each file in a directory (nothing is moved)')
  .argument('<dir>', 'Directory to scan')
  .option('-p, --predictions <file>', 'JSON file of external predictions for files no rule or pattern places')
  .option('--json', 'Print the decided files as JSON')
  .option('-v, --verbose', 'Show rule evaluation details')
  .option('-w, --workspace <path>', 'Workspace directory', '.')
  .action((dir: string, opts: ClassifyOptions) => {
    try {
      const workspace = openWorkspace(opts.workspace);
      const target = resolve(dir);
      const engine = new ClassificationEngine({
        resolver: new FsDestinationResolver(workspace.root),
        logger: cliLogger(opts.verbose),
      });

      const decided = applySuggestions(scanDirectory(target), {
        engine,
        rules: workspace.rules.listRules(),
        patterns: workspace.patterns.list(),
        predictions: opts.predictions ? loadPredictions(resolve(opts.predictions), target) : undefined,
        config: workspace.learnerConfig,
      });

      if (opts.json) {
        console.log(JSON.stringify(decided, null, 2));
        return;
      }
      if (decided.length === 0) {
        console.log(chalk.gray(`  No files in ${target}.`));
        return;
      }

      const ready = decided.filter(f => f.status === 'ready').length;
      console.log();
      decided.forEach(printDecision);
      console.log();
      console.log(chalk.gray(`  ${ready} of ${decided.length} file(s) have a suggestion.`));
    } catch (err) {
      fail(err);
    }
  });
