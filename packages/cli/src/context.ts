import { resolve } from 'node:path';
import { type Logger, Workspace } from '@filewise/core';
import chalk from 'chalk';

export interface WorkspaceOption {
  workspace: string;
}

export function openWorkspace(path: string): Workspace {
  return Workspace.open(resolve(path));
}

/** Prints the error the way every command does and exits. */
export function fail(err: unknown): never {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
}

/** Engine diagnostics go to stderr; debug lines only with --verbose. */
export function cliLogger(verbose = false): Logger {
  const text = (args: unknown[]) => args.map(a => (a instanceof Error ? a.message : String(a))).join(' ');
  return {
    debug: (...args: unknown[]) => {
      if (verbose) console.error(chalk.gray(text(args)));
    },
    warn: (...args: unknown[]) => {
      console.error(chalk.yellow(text(args)));
    },
  };
}
