#!/usr/bin/env node
import { Command } from 'commander';
import { categoriesCommand } from './commands/categories.js';
import { classifyCommand } from './commands/classify.js';
import { initCommand } from './commands/init.js';
import { learnCommand } from './commands/learn.js';
import { logCommand } from './commands/log.js';
import { overlapsCommand } from './commands/overlaps.js';
import { acceptCommand, rejectCommand, suggestionsCommand } from './commands/patterns.js';
import { rulesCommand } from './commands/rules.js';

const program = new Command();

program
  .name('filewise')
  .description('Rule-based file classification that learns from what you do')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(rulesCommand);
program.addCommand(categoriesCommand);
program.addCommand(overlapsCommand);
program.addCommand(classifyCommand);
program.addCommand(logCommand);
program.addCommand(learnCommand);
program.addCommand(suggestionsCommand);
program.addCommand(acceptCommand);
program.addCommand(rejectCommand);

program.parse();
