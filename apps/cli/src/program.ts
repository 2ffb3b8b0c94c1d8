import { Command } from 'commander';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createSearchCommand } from './commands/search.js';
import type { GlobalOptions } from './helpers.js';
import * as out from './output.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command()
    .name('tasklite')
    .description('Lightweight task manager')
    .version(VERSION)
    .option('--data-file <path>', 'Path to the tasks.json file')
    .option('--debug', 'Show debug output');

  program.hook('preAction', (thisCommand: Command) => {
    out.setDebug(thisCommand.opts<GlobalOptions>().debug ?? false);
  });

  program.addCommand(createAddCommand());
  program.addCommand(createListCommand());
  program.addCommand(createSearchCommand());

  return program;
}
