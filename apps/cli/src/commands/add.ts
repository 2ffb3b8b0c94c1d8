import { Command } from 'commander';
import { createTask, taskToRecord } from '@tasklite/core';
import * as out from '../output.js';
import { openStorage, parseTags, $try } from '../helpers.js';

type AddOptions = {
  tags?: string;
  id?: string;
  dryRun?: boolean;
};

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<description>', 'Task description')
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .option('--id <id>', 'Use this id instead of a generated one')
    .option('--dry-run', 'Show the task that would be created without saving it')
    .action((description: string, _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<AddOptions>();
      const task = createTask(description, { tags: parseTags(g.tags), id: g.id });

      if (g.dryRun) {
        out.info('Dry run, task would be:');
        out.json(taskToRecord(task));
        return;
      }

      openStorage(cmd).addTask(task);
      out.success(`Added task ${task.id}: ${task.description}`);
    }));
}
