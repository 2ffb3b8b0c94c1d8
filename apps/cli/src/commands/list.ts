import { Command } from 'commander';
import type { Task, TaskFilter } from '@tasklite/core';
import { filterTasks, taskToRecord } from '@tasklite/core';
import * as out from '../output.js';
import { openStorage, ExitCode, $try } from '../helpers.js';

type ListOptions = {
  tag?: string;
  completed?: boolean;
  incomplete?: boolean;
  json?: boolean;
};

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks')
    .option('-t, --tag <tag>', 'Show only tasks with this tag')
    .option('-c, --completed', 'Show only completed tasks')
    .option('-i, --incomplete', 'Show only incomplete tasks')
    .option('--json', 'Output JSON')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<ListOptions>();

      if (g.completed && g.incomplete) {
        out.error('Cannot use both --completed and --incomplete at the same time');
        process.exitCode = ExitCode.InvalidInput;
        return;
      }

      const filter: TaskFilter = { tag: g.tag };
      if (g.completed) filter.completed = true;
      if (g.incomplete) filter.completed = false;

      const tasks = filterTasks(openStorage(cmd).load(), filter);
      out.debug(`${tasks.length} task(s) after filtering`);

      if (g.json) {
        out.json(tasks.map(taskToRecord));
        return;
      }
      displayTasks(tasks);
    }));
}

function displayTasks(tasks: readonly Task[]): void {
  if (tasks.length === 0) {
    out.info('No tasks found');
    return;
  }
  for (const task of tasks) {
    console.log(out.formatTaskRow(task));
  }
}
