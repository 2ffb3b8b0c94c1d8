import { Command, Option } from 'commander';
import { isSearchField, searchTasks, taskToRecord } from '@tasklite/core';
import * as out from '../output.js';
import { openStorage, $try } from '../helpers.js';

type SearchCommandOptions = {
  ignoreCase?: boolean;
  field: string;
  json?: boolean;
};

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Search tasks')
    .argument('<query>', 'Text to look for')
    .option('--ignore-case', 'Case-insensitive search')
    .addOption(
      new Option('--field <field>', 'Field to search')
        .choices(['description', 'tags'])
        .default('description'),
    )
    .option('--json', 'Output JSON')
    .action((query: string, _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<SearchCommandOptions>();
      const field = isSearchField(g.field) ? g.field : 'description';

      const matches = searchTasks(openStorage(cmd).load(), query, {
        field,
        ignoreCase: g.ignoreCase ?? false,
      });

      if (g.json) {
        out.json(matches.map(taskToRecord));
        return;
      }
      if (matches.length === 0) {
        out.info('No matching tasks');
        return;
      }
      for (const task of matches) {
        console.log(out.formatSearchHit(task));
      }
    }));
}
