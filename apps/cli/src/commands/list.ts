import { Command, Option } from 'commander';
import { getTasks, toJson } from '@todo/core';
import * as out from '../output.js';
import { ExitCode } from '../exit-codes.js';
import { $try, parsePriorityArg, PRIORITY_CHOICES, type PriorityChoice } from '../helpers.js';
import type { Session } from '../session.js';

interface ListOptions {
  completed?: boolean;
  priority?: PriorityChoice;
  json?: boolean;
}

export function createListCommand(session: Session): Command {
  return new Command('list')
    .description('List all tasks')
    .option('-c, --completed', 'Show completed tasks')
    .addOption(
      new Option('-p, --priority <level>', 'Filter by priority').choices(PRIORITY_CHOICES),
    )
    .option('--json', 'Output in JSON format')
    .action((opts: ListOptions) => session.finish($try(() => {
      const result = getTasks(session.store, {
        includeCompleted: opts.completed ?? false,
        priority: parsePriorityArg(opts.priority) ?? null,
      });
      if (result.type !== 'success') return out.printResult(result);

      const now = session.clock.now();
      if (opts.json) {
        out.printJson(result.data.map(task => toJson(task, now)));
      } else {
        out.printTaskList(result.data, now);
      }
      return ExitCode.Ok;
    })));
}
