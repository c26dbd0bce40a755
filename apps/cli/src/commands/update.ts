import { Command, Option } from 'commander';
import { editTask } from '@todo/core';
import * as out from '../output.js';
import { $try, parseDueArg, parsePriorityArg, parseTaskId, PRIORITY_CHOICES, type PriorityChoice } from '../helpers.js';
import type { Session } from '../session.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  due?: string;
  priority?: PriorityChoice;
}

export function createUpdateCommand(session: Session): Command {
  return new Command('update')
    .description('Update a task')
    .argument('<id>', 'Task ID')
    .option('-t, --title <title>', 'New title')
    .option('--description <text>', 'New description (empty to remove)')
    .option('-d, --due <date>', "New due date (YYYY-MM-DD, RFC3339, or 'clear')")
    .addOption(
      new Option('-p, --priority <level>', 'New priority level').choices(PRIORITY_CHOICES),
    )
    .action((rawId: string, opts: UpdateOptions) => session.finish($try(() => {
      const id = parseTaskId(rawId);
      if (id.type !== 'success') return out.printResult(id);

      const result = editTask(session.store, id.data, {
        title: opts.title,
        description: opts.description,
        due: parseDueArg(opts.due),
        priority: parsePriorityArg(opts.priority),
      }, session.clock);
      return out.printResult(result);
    })));
}
