import { Command, Option } from 'commander';
import { addTask } from '@todo/core';
import * as out from '../output.js';
import { $try, parsePriorityArg, PRIORITY_CHOICES, type PriorityChoice } from '../helpers.js';
import type { Session } from '../session.js';

interface AddOptions {
  description?: string;
  due?: string;
  priority: PriorityChoice;
}

export function createAddCommand(session: Session): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('--description <text>', 'Task description')
    .option('-d, --due <date>', 'Due date (YYYY-MM-DD or RFC3339)')
    .addOption(
      new Option('-p, --priority <level>', 'Priority level')
        .choices(PRIORITY_CHOICES)
        .default('medium'),
    )
    .action((title: string, opts: AddOptions) => session.finish($try(() => {
      const result = addTask(session.store, {
        title,
        description: opts.description,
        due: opts.due,
        priority: parsePriorityArg(opts.priority),
      }, session.clock);
      return out.printResult(result);
    })));
}
