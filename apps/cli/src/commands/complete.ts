import { Command } from 'commander';
import { markComplete } from '@todo/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';
import type { Session } from '../session.js';

export function createCompleteCommand(session: Session): Command {
  return new Command('complete')
    .description('Mark a task as completed')
    .argument('<id>', 'Task ID')
    .action((rawId: string) => session.finish($try(() => {
      const id = parseTaskId(rawId);
      if (id.type !== 'success') return out.printResult(id);
      return out.printResult(markComplete(session.store, id.data, session.clock));
    })));
}
