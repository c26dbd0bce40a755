import { Command } from 'commander';
import { removeTask } from '@todo/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';
import type { Session } from '../session.js';

export function createDeleteCommand(session: Session): Command {
  return new Command('delete')
    .description('Delete a task')
    .argument('<id>', 'Task ID')
    .action((rawId: string) => session.finish($try(() => {
      const id = parseTaskId(rawId);
      if (id.type !== 'success') return out.printResult(id);
      return out.printResult(removeTask(session.store, id.data), '🗑️ ');
    })));
}
