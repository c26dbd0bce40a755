import { Command } from 'commander';
import { getTask, toJson } from '@todo/core';
import * as out from '../output.js';
import { ExitCode } from '../exit-codes.js';
import { $try, parseTaskId } from '../helpers.js';
import type { Session } from '../session.js';

export function createShowCommand(session: Session): Command {
  return new Command('show')
    .description('Show details of a specific task')
    .argument('<id>', 'Task ID')
    .option('--json', 'Output in JSON format')
    .action((rawId: string, opts: { json?: boolean }) => session.finish($try(() => {
      const id = parseTaskId(rawId);
      if (id.type !== 'success') return out.printResult(id);

      const result = getTask(session.store, id.data);
      if (result.type !== 'success') return out.printResult(result);

      const now = session.clock.now();
      if (opts.json) {
        out.printJson(toJson(result.data, now));
      } else {
        out.printTaskDetail(result.data, now);
      }
      return ExitCode.Ok;
    })));
}
