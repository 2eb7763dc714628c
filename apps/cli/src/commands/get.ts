import { Command } from 'commander';
import { getTask } from '@task-registry/core';
import type { Session } from '../session.js';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createGetCommand(session: Session): Command {
  return new Command('get')
    .description('Show one task')
    .argument('<taskId>', 'The id of the task')
    .action((taskId: string) => $try(session, () => {
      out.info(out.formatTask(getTask(session.registry.db, parseTaskId(taskId))));
    }));
}
