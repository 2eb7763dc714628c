import { Command } from 'commander';
import { updateTaskDescription } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createRenameCommand(session: Session): Command {
  return new Command('rename')
    .description('Change the description of a task')
    .argument('<taskId>', 'The id of the task')
    .argument('<description>', 'The new description')
    .action((taskId: string, description: string, _opts: unknown, cmd: Command) => $try(session, () => {
      const task = updateTaskDescription(session.registry, callContext(session, cmd), parseTaskId(taskId), description);
      out.success(`Renamed task (${task.id})`);
    }));
}
