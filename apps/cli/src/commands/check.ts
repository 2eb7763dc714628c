import { Command } from 'commander';
import { completeTask } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createCheckCommand(session: Session): Command {
  return new Command('check')
    .description('Mark a task as completed')
    .argument('<taskId>', 'The id of the task to complete')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(session, () => {
      const task = completeTask(session.registry, callContext(session, cmd), parseTaskId(taskId));
      out.success(`Completed task (${task.id})`);
    }));
}
