import { Command } from 'commander';
import { updateTaskDueDate } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseTaskId, parseTimestamp } from '../helpers.js';

export function createDueCommand(session: Session): Command {
  return new Command('due')
    .description('Set the due date of a task')
    .argument('<taskId>', 'The id of the task')
    .argument('<timestamp>', 'Due date, in seconds')
    .action((taskId: string, timestamp: string, _opts: unknown, cmd: Command) => $try(session, () => {
      const dueDate = parseTimestamp(timestamp);
      const task = updateTaskDueDate(session.registry, callContext(session, cmd), parseTaskId(taskId), dueDate);
      out.success(`Set due date of task (${task.id}) to ${dueDate}`);
    }));
}
