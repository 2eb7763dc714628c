import { Command } from 'commander';
import { PriorityName, updateTaskPriority } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseTaskId, requirePriority } from '../helpers.js';

export function createPriorityCommand(session: Session): Command {
  return new Command('priority')
    .description('Set the priority of a task')
    .argument('<taskId>', 'The id of the task')
    .argument('<level>', 'high, medium or low (also 1-3, p1-p3)')
    .action((taskId: string, level: string, _opts: unknown, cmd: Command) => $try(session, () => {
      const priority = requirePriority(level);
      const task = updateTaskPriority(session.registry, callContext(session, cmd), parseTaskId(taskId), priority);
      out.success(`Set priority of task (${task.id}) to ${PriorityName[priority]}`);
    }));
}
