import { Command } from 'commander';
import { reassignTask } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createReassignCommand(session: Session): Command {
  return new Command('reassign')
    .description('Hand a task to another principal')
    .argument('<taskId>', 'The id of the task')
    .argument('<principal>', 'The new assignee')
    .action((taskId: string, principal: string, _opts: unknown, cmd: Command) => $try(session, () => {
      const task = reassignTask(session.registry, callContext(session, cmd), parseTaskId(taskId), principal);
      out.success(`Reassigned task (${task.id}) to ${principal}`);
    }));
}
