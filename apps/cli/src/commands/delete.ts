import { Command } from 'commander';
import { deleteTask, ownerDeleteTask } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createDeleteCommand(session: Session): Command {
  return new Command('delete')
    .description('Delete a task assigned to the caller')
    .argument('<taskId>', 'The id of the task to delete')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(session, () => {
      const id = parseTaskId(taskId);
      deleteTask(session.registry, callContext(session, cmd), id);
      out.success(`Deleted task (${id})`);
    }));
}

export function createOwnerDeleteCommand(session: Session): Command {
  return new Command('owner-delete')
    .description('Delete any task (registry owner only)')
    .argument('<taskId>', 'The id of the task to delete')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(session, () => {
      const id = parseTaskId(taskId);
      ownerDeleteTask(session.registry, callContext(session, cmd), id);
      out.success(`Deleted task (${id})`);
    }));
}
