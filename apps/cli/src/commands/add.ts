import { Command } from 'commander';
import { createTask } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseTimestamp, requirePriority } from '../helpers.js';

export function createAddCommand(session: Session): Command {
  return new Command('add')
    .description('Create a task assigned to the caller')
    .argument('<description>', 'Task description (quote it if it has spaces)')
    .requiredOption('-d, --due <timestamp>', 'Due date, in seconds')
    .option('-p, --priority <level>', 'high, medium or low', 'medium')
    .action((description: string, opts: { due: string; priority: string }, cmd: Command) => $try(session, () => {
      const dueDate = parseTimestamp(opts.due);
      const priority = requirePriority(opts.priority);
      const task = createTask(session.registry, callContext(session, cmd), { description, dueDate, priority });
      out.success(`Created task (${task.id})`);
    }));
}
