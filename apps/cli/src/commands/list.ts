import { Command } from 'commander';
import type { Task, TaskId } from '@task-registry/core';
import {
  getTask, isEmptySlot, listAllTasks, listMyTasks,
  listTaskIdsByCompletion, listTaskIdsByPriority,
} from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try, parseCount, requirePriority } from '../helpers.js';

const DEFAULT_PAGE_SIZE = '10';

function displayTasks(taskList: readonly Task[], empty: string): void {
  if (taskList.length === 0) {
    out.info(empty);
    return;
  }
  for (const task of taskList) out.info(out.formatTask(task));
}

export function createMineCommand(session: Session): Command {
  return new Command('mine')
    .description("List the caller's tasks, soonest due first")
    .option('--page <n>', 'Page number, from 0', '0')
    .option('--size <n>', 'Tasks per page', DEFAULT_PAGE_SIZE)
    .action((opts: { page: string; size: string }, cmd: Command) => $try(session, () => {
      const page = parseCount(opts.page);
      const pageSize = parseCount(opts.size);
      const ctx = callContext(session, cmd);
      displayTasks(listMyTasks(session.registry.db, ctx, page, pageSize), 'No tasks on this page');
    }));
}

export function createListCommand(session: Session): Command {
  return new Command('list')
    .description('List live tasks of every assignee')
    .option('-p, --priority <level>', 'Only tasks with this priority')
    .option('-c, --checked', 'Only completed tasks')
    .option('-u, --unchecked', 'Only open tasks')
    .action((opts: { priority?: string; checked?: boolean; unchecked?: boolean }) => $try(session, () => {
      if (opts.checked && opts.unchecked) {
        throw new Error('Cannot use both --checked and --unchecked at the same time');
      }

      const db = session.registry.db;
      let ids: TaskId[] | null = null;
      if (opts.priority != null) {
        ids = listTaskIdsByPriority(db, requirePriority(opts.priority));
      }
      if (opts.checked || opts.unchecked) {
        const byCompletion = new Set(listTaskIdsByCompletion(db, opts.checked === true));
        ids = (ids ?? [...byCompletion]).filter(id => byCompletion.has(id));
      }

      const taskList = ids === null
        ? listAllTasks(db).filter(t => !isEmptySlot(t))
        : ids.map(id => getTask(db, id));
      displayTasks(taskList, 'No tasks');
    }));
}

export function createDumpCommand(session: Session): Command {
  return new Command('dump')
    .description('Show every id ever assigned, deleted ones included')
    .action(() => $try(session, () => {
      displayTasks(listAllTasks(session.registry.db), 'No tasks');
    }));
}
