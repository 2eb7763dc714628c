import { Command } from 'commander';
import { countTasks, countTasksByAssignee, getRegistryState, getStats } from '@task-registry/core';
import type { Session } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createCountCommand(session: Session): Command {
  return new Command('count')
    .description('Count live tasks, optionally for one assignee')
    .option('-a, --assignee <principal>', 'Count only tasks held by this principal')
    .action((opts: { assignee?: string }) => $try(session, () => {
      const db = session.registry.db;
      if (opts.assignee != null) {
        out.info(`${opts.assignee}: ${countTasksByAssignee(db, opts.assignee)}`);
      } else {
        out.info(`Live tasks: ${countTasks(db)}`);
      }
    }));
}

export function createStatusCommand(session: Session): Command {
  return new Command('status')
    .description('Show registry state and task statistics')
    .action(() => $try(session, () => {
      const db = session.registry.db;
      const state = getRegistryState(db);
      const stats = getStats(db);
      out.info(`Owner: ${state.owner}`);
      out.info(`State: ${state.paused ? 'paused' : 'active'}`);
      out.info(`Tasks: ${stats.live} live, ${stats.completed} completed, ${stats.open} open`);
      out.info(`Priority: ${stats.byPriority.high} high, ${stats.byPriority.medium} medium, ${stats.byPriority.low} low`);
      out.info(`Ids assigned: ${state.taskCounter}`);
    }));
}
