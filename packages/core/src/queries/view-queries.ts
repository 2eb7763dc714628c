/**
 * Read-only views over the task store. None of these look at the pause
 * flag or the caller's role.
 */

import { asc, count, eq } from 'drizzle-orm';
import type { RegistryDb } from '../db.js';
import { tasks } from '../schema/tasks.js';
import type { CallContext, Principal, RegistryStats, Task, TaskId } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { PRIORITIES } from '../types/priority.js';
import { getRegistryState } from './state-queries.js';
import { assertValidId, findTask } from './task-queries.js';
import { emptySlot, paginate, sortByDueDate, toTask } from './task-helpers.js';

/** Any id in 1..counter. A deleted id reads back as the empty slot */
export function getTask(db: RegistryDb, taskId: TaskId): Task {
  assertValidId(db, taskId);
  return findTask(db, taskId) ?? emptySlot(taskId);
}

/** One page of the caller's tasks, soonest due first */
export function listMyTasks(db: RegistryDb, ctx: Pick<CallContext, 'caller'>, page: number, pageSize: number): Task[] {
  const rows = db.select().from(tasks)
    .where(eq(tasks.assignedTo, ctx.caller))
    .orderBy(asc(tasks.id))
    .all();
  return paginate(sortByDueDate(rows.map(toTask)), page, pageSize);
}

export function listTaskIdsByPriority(db: RegistryDb, priority: Priority): TaskId[] {
  return db.select({ id: tasks.id }).from(tasks)
    .where(eq(tasks.priority, priority))
    .orderBy(asc(tasks.id))
    .all()
    .map(r => r.id);
}

export function listTaskIdsByCompletion(db: RegistryDb, completed: boolean): TaskId[] {
  return db.select({ id: tasks.id }).from(tasks)
    .where(eq(tasks.completed, completed))
    .orderBy(asc(tasks.id))
    .all()
    .map(r => r.id);
}

export function countTasksByAssignee(db: RegistryDb, principal: Principal): number {
  const row = db.select({ n: count() }).from(tasks).where(eq(tasks.assignedTo, principal)).get();
  return row?.n ?? 0;
}

/** Every id from 1 to the counter, deleted ones included as empty slots */
export function listAllTasks(db: RegistryDb): Task[] {
  const { taskCounter } = getRegistryState(db);
  const live = new Map<TaskId, Task>();
  for (const row of db.select().from(tasks).orderBy(asc(tasks.id)).all()) {
    live.set(row.id, toTask(row));
  }

  const all: Task[] = [];
  for (let id = 1; id <= taskCounter; id++) {
    all.push(live.get(id) ?? emptySlot(id));
  }
  return all;
}

export function getStats(db: RegistryDb): RegistryStats {
  const state = getRegistryState(db);
  const completedRow = db.select({ n: count() }).from(tasks).where(eq(tasks.completed, true)).get();
  const completed = completedRow?.n ?? 0;

  const byPriority: Record<Priority, number> = { low: 0, medium: 0, high: 0 };
  for (const priority of PRIORITIES) {
    const row = db.select({ n: count() }).from(tasks).where(eq(tasks.priority, priority)).get();
    byPriority[priority] = row?.n ?? 0;
  }

  return {
    live: state.liveCount,
    completed,
    open: state.liveCount - completed,
    byPriority,
    paused: state.paused,
  };
}
