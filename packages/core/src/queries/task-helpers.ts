import type { LiveTask, Task, TaskId } from '../types/task.js';
import type { tasks } from '../schema/tasks.js';

/** What a deleted id reads back as */
export function emptySlot(id: TaskId): Task {
  return {
    id,
    description: '',
    assignedTo: null,
    completed: false,
    dueDate: 0,
    priority: null,
    createdAt: 0,
  };
}

export function isEmptySlot(task: Task): boolean {
  return task.assignedTo === null;
}

/** Map a Drizzle row to a Task object */
export function toTask(row: typeof tasks.$inferSelect): LiveTask {
  return {
    id: row.id,
    description: row.description,
    assignedTo: row.assignedTo,
    completed: row.completed,
    dueDate: row.dueDate,
    priority: row.priority,
    createdAt: row.createdAt,
  };
}

/** Ascending due date. Array#sort is stable, so equal due dates keep their incoming order */
export function sortByDueDate(taskList: readonly Task[]): Task[] {
  return [...taskList].sort((a, b) => a.dueDate - b.dueDate);
}

/**
 * Slice `[page * pageSize, min((page + 1) * pageSize, total))`.
 * A zero or fractional page size, a negative page, or a page past the end yields [].
 */
export function paginate<T>(items: readonly T[], page: number, pageSize: number): T[] {
  if (!Number.isInteger(page) || !Number.isInteger(pageSize)) return [];
  if (page < 0 || pageSize <= 0) return [];
  const start = page * pageSize;
  if (start >= items.length) return [];
  return items.slice(start, Math.min(start + pageSize, items.length));
}
