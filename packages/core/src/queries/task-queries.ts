/**
 * Task store: every write to the tasks table.
 *
 * Each operation checks its gates in the same order (pause, id, role,
 * operation-specific state) inside one transaction, then publishes its
 * notification once the transaction has committed.
 */

import { eq } from 'drizzle-orm';
import type { RegistryDb } from '../db.js';
import type { Registry } from '../registry.js';
import { atomically } from '../registry.js';
import { tasks } from '../schema/tasks.js';
import type { CallContext, LiveTask, NewTask, Principal, TaskId, Timestamp } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { RegistryError } from '../types/errors.js';
import type { TaskAction } from '../auth/policy.js';
import { assertAccess } from '../auth/policy.js';
import { assertActive } from '../pause/pause-controller.js';
import { allocateTaskId, getOwner, getTaskCounter, releaseTaskSlot } from './state-queries.js';
import { toTask } from './task-helpers.js';

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

/** Throws NOT_FOUND unless 1 <= id <= task counter */
export function assertValidId(db: RegistryDb, taskId: TaskId): void {
  if (!Number.isInteger(taskId) || taskId < 1 || taskId > getTaskCounter(db)) {
    throw new RegistryError(`Task ${taskId} does not exist`, 'NOT_FOUND', taskId);
  }
}

/** The live record, or null for an unknown or deleted id */
export function findTask(db: RegistryDb, taskId: TaskId): LiveTask | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Live record for a mutation. Deleted ids fail like unknown ones */
export function requireLiveTask(db: RegistryDb, taskId: TaskId): LiveTask {
  assertValidId(db, taskId);
  const task = findTask(db, taskId);
  if (!task) throw new RegistryError(`Task ${taskId} has been deleted`, 'NOT_FOUND', taskId);
  return task;
}

// ---------------------------------------------------------------------------
// Gated mutation scaffolding
// ---------------------------------------------------------------------------

/** Pause, id and role gates for an action on an existing task */
function guardTask(registry: Registry, ctx: CallContext, taskId: TaskId, action: TaskAction): LiveTask {
  assertActive(registry.db);
  const task = requireLiveTask(registry.db, taskId);
  assertAccess({ caller: ctx.caller, owner: getOwner(registry.db), action, task });
  return task;
}

type TaskChanges = Partial<Pick<LiveTask, 'description' | 'assignedTo' | 'completed' | 'dueDate' | 'priority'>>;

function applyChanges(db: RegistryDb, task: LiveTask, changes: TaskChanges): LiveTask {
  const updated: LiveTask = { ...task, ...changes };
  db.update(tasks).set({
    description: updated.description,
    assignedTo: updated.assignedTo,
    completed: updated.completed,
    dueDate: updated.dueDate,
    priority: updated.priority,
  }).where(eq(tasks.id, task.id)).run();
  return updated;
}

function publishUpdated(registry: Registry, ctx: CallContext, task: LiveTask): void {
  registry.events.publish({
    type: 'TaskUpdated',
    timestamp: ctx.timestamp,
    actor: ctx.caller,
    payload: {
      taskId: task.id,
      description: task.description,
      dueDate: task.dueDate,
      priority: task.priority,
    },
  });
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/** Create a task assigned to the caller */
export function createTask(registry: Registry, ctx: CallContext, input: NewTask): LiveTask {
  const task = atomically(registry, () => {
    assertActive(registry.db);
    assertAccess({ caller: ctx.caller, owner: getOwner(registry.db), action: 'create' });

    const id = allocateTaskId(registry.db);
    const created: LiveTask = {
      id,
      description: input.description,
      assignedTo: ctx.caller,
      completed: false,
      dueDate: input.dueDate,
      priority: input.priority,
      createdAt: ctx.timestamp,
    };
    registry.db.insert(tasks).values({
      id,
      description: created.description,
      assignedTo: ctx.caller,
      completed: false,
      dueDate: created.dueDate,
      priority: input.priority,
      createdAt: created.createdAt,
    }).run();
    return created;
  });

  registry.events.publish({
    type: 'TaskCreated',
    timestamp: ctx.timestamp,
    actor: ctx.caller,
    payload: {
      taskId: task.id,
      description: task.description,
      assignedTo: ctx.caller,
      completed: false,
      dueDate: task.dueDate,
      priority: input.priority,
      createdAt: task.createdAt,
    },
  });
  return task;
}

/** Mark a task complete. There is no way back */
export function completeTask(registry: Registry, ctx: CallContext, taskId: TaskId): LiveTask {
  const task = atomically(registry, () => {
    const current = guardTask(registry, ctx, taskId, 'complete');
    if (current.completed) {
      throw new RegistryError(`Task ${taskId} is already completed`, 'ALREADY_COMPLETED', taskId);
    }
    return applyChanges(registry.db, current, { completed: true });
  });

  registry.events.publish({
    type: 'TaskCompleted',
    timestamp: ctx.timestamp,
    actor: ctx.caller,
    payload: { taskId, assignedTo: ctx.caller },
  });
  return task;
}

function removeTask(registry: Registry, ctx: CallContext, taskId: TaskId, action: 'delete' | 'ownerDelete'): void {
  atomically(registry, () => {
    guardTask(registry, ctx, taskId, action);
    registry.db.delete(tasks).where(eq(tasks.id, taskId)).run();
    releaseTaskSlot(registry.db);
  });

  registry.events.publish({
    type: 'TaskDeleted',
    timestamp: ctx.timestamp,
    actor: ctx.caller,
    payload: { taskId, deletedBy: ctx.caller },
  });
}

/** Delete a task the caller is assigned to */
export function deleteTask(registry: Registry, ctx: CallContext, taskId: TaskId): void {
  removeTask(registry, ctx, taskId, 'delete');
}

/** Delete any task; owner only */
export function ownerDeleteTask(registry: Registry, ctx: CallContext, taskId: TaskId): void {
  removeTask(registry, ctx, taskId, 'ownerDelete');
}

/** Hand the task (and the right to change it) to someone else */
export function reassignTask(registry: Registry, ctx: CallContext, taskId: TaskId, newAssignee: Principal): LiveTask {
  const result = atomically(registry, () => {
    const current = guardTask(registry, ctx, taskId, 'reassign');
    return { oldAssignee: current.assignedTo, task: applyChanges(registry.db, current, { assignedTo: newAssignee }) };
  });

  registry.events.publish({
    type: 'TaskReassigned',
    timestamp: ctx.timestamp,
    actor: ctx.caller,
    payload: { taskId, oldAssignee: result.oldAssignee, newAssignee },
  });
  return result.task;
}

function updateField(
  registry: Registry,
  ctx: CallContext,
  taskId: TaskId,
  action: 'updateDescription' | 'updateDueDate' | 'updatePriority',
  changes: TaskChanges,
): LiveTask {
  const task = atomically(registry, () => {
    const current = guardTask(registry, ctx, taskId, action);
    return applyChanges(registry.db, current, changes);
  });
  publishUpdated(registry, ctx, task);
  return task;
}

export function updateTaskDescription(registry: Registry, ctx: CallContext, taskId: TaskId, description: string): LiveTask {
  return updateField(registry, ctx, taskId, 'updateDescription', { description });
}

export function updateTaskDueDate(registry: Registry, ctx: CallContext, taskId: TaskId, dueDate: Timestamp): LiveTask {
  return updateField(registry, ctx, taskId, 'updateDueDate', { dueDate });
}

export function updateTaskPriority(registry: Registry, ctx: CallContext, taskId: TaskId, priority: Priority): LiveTask {
  return updateField(registry, ctx, taskId, 'updatePriority', { priority });
}
