import { describe, it, expect, beforeEach } from 'vitest';
import { createRegistry, type Registry } from '../../src/registry.js';
import {
  createTask,
  completeTask,
  deleteTask,
  ownerDeleteTask,
  reassignTask,
  updateTaskDescription,
  updateTaskDueDate,
  updateTaskPriority,
  findTask,
} from '../../src/queries/task-queries.js';
import { countTasks, getTaskCounter } from '../../src/queries/state-queries.js';
import { getTask } from '../../src/queries/view-queries.js';
import { pauseRegistry } from '../../src/pause/pause-controller.js';
import { Priority } from '../../src/types/priority.js';
import type { RegistryEvent } from '../../src/events/types.js';
import { OWNER, ALICE, BOB, as, errorCode } from '../helpers.js';

let registry: Registry;
let events: RegistryEvent[];

beforeEach(() => {
  registry = createRegistry(OWNER);
  events = [];
  registry.events.subscribeToAll(e => { events.push(e); });
});

function addAliceTask(description = 'write report', dueDate = 100) {
  return createTask(registry, as(ALICE), { description, dueDate, priority: Priority.Medium });
}

describe('createTask', () => {
  it('assigns the caller and sequential ids from 1', () => {
    const first = addAliceTask();
    const second = createTask(registry, as(BOB, 2_000), { description: 'review', dueDate: 50, priority: Priority.High });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(second).toEqual({
      id: 2,
      description: 'review',
      assignedTo: BOB,
      completed: false,
      dueDate: 50,
      priority: Priority.High,
      createdAt: 2_000,
    });
  });

  it('bumps both counters', () => {
    addAliceTask();
    addAliceTask();
    expect(getTaskCounter(registry.db)).toBe(2);
    expect(countTasks(registry.db)).toBe(2);
  });

  it('publishes TaskCreated with every initial field', () => {
    addAliceTask('write report', 100);
    expect(events).toEqual([{
      type: 'TaskCreated',
      timestamp: 1_000,
      actor: ALICE,
      payload: {
        taskId: 1,
        description: 'write report',
        assignedTo: ALICE,
        completed: false,
        dueDate: 100,
        priority: Priority.Medium,
        createdAt: 1_000,
      },
    }]);
  });

  it('never reuses an id after a delete', () => {
    addAliceTask();
    addAliceTask();
    deleteTask(registry, as(ALICE), 2);
    const next = addAliceTask();
    expect(next.id).toBe(3);
    expect(getTaskCounter(registry.db)).toBe(3);
    expect(countTasks(registry.db)).toBe(2);
  });
});

describe('completeTask', () => {
  it('marks the task completed and publishes TaskCompleted', () => {
    addAliceTask();
    const task = completeTask(registry, as(ALICE, 1_500), 1);
    expect(task.completed).toBe(true);
    expect(findTask(registry.db, 1)?.completed).toBe(true);
    expect(events.at(-1)).toEqual({
      type: 'TaskCompleted',
      timestamp: 1_500,
      actor: ALICE,
      payload: { taskId: 1, assignedTo: ALICE },
    });
  });

  it('rejects a second completion', () => {
    addAliceTask();
    completeTask(registry, as(ALICE), 1);
    expect(errorCode(() => completeTask(registry, as(ALICE), 1))).toBe('ALREADY_COMPLETED');
    expect(findTask(registry.db, 1)?.completed).toBe(true);
  });

  it('rejects anyone but the assignee', () => {
    addAliceTask();
    expect(errorCode(() => completeTask(registry, as(BOB), 1))).toBe('UNAUTHORIZED');
    expect(errorCode(() => completeTask(registry, as(OWNER), 1))).toBe('UNAUTHORIZED');
    expect(findTask(registry.db, 1)?.completed).toBe(false);
  });

  it('rejects ids outside the assigned range', () => {
    addAliceTask();
    expect(errorCode(() => completeTask(registry, as(ALICE), 0))).toBe('NOT_FOUND');
    expect(errorCode(() => completeTask(registry, as(ALICE), 2))).toBe('NOT_FOUND');
  });
});

describe('deleteTask', () => {
  it('empties the slot and drops the live counter', () => {
    addAliceTask();
    deleteTask(registry, as(ALICE), 1);

    expect(findTask(registry.db, 1)).toBeNull();
    expect(getTask(registry.db, 1)).toEqual({
      id: 1,
      description: '',
      assignedTo: null,
      completed: false,
      dueDate: 0,
      priority: null,
      createdAt: 0,
    });
    expect(countTasks(registry.db)).toBe(0);
    expect(getTaskCounter(registry.db)).toBe(1);
    expect(events.at(-1)).toEqual({
      type: 'TaskDeleted',
      timestamp: 1_000,
      actor: ALICE,
      payload: { taskId: 1, deletedBy: ALICE },
    });
  });

  it('is limited to the assignee', () => {
    addAliceTask();
    expect(errorCode(() => deleteTask(registry, as(BOB), 1))).toBe('UNAUTHORIZED');
    expect(errorCode(() => deleteTask(registry, as(OWNER), 1))).toBe('UNAUTHORIZED');
    expect(countTasks(registry.db)).toBe(1);
  });

  it('treats an already deleted id as not found', () => {
    addAliceTask();
    deleteTask(registry, as(ALICE), 1);
    expect(errorCode(() => deleteTask(registry, as(ALICE), 1))).toBe('NOT_FOUND');
    expect(countTasks(registry.db)).toBe(0);
  });
});

describe('ownerDeleteTask', () => {
  it('lets the owner delete any task', () => {
    addAliceTask();
    ownerDeleteTask(registry, as(OWNER), 1);
    expect(findTask(registry.db, 1)).toBeNull();
    expect(countTasks(registry.db)).toBe(0);
    expect(events.at(-1)).toMatchObject({ type: 'TaskDeleted', payload: { taskId: 1, deletedBy: OWNER } });
  });

  it('refuses the assignee', () => {
    addAliceTask();
    expect(errorCode(() => ownerDeleteTask(registry, as(ALICE), 1))).toBe('UNAUTHORIZED');
  });

  it('still requires the registry to be active', () => {
    addAliceTask();
    pauseRegistry(registry, as(OWNER));
    expect(errorCode(() => ownerDeleteTask(registry, as(OWNER), 1))).toBe('PAUSED');
    expect(countTasks(registry.db)).toBe(1);
  });
});

describe('reassignTask', () => {
  it('moves mutation rights to the new assignee', () => {
    addAliceTask();
    const task = reassignTask(registry, as(ALICE), 1, BOB);
    expect(task.assignedTo).toBe(BOB);
    expect(events.at(-1)).toEqual({
      type: 'TaskReassigned',
      timestamp: 1_000,
      actor: ALICE,
      payload: { taskId: 1, oldAssignee: ALICE, newAssignee: BOB },
    });

    expect(errorCode(() => completeTask(registry, as(ALICE), 1))).toBe('UNAUTHORIZED');
    expect(completeTask(registry, as(BOB), 1).completed).toBe(true);
  });

  it('is limited to the current assignee', () => {
    addAliceTask();
    expect(errorCode(() => reassignTask(registry, as(BOB), 1, BOB))).toBe('UNAUTHORIZED');
    expect(findTask(registry.db, 1)?.assignedTo).toBe(ALICE);
  });
});

describe('field updates', () => {
  beforeEach(() => {
    addAliceTask('write report', 100);
    events = [];
  });

  it('updates the description and reports the full triple', () => {
    const task = updateTaskDescription(registry, as(ALICE), 1, 'write final report');
    expect(task.description).toBe('write final report');
    expect(events).toEqual([{
      type: 'TaskUpdated',
      timestamp: 1_000,
      actor: ALICE,
      payload: { taskId: 1, description: 'write final report', dueDate: 100, priority: Priority.Medium },
    }]);
  });

  it('updates the due date', () => {
    updateTaskDueDate(registry, as(ALICE), 1, 250);
    expect(findTask(registry.db, 1)?.dueDate).toBe(250);
    expect(events[0]).toMatchObject({ payload: { description: 'write report', dueDate: 250, priority: Priority.Medium } });
  });

  it('updates the priority', () => {
    updateTaskPriority(registry, as(ALICE), 1, Priority.High);
    expect(findTask(registry.db, 1)?.priority).toBe(Priority.High);
    expect(events[0]).toMatchObject({ payload: { description: 'write report', dueDate: 100, priority: Priority.High } });
  });

  it('keeps createdAt and completion untouched', () => {
    updateTaskDueDate(registry, as(ALICE, 9_999), 1, 300);
    const task = findTask(registry.db, 1);
    expect(task?.createdAt).toBe(1_000);
    expect(task?.completed).toBe(false);
  });

  it('rejects other callers without publishing', () => {
    expect(errorCode(() => updateTaskDescription(registry, as(BOB), 1, 'hijacked'))).toBe('UNAUTHORIZED');
    expect(findTask(registry.db, 1)?.description).toBe('write report');
    expect(events).toEqual([]);
  });

  it('does not resurrect a deleted slot', () => {
    deleteTask(registry, as(ALICE), 1);
    expect(errorCode(() => updateTaskDueDate(registry, as(ALICE), 1, 500))).toBe('NOT_FOUND');
    expect(findTask(registry.db, 1)).toBeNull();
  });
});

describe('paused registry', () => {
  it('rejects every task mutation and leaves the store untouched', () => {
    addAliceTask();
    pauseRegistry(registry, as(OWNER));
    events = [];

    const attempts: Array<() => unknown> = [
      () => addAliceTask(),
      () => completeTask(registry, as(ALICE), 1),
      () => deleteTask(registry, as(ALICE), 1),
      () => ownerDeleteTask(registry, as(OWNER), 1),
      () => reassignTask(registry, as(ALICE), 1, BOB),
      () => updateTaskDescription(registry, as(ALICE), 1, 'x'),
      () => updateTaskDueDate(registry, as(ALICE), 1, 1),
      () => updateTaskPriority(registry, as(ALICE), 1, Priority.Low),
    ];
    for (const attempt of attempts) {
      expect(errorCode(attempt)).toBe('PAUSED');
    }

    expect(getTaskCounter(registry.db)).toBe(1);
    expect(countTasks(registry.db)).toBe(1);
    expect(findTask(registry.db, 1)).toEqual({
      id: 1,
      description: 'write report',
      assignedTo: ALICE,
      completed: false,
      dueDate: 100,
      priority: Priority.Medium,
      createdAt: 1_000,
    });
    expect(events).toEqual([]);
  });

  it('checks the pause gate before the id gate', () => {
    pauseRegistry(registry, as(OWNER));
    expect(errorCode(() => completeTask(registry, as(ALICE), 42))).toBe('PAUSED');
  });
});
