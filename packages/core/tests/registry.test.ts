import { describe, it, expect } from 'vitest';
import { createRegistry, atomically } from '../src/registry.js';
import { allocateTaskId, getRegistryState } from '../src/queries/state-queries.js';
import { createTask } from '../src/queries/task-queries.js';
import { Priority } from '../src/types/priority.js';
import { EventBus } from '../src/events/event-bus.js';
import { OWNER, ALICE, as } from './helpers.js';

describe('createRegistry', () => {
  it('starts active with zeroed counters', () => {
    const registry = createRegistry(OWNER);
    expect(getRegistryState(registry.db)).toEqual({ owner: OWNER, paused: false, taskCounter: 0, liveCount: 0 });
  });

  it('rejects a blank owner', () => {
    expect(() => createRegistry('  ')).toThrow('Registry owner must be a non-empty principal');
  });

  it('keeps registries independent', () => {
    const first = createRegistry(OWNER);
    const second = createRegistry(OWNER);
    createTask(first, as(ALICE), { description: 'only here', dueDate: 1, priority: Priority.Low });
    expect(getRegistryState(first.db).taskCounter).toBe(1);
    expect(getRegistryState(second.db).taskCounter).toBe(0);
  });

  it('uses a supplied event bus', () => {
    const events = new EventBus();
    expect(createRegistry(OWNER, { events }).events).toBe(events);
  });
});

describe('atomically', () => {
  it('rolls back every write when the callback throws', () => {
    const registry = createRegistry(OWNER);
    expect(() => atomically(registry, () => {
      allocateTaskId(registry.db);
      throw new Error('abort');
    })).toThrow('abort');
    expect(getRegistryState(registry.db)).toMatchObject({ taskCounter: 0, liveCount: 0 });
  });
});
