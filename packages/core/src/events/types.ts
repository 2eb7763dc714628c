/**
 * Notifications published by the registry after a mutation commits.
 */

import type { Priority } from '../types/priority.js';
import type { Principal, TaskId, Timestamp } from '../types/task.js';

export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Timestamp of the call that produced the event */
  timestamp: Timestamp;
  /** Calling principal */
  actor: Principal;
};

export type TaskCreatedEvent = BaseEvent & {
  type: 'TaskCreated';
  payload: {
    taskId: TaskId;
    description: string;
    assignedTo: Principal;
    completed: boolean;
    dueDate: Timestamp;
    priority: Priority;
    createdAt: Timestamp;
  };
};

export type TaskCompletedEvent = BaseEvent & {
  type: 'TaskCompleted';
  payload: {
    taskId: TaskId;
    assignedTo: Principal;
  };
};

export type TaskDeletedEvent = BaseEvent & {
  type: 'TaskDeleted';
  payload: {
    taskId: TaskId;
    deletedBy: Principal;
  };
};

export type TaskReassignedEvent = BaseEvent & {
  type: 'TaskReassigned';
  payload: {
    taskId: TaskId;
    oldAssignee: Principal;
    newAssignee: Principal;
  };
};

/** Carries the full current triple, not only the field that changed */
export type TaskUpdatedEvent = BaseEvent & {
  type: 'TaskUpdated';
  payload: {
    taskId: TaskId;
    description: string;
    dueDate: Timestamp;
    priority: Priority;
  };
};

export type RegistryPausedEvent = BaseEvent & {
  type: 'RegistryPaused';
};

export type RegistryResumedEvent = BaseEvent & {
  type: 'RegistryResumed';
};

export type RegistryEvent =
  | TaskCreatedEvent
  | TaskCompletedEvent
  | TaskDeletedEvent
  | TaskReassignedEvent
  | TaskUpdatedEvent
  | RegistryPausedEvent
  | RegistryResumedEvent;

export type RegistryEventType = RegistryEvent['type'];

export type EventOf<K extends RegistryEventType> = Extract<RegistryEvent, { type: K }>;

export type EventHandler<T extends RegistryEvent = RegistryEvent> = (event: T) => void;

export type EventSubscription = {
  /** Unique subscription identifier */
  id: string;
  /** Event type, or '*' for every event */
  eventType: RegistryEventType | '*';
  /** Wrapped handler registered on the emitter */
  handler: EventHandler;
  metadata: {
    createdAt: number;
  };
};
