import type { Priority } from './priority.js';

/** Sequential, starts at 1. 0 never denotes a task */
export type TaskId = number;
/** Identity of a calling party, e.g. an account address */
export type Principal = string;
/** Whole seconds */
export type Timestamp = number;

export interface Task {
  readonly id: TaskId;
  readonly description: string;
  /** null only on an emptied (deleted) slot */
  readonly assignedTo: Principal | null;
  readonly completed: boolean;
  readonly dueDate: Timestamp;
  /** null only on an emptied (deleted) slot */
  readonly priority: Priority | null;
  readonly createdAt: Timestamp;
}

/** A record that has not been deleted */
export interface LiveTask extends Task {
  readonly assignedTo: Principal;
  readonly priority: Priority;
}

export interface NewTask {
  readonly description: string;
  readonly dueDate: Timestamp;
  readonly priority: Priority;
}

/** Supplied by the host for every call; the caller is never an operation argument */
export interface CallContext {
  readonly caller: Principal;
  readonly timestamp: Timestamp;
}

export interface RegistryStats {
  readonly live: number;
  readonly completed: number;
  readonly open: number;
  readonly byPriority: Readonly<Record<Priority, number>>;
  readonly paused: boolean;
}
