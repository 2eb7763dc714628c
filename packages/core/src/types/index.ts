export { Priority, PriorityName, PRIORITIES } from './priority.js';
export type { TaskId, Principal, Timestamp, Task, LiveTask, NewTask, CallContext, RegistryStats } from './task.js';
export { RegistryError, isRegistryError } from './errors.js';
export type { RegistryErrorCode } from './errors.js';
