// Types
export { Priority, PriorityName, PRIORITIES } from './types/index.js';
export type { TaskId, Principal, Timestamp, Task, LiveTask, NewTask, CallContext, RegistryStats } from './types/index.js';
export { RegistryError, isRegistryError } from './types/index.js';
export type { RegistryErrorCode } from './types/index.js';

// Registry
export { createRegistry, atomically } from './registry.js';
export type { Registry, RegistryOptions } from './registry.js';
export type { RegistryDb } from './db.js';

// Authorization
export * from './auth/index.js';

// Pause controller
export * from './pause/index.js';

// Events
export * from './events/index.js';

// Queries
export * from './queries/index.js';
