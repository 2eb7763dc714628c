import type Database from 'better-sqlite3';
import { openDb } from './db.js';
import type { RegistryDb } from './db.js';
import { EventBus } from './events/event-bus.js';
import { initRegistryState } from './queries/state-queries.js';
import type { Principal } from './types/task.js';

/**
 * Everything an operation needs, passed explicitly.
 * There is no process-wide registry instance.
 */
export interface Registry {
  readonly db: RegistryDb;
  /** Raw handle, used for transactions */
  readonly sqlite: Database.Database;
  readonly events: EventBus;
}

export interface RegistryOptions {
  /** Share a bus between registries or subscribe before the first call */
  events?: EventBus;
}

/** Create an empty, active registry owned by `owner` */
export function createRegistry(owner: Principal, options: RegistryOptions = {}): Registry {
  if (owner.trim() === '') {
    throw new Error('Registry owner must be a non-empty principal');
  }
  const { db, sqlite } = openDb();
  initRegistryState(db, owner);
  return { db, sqlite, events: options.events ?? new EventBus() };
}

/**
 * Run `fn` as one transaction. A throw rolls back every write made inside it;
 * the synchronous driver keeps other calls from interleaving.
 */
export function atomically<T>(registry: Registry, fn: () => T): T {
  return registry.sqlite.transaction(fn)();
}
