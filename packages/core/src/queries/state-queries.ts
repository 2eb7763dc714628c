/**
 * Registry-wide state: owner, pause flag and the two counters.
 */

import { eq, sql } from 'drizzle-orm';
import type { RegistryDb } from '../db.js';
import { registryState } from '../schema/index.js';
import type { Principal, TaskId } from '../types/task.js';

const STATE_ROW_ID = 1;

export interface RegistryState {
  readonly owner: Principal;
  readonly paused: boolean;
  readonly taskCounter: number;
  readonly liveCount: number;
}

/** Write the initial state row. Called once per registry */
export function initRegistryState(db: RegistryDb, owner: Principal): void {
  db.insert(registryState).values({
    id: STATE_ROW_ID,
    owner,
    paused: false,
    taskCounter: 0,
    liveCount: 0,
  }).run();
}

export function getRegistryState(db: RegistryDb): RegistryState {
  const row = db.select().from(registryState).where(eq(registryState.id, STATE_ROW_ID)).get();
  if (!row) throw new Error('Registry state is not initialized');
  return {
    owner: row.owner,
    paused: row.paused,
    taskCounter: row.taskCounter,
    liveCount: row.liveCount,
  };
}

export function getOwner(db: RegistryDb): Principal {
  return getRegistryState(db).owner;
}

export function isPaused(db: RegistryDb): boolean {
  return getRegistryState(db).paused;
}

/** Highest id ever assigned (0 before the first create) */
export function getTaskCounter(db: RegistryDb): number {
  return getRegistryState(db).taskCounter;
}

/** Number of tasks not yet deleted */
export function countTasks(db: RegistryDb): number {
  return getRegistryState(db).liveCount;
}

export function setPaused(db: RegistryDb, paused: boolean): void {
  db.update(registryState).set({ paused }).where(eq(registryState.id, STATE_ROW_ID)).run();
}

/** Bump both counters and return the new id */
export function allocateTaskId(db: RegistryDb): TaskId {
  db.update(registryState).set({
    taskCounter: sql`${registryState.taskCounter} + 1`,
    liveCount: sql`${registryState.liveCount} + 1`,
  }).where(eq(registryState.id, STATE_ROW_ID)).run();
  return getTaskCounter(db);
}

/** Drop the live counter after a delete. The id counter stays put */
export function releaseTaskSlot(db: RegistryDb): void {
  db.update(registryState).set({
    liveCount: sql`${registryState.liveCount} - 1`,
  }).where(eq(registryState.id, STATE_ROW_ID)).run();
}
