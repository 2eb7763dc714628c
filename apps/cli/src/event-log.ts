import type { RegistryEvent } from '@task-registry/core';

const MAX_ENTRIES = 200;

/** Most recent notifications of a session, oldest first */
export class EventLog {
  private readonly buffer: RegistryEvent[] = [];

  constructor(private readonly maxEntries = MAX_ENTRIES) {}

  push(event: RegistryEvent): void {
    this.buffer.push(event);
    if (this.buffer.length > this.maxEntries) this.buffer.shift();
  }

  /** The last `limit` entries, or all of them */
  history(limit?: number): RegistryEvent[] {
    if (limit == null) return [...this.buffer];
    if (limit <= 0) return [];
    return this.buffer.slice(-limit);
  }

  get size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer.length = 0;
  }
}
