import type { TaskId } from './task.js';

export type RegistryErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'ALREADY_COMPLETED'
  | 'PAUSED';

/**
 * Thrown by every gate and store operation. The operation it aborts
 * leaves no partial state behind.
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: RegistryErrorCode,
    public readonly taskId?: TaskId,
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}
