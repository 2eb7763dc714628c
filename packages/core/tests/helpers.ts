import type { CallContext, Principal } from '../src/types/task.js';
import { isRegistryError, type RegistryErrorCode } from '../src/types/errors.js';

export const OWNER = 'owner-0x01';
export const ALICE = 'alice-0xa1';
export const BOB = 'bob-0xb2';

export function as(caller: Principal, timestamp = 1_000): CallContext {
  return { caller, timestamp };
}

/** Run `fn` and return the RegistryError code it throws, or null if it returns */
export function errorCode(fn: () => unknown): RegistryErrorCode | null {
  try {
    fn();
  } catch (err: unknown) {
    if (isRegistryError(err)) return err.code;
    throw err;
  }
  return null;
}
