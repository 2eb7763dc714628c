/**
 * Active / Paused state machine. Only the owner moves it; task mutations
 * require Active, reads never look at it.
 */

import type { Registry } from '../registry.js';
import { atomically } from '../registry.js';
import type { RegistryDb } from '../db.js';
import type { CallContext } from '../types/task.js';
import { RegistryError } from '../types/errors.js';
import { assertAccess } from '../auth/policy.js';
import { getOwner, isPaused, setPaused } from '../queries/state-queries.js';

/** Throws PAUSED unless the registry is Active */
export function assertActive(db: RegistryDb): void {
  if (isPaused(db)) {
    throw new RegistryError('Registry is paused', 'PAUSED');
  }
}

/** Active → Paused. Fails with INVALID_STATE when already paused */
export function pauseRegistry(registry: Registry, ctx: CallContext): void {
  atomically(registry, () => {
    assertAccess({ caller: ctx.caller, owner: getOwner(registry.db), action: 'pause' });
    if (isPaused(registry.db)) {
      throw new RegistryError('Registry is already paused', 'INVALID_STATE');
    }
    setPaused(registry.db, true);
  });

  registry.events.publish({ type: 'RegistryPaused', timestamp: ctx.timestamp, actor: ctx.caller });
}

/** Paused → Active. Fails with INVALID_STATE when already active */
export function resumeRegistry(registry: Registry, ctx: CallContext): void {
  atomically(registry, () => {
    assertAccess({ caller: ctx.caller, owner: getOwner(registry.db), action: 'resume' });
    if (!isPaused(registry.db)) {
      throw new RegistryError('Registry is not paused', 'INVALID_STATE');
    }
    setPaused(registry.db, false);
  });

  registry.events.publish({ type: 'RegistryResumed', timestamp: ctx.timestamp, actor: ctx.caller });
}
