/**
 * Who may do what. Every role check in the registry goes through
 * `checkAccess`, so the rule set lives in one table.
 */

import type { Principal, Task } from '../types/task.js';
import { RegistryError } from '../types/errors.js';

export type TaskAction =
  | 'create'
  | 'complete'
  | 'delete'
  | 'ownerDelete'
  | 'reassign'
  | 'updateDescription'
  | 'updateDueDate'
  | 'updatePriority'
  | 'pause'
  | 'resume';

export type Role = 'anyone' | 'assignee' | 'owner';

export const REQUIRED_ROLE: Readonly<Record<TaskAction, Role>> = {
  create: 'anyone',
  complete: 'assignee',
  delete: 'assignee',
  reassign: 'assignee',
  updateDescription: 'assignee',
  updateDueDate: 'assignee',
  updatePriority: 'assignee',
  ownerDelete: 'owner',
  pause: 'owner',
  resume: 'owner',
};

export interface AccessRequest {
  readonly caller: Principal;
  readonly owner: Principal;
  readonly action: TaskAction;
  /** The referenced task, for assignee-gated actions */
  readonly task?: Task | null;
}

export type AccessDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: string };

export function checkAccess(request: AccessRequest): AccessDecision {
  const { caller, owner, action, task } = request;
  switch (REQUIRED_ROLE[action]) {
    case 'anyone':
      return { allowed: true };
    case 'owner':
      return caller === owner
        ? { allowed: true }
        : { allowed: false, reason: `Only the registry owner may ${action}` };
    case 'assignee':
      if (!task) return { allowed: false, reason: `No task to ${action}` };
      return task.assignedTo !== null && caller === task.assignedTo
        ? { allowed: true }
        : { allowed: false, reason: `Only the assignee of task ${task.id} may ${action} it` };
  }
}

/** Throws UNAUTHORIZED when the policy denies the request */
export function assertAccess(request: AccessRequest): void {
  const decision = checkAccess(request);
  if (!decision.allowed) {
    throw new RegistryError(decision.reason, 'UNAUTHORIZED', request.task?.id);
  }
}
