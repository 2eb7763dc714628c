export { checkAccess, assertAccess, REQUIRED_ROLE } from './policy.js';
export type { TaskAction, Role, AccessRequest, AccessDecision } from './policy.js';
