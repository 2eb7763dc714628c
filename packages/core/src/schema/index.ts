export { tasks } from './tasks.js';
export { registryState } from './registry-state.js';
