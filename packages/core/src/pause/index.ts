export { assertActive, pauseRegistry, resumeRegistry } from './pause-controller.js';
