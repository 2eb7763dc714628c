// Registry state
export {
  getRegistryState,
  getOwner,
  isPaused,
  getTaskCounter,
  countTasks,
} from './state-queries.js';
export type { RegistryState } from './state-queries.js';

// Task helpers
export { emptySlot, isEmptySlot, sortByDueDate, paginate } from './task-helpers.js';

// Task store
export {
  findTask,
  createTask,
  completeTask,
  deleteTask,
  ownerDeleteTask,
  reassignTask,
  updateTaskDescription,
  updateTaskDueDate,
  updateTaskPriority,
} from './task-queries.js';

// Views
export {
  getTask,
  listMyTasks,
  listTaskIdsByPriority,
  listTaskIdsByCompletion,
  countTasksByAssignee,
  listAllTasks,
  getStats,
} from './view-queries.js';
