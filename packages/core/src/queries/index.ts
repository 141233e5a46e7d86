export {
  getTaskById,
  listTasks,
  getStats,
  createTask,
  replaceTask,
  patchTask,
  deleteTask,
  clearTasks,
  seedTasks,
} from './task-queries.js';
