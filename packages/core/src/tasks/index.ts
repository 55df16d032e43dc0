export { DrizzleTaskRepository, escapeLikePattern } from './task-repository.js';
export type { TaskRepository } from './task-repository.js';
export { TaskService, DEFAULT_TASK_LIMIT, MAX_TASK_LIMIT } from './task-service.js';
export { InvalidCategoryError, TaskNotFoundError } from './task-errors.js';
export type {
  CreateTaskData,
  CreateTaskParams,
  ListTasksParams,
  Task,
  TaskDetails,
  TaskListFilter,
  TaskListResult,
  TaskStats,
  TaskStatusCounts,
  UpdateTaskData,
  UpdateTaskParams,
} from './task-types.js';
