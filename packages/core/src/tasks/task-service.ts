/**
 * Task Service
 *
 * Owner-scoped task operations, listing and statistics.
 */

import type { TaskStatus } from '@taskhub/types';
import type { CategoryRepository } from '../categories/category-repository.js';
import { type Owner, belongsTo, requireOwned } from '../ownership.js';
import { definedOnly, hasChanges } from '../patch.js';
import type { TaskRepository } from './task-repository.js';
import { InvalidCategoryError, TaskNotFoundError } from './task-errors.js';
import type {
  CreateTaskParams,
  ListTasksParams,
  TaskDetails,
  TaskListFilter,
  TaskListResult,
  TaskStats,
  UpdateTaskData,
  UpdateTaskParams,
} from './task-types.js';

export const DEFAULT_TASK_LIMIT = 20;
export const MAX_TASK_LIMIT = 100;

export class TaskService {
  constructor(
    private taskRepo: TaskRepository,
    private categoryRepo: Pick<CategoryRepository, 'findById'>,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Create a task for the owner
   *
   * Business rules:
   * - A given category must belong to the owner
   * - Status starts as pending, priority defaults to medium
   *
   * @throws {InvalidCategoryError} If the category is missing or foreign
   */
  async createTask(owner: Owner, params: CreateTaskParams): Promise<TaskDetails> {
    const categoryId = params.categoryId ?? null;
    if (categoryId !== null) {
      await this.assertCategoryUsable(owner, categoryId);
    }

    return this.taskRepo.create({
      userId: owner.id,
      categoryId,
      title: params.title.trim(),
      description: params.description ?? null,
      priority: params.priority ?? 'medium',
      status: 'pending',
      dueDate: params.dueDate ?? null,
      completedAt: null,
    });
  }

  async getTask(owner: Owner, taskId: number): Promise<TaskDetails> {
    const task = await this.taskRepo.findById(taskId);
    return requireOwned(task, owner, () => new TaskNotFoundError(taskId));
  }

  async listTasks(owner: Owner, params: ListTasksParams = {}): Promise<TaskListResult> {
    const filter = this.toFilter(params);
    const { items, total } = await this.taskRepo.list(owner.id, filter);
    return { items, total, limit: filter.limit, offset: filter.offset };
  }

  async updateTask(owner: Owner, taskId: number, params: UpdateTaskParams): Promise<TaskDetails> {
    const task = await this.getTask(owner, taskId);
    const patch: UpdateTaskData = definedOnly({
      title: params.title?.trim(),
      description: params.description,
      categoryId: params.categoryId,
      priority: params.priority,
      dueDate: params.dueDate,
    });

    if (!hasChanges(patch)) {
      return task;
    }
    if (patch.categoryId !== undefined && patch.categoryId !== null) {
      await this.assertCategoryUsable(owner, patch.categoryId);
    }

    return this.save(task.id, patch);
  }

  /**
   * Set status; completedAt is stamped on completion and cleared on reopen
   */
  async setTaskStatus(owner: Owner, taskId: number, status: TaskStatus): Promise<TaskDetails> {
    const task = await this.getTask(owner, taskId);
    if (task.status === status) {
      return task;
    }

    return this.save(task.id, {
      status,
      completedAt: status === 'completed' ? this.now() : null,
    });
  }

  async deleteTask(owner: Owner, taskId: number): Promise<void> {
    const task = await this.getTask(owner, taskId);
    await this.taskRepo.delete(task.id);
  }

  async getStats(owner: Owner): Promise<TaskStats> {
    const counts = await this.taskRepo.countByStatus(owner.id);
    const completionRate =
      counts.total === 0 ? 0 : Math.round((counts.completed / counts.total) * 10000) / 100;
    return { ...counts, completionRate };
  }

  private async assertCategoryUsable(owner: Owner, categoryId: number): Promise<void> {
    const category = await this.categoryRepo.findById(categoryId);
    if (!category || !belongsTo(category, owner)) {
      throw new InvalidCategoryError(categoryId);
    }
  }

  private async save(taskId: number, patch: UpdateTaskData): Promise<TaskDetails> {
    const updated = await this.taskRepo.update(taskId, patch);
    if (!updated) {
      throw new TaskNotFoundError(taskId);
    }
    return updated;
  }

  private toFilter(params: ListTasksParams): TaskListFilter {
    const limit = Math.min(Math.max(params.limit ?? DEFAULT_TASK_LIMIT, 1), MAX_TASK_LIMIT);
    const offset = Math.max(params.offset ?? 0, 0);
    const search = params.search?.trim();

    return {
      status: params.status ?? 'all',
      priority: params.priority,
      categoryId: params.categoryId,
      search: search ? search : undefined,
      sortBy: params.sortBy ?? 'created_at',
      order: params.order ?? 'desc',
      limit,
      offset,
    };
  }
}
