/**
 * Task Domain Types
 */

import type {
  SortOrder,
  TaskPriority,
  TaskSortField,
  TaskStatus,
  TaskStatusFilter,
} from '@taskhub/types';

export interface Task {
  id: number;
  userId: number;
  categoryId: number | null;
  title: string;
  description: string | null;
  priority: TaskPriority;
  status: TaskStatus;
  dueDate: Date | null;
  completedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

// Task joined with its category's display fields
export interface TaskDetails extends Task {
  categoryName: string | null;
  categoryDescription: string | null;
}

export interface CreateTaskParams {
  title: string;
  description?: string | null;
  categoryId?: number | null;
  priority?: TaskPriority | null;
  dueDate?: Date | null;
}

// `null` clears description, category or due date
export interface UpdateTaskParams {
  title?: string;
  description?: string | null;
  categoryId?: number | null;
  priority?: TaskPriority;
  dueDate?: Date | null;
}

export interface ListTasksParams {
  status?: TaskStatusFilter;
  priority?: TaskPriority;
  categoryId?: number;
  search?: string;
  sortBy?: TaskSortField;
  order?: SortOrder;
  limit?: number;
  offset?: number;
}

export interface TaskListFilter {
  status: TaskStatusFilter;
  priority?: TaskPriority;
  categoryId?: number;
  search?: string;
  sortBy: TaskSortField;
  order: SortOrder;
  limit: number;
  offset: number;
}

export interface TaskListResult {
  items: TaskDetails[];
  total: number;
  limit: number;
  offset: number;
}

export interface TaskStatusCounts {
  total: number;
  completed: number;
  pending: number;
}

export interface TaskStats extends TaskStatusCounts {
  // Percentage, two decimals
  completionRate: number;
}

export interface CreateTaskData {
  userId: number;
  categoryId: number | null;
  title: string;
  description: string | null;
  priority: TaskPriority;
  status: TaskStatus;
  dueDate: Date | null;
  completedAt: Date | null;
}

export type UpdateTaskData = Partial<
  Pick<Task, 'title' | 'description' | 'categoryId' | 'priority' | 'status' | 'dueDate' | 'completedAt'>
>;
