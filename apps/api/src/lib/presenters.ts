/**
 * Domain objects to snake_case response bodies
 */

import type { Category, CategoryWithCount, TaskDetails, TaskListResult, TaskStats, User } from '@taskhub/core';

const iso = (date: Date | null) => (date ? date.toISOString() : null);

export function toUserResponse(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    first_name: user.firstName,
    last_name: user.lastName,
    is_active: user.isActive,
    is_superuser: user.isSuperuser,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

export function toCategoryResponse(category: Category | CategoryWithCount) {
  return {
    id: category.id,
    user_id: category.userId,
    name: category.name,
    description: category.description,
    created_at: category.createdAt.toISOString(),
    updated_at: category.updatedAt.toISOString(),
    ...('tasksCount' in category ? { tasks_count: category.tasksCount } : {}),
  };
}

export function toTaskResponse(task: TaskDetails) {
  return {
    id: task.id,
    user_id: task.userId,
    title: task.title,
    description: task.description,
    priority: task.priority,
    due_date: iso(task.dueDate),
    category_id: task.categoryId,
    status: task.status,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
    completed_at: iso(task.completedAt),
    category_name: task.categoryName,
    category_description: task.categoryDescription,
  };
}

export function toTaskListResponse(result: TaskListResult) {
  return {
    items: result.items.map(toTaskResponse),
    total: result.total,
    limit: result.limit,
    offset: result.offset,
  };
}

export function toTaskStatsResponse(stats: TaskStats) {
  return {
    total: stats.total,
    completed: stats.completed,
    pending: stats.pending,
    completion_rate: stats.completionRate,
  };
}
