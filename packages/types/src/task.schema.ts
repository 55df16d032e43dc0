/**
 * Task request schemas (wire format is snake_case)
 */

import { z } from 'zod';
import { idField, idString, isoDateTime } from './common.schema.js';
import {
  SORT_ORDERS,
  TASK_PRIORITIES,
  TASK_SORT_FIELDS,
  TASK_STATUSES,
  TASK_STATUS_FILTERS,
} from './enums.js';

const titleField = z
  .string()
  .trim()
  .min(1, 'Title is required')
  .max(200, 'Title must be 200 characters or less');

const categoryIdField = idField('category_id');

export const CreateTaskSchema = z.object({
  title: titleField,
  description: z.string().nullish(),
  category_id: categoryIdField.nullish(),
  priority: z.enum(TASK_PRIORITIES).nullish(),
  due_date: isoDateTime('due_date').nullish(),
});

export type CreateTaskInput = z.infer<typeof CreateTaskSchema>;

// Partial update; explicit null clears description, category or due date
export const UpdateTaskSchema = z.object({
  title: titleField.optional(),
  description: z.string().nullable().optional(),
  category_id: categoryIdField.nullable().optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  due_date: isoDateTime('due_date').nullable().optional(),
});

export type UpdateTaskInput = z.infer<typeof UpdateTaskSchema>;

export const UpdateTaskStatusSchema = z.object({
  status: z.enum(TASK_STATUSES),
});

export type UpdateTaskStatusInput = z.infer<typeof UpdateTaskStatusSchema>;

export const ListTasksQuerySchema = z.object({
  status: z.enum(TASK_STATUS_FILTERS).default('all'),
  priority: z.enum(TASK_PRIORITIES).optional(),
  category_id: idString('category_id').optional(),
  search: z.string().trim().min(1).max(200).optional(),
  sort_by: z.enum(TASK_SORT_FIELDS).default('created_at'),
  order: z.enum(SORT_ORDERS).default('desc'),
  limit: z.coerce
    .number()
    .int()
    .min(1, 'limit must be at least 1')
    .max(100, 'limit cannot exceed 100')
    .default(20),
  offset: z.coerce.number().int().min(0, 'offset cannot be negative').default(0),
});

export type ListTasksQuery = z.infer<typeof ListTasksQuerySchema>;
