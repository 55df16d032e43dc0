/**
 * Task Repository
 *
 * Data access layer for task operations. Reads join the category's
 * name and description.
 */

import { type Database, categories, tasks } from '@taskhub/database';
import {
  type SQL,
  and,
  asc,
  count,
  desc,
  eq,
  getTableColumns,
  ilike,
  or,
  sql,
} from 'drizzle-orm';
import { hasChanges } from '../patch.js';
import type {
  CreateTaskData,
  TaskDetails,
  TaskListFilter,
  TaskStatusCounts,
  UpdateTaskData,
} from './task-types.js';

export interface TaskRepository {
  findById(id: number): Promise<TaskDetails | null>;
  list(userId: number, filter: TaskListFilter): Promise<{ items: TaskDetails[]; total: number }>;
  create(data: CreateTaskData): Promise<TaskDetails>;
  update(id: number, data: UpdateTaskData): Promise<TaskDetails | null>;
  delete(id: number): Promise<void>;
  countByStatus(userId: number): Promise<TaskStatusCounts>;
}

/**
 * Escape LIKE wildcards so search terms match literally
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class DrizzleTaskRepository implements TaskRepository {
  constructor(private db: Database) {}

  async findById(id: number): Promise<TaskDetails | null> {
    const [row] = await this.selectDetails().where(eq(tasks.id, id)).limit(1);
    return row ?? null;
  }

  async list(
    userId: number,
    filter: TaskListFilter
  ): Promise<{ items: TaskDetails[]; total: number }> {
    const where = and(...this.conditions(userId, filter));

    const [totals] = await this.db.select({ total: count() }).from(tasks).where(where);
    const items = await this.selectDetails()
      .where(where)
      .orderBy(...this.ordering(filter))
      .limit(filter.limit)
      .offset(filter.offset);

    return { items, total: totals?.total ?? 0 };
  }

  async create(data: CreateTaskData): Promise<TaskDetails> {
    const [row] = await this.db.insert(tasks).values(data).returning({ id: tasks.id });
    const created = row ? await this.findById(row.id) : null;
    if (!created) {
      throw new Error('Task insert returned no row');
    }
    return created;
  }

  async update(id: number, data: UpdateTaskData): Promise<TaskDetails | null> {
    if (hasChanges(data)) {
      await this.db.update(tasks).set(data).where(eq(tasks.id, id));
    }
    return this.findById(id);
  }

  async delete(id: number): Promise<void> {
    await this.db.delete(tasks).where(eq(tasks.id, id));
  }

  async countByStatus(userId: number): Promise<TaskStatusCounts> {
    const rows = await this.db
      .select({ status: tasks.status, count: count() })
      .from(tasks)
      .where(eq(tasks.userId, userId))
      .groupBy(tasks.status);

    const completed = rows.find((row) => row.status === 'completed')?.count ?? 0;
    const pending = rows.find((row) => row.status === 'pending')?.count ?? 0;
    return { total: completed + pending, completed, pending };
  }

  private selectDetails() {
    return this.db
      .select({
        ...getTableColumns(tasks),
        categoryName: categories.name,
        categoryDescription: categories.description,
      })
      .from(tasks)
      .leftJoin(categories, eq(tasks.categoryId, categories.id));
  }

  private conditions(userId: number, filter: TaskListFilter): SQL[] {
    const conditions: SQL[] = [eq(tasks.userId, userId)];

    if (filter.status !== 'all') {
      conditions.push(eq(tasks.status, filter.status));
    }
    if (filter.priority) {
      conditions.push(eq(tasks.priority, filter.priority));
    }
    if (filter.categoryId !== undefined) {
      conditions.push(eq(tasks.categoryId, filter.categoryId));
    }
    if (filter.search) {
      const pattern = `%${escapeLikePattern(filter.search)}%`;
      const match = or(ilike(tasks.title, pattern), ilike(tasks.description, pattern));
      if (match) {
        conditions.push(match);
      }
    }

    return conditions;
  }

  // Enum columns sort in declaration order: low < medium < high, pending < completed.
  // Missing due dates sort last in both directions. Ties break on id.
  private ordering(filter: TaskListFilter): SQL[] {
    const direction = filter.order === 'asc' ? asc : desc;
    const primary = (() => {
      switch (filter.sortBy) {
        case 'priority':
          return direction(tasks.priority);
        case 'status':
          return direction(tasks.status);
        case 'due_date':
          return filter.order === 'asc'
            ? sql`${tasks.dueDate} asc nulls last`
            : sql`${tasks.dueDate} desc nulls last`;
        case 'created_at':
          return direction(tasks.createdAt);
      }
    })();
    return [primary, asc(tasks.id)];
  }
}
