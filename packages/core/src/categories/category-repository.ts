/**
 * Category Repository
 *
 * Data access layer for category operations.
 */

import { type Database, categories, tasks, withUniqueConstraint } from '@taskhub/database';
import { and, asc, count, eq, getTableColumns } from 'drizzle-orm';
import { hasChanges } from '../patch.js';
import type {
  Category,
  CategoryWithCount,
  CreateCategoryData,
  UpdateCategoryData,
} from './category-types.js';

export interface CategoryRepository {
  findById(id: number): Promise<Category | null>;
  findByName(userId: number, name: string): Promise<Category | null>;
  /** Ordered by name */
  listByUser(userId: number): Promise<CategoryWithCount[]>;
  /** @throws {UniqueConstraintError} when the owner already has the name */
  create(data: CreateCategoryData): Promise<Category>;
  /** @throws {UniqueConstraintError} when the owner already has the name */
  update(id: number, data: UpdateCategoryData): Promise<Category | null>;
  /** Unassigns the category's tasks, then removes the category */
  delete(id: number): Promise<void>;
}

export class DrizzleCategoryRepository implements CategoryRepository {
  constructor(private db: Database) {}

  async findById(id: number): Promise<Category | null> {
    const [row] = await this.db.select().from(categories).where(eq(categories.id, id)).limit(1);
    return row ?? null;
  }

  async findByName(userId: number, name: string): Promise<Category | null> {
    const [row] = await this.db
      .select()
      .from(categories)
      .where(and(eq(categories.userId, userId), eq(categories.name, name)))
      .limit(1);
    return row ?? null;
  }

  async listByUser(userId: number): Promise<CategoryWithCount[]> {
    return this.db
      .select({ ...getTableColumns(categories), tasksCount: count(tasks.id) })
      .from(categories)
      .leftJoin(tasks, eq(tasks.categoryId, categories.id))
      .where(eq(categories.userId, userId))
      .groupBy(categories.id)
      .orderBy(asc(categories.name), asc(categories.id));
  }

  async create(data: CreateCategoryData): Promise<Category> {
    const [row] = await withUniqueConstraint(() =>
      this.db.insert(categories).values(data).returning()
    );
    if (!row) {
      throw new Error('Category insert returned no row');
    }
    return row;
  }

  async update(id: number, data: UpdateCategoryData): Promise<Category | null> {
    if (!hasChanges(data)) {
      return this.findById(id);
    }
    const [row] = await withUniqueConstraint(() =>
      this.db.update(categories).set(data).where(eq(categories.id, id)).returning()
    );
    return row ?? null;
  }

  async delete(id: number): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.update(tasks).set({ categoryId: null }).where(eq(tasks.categoryId, id));
      await tx.delete(categories).where(eq(categories.id, id));
    });
  }
}
