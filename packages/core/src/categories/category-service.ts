/**
 * Category Service
 *
 * Owner-scoped category management. Names are unique per owner.
 */

import { UniqueConstraintError } from '@taskhub/database';
import { type Owner, requireOwned } from '../ownership.js';
import { definedOnly, hasChanges } from '../patch.js';
import type { CategoryRepository } from './category-repository.js';
import { CategoryNotFoundError, DuplicateCategoryError } from './category-errors.js';
import type {
  Category,
  CategoryWithCount,
  CreateCategoryParams,
  UpdateCategoryData,
  UpdateCategoryParams,
} from './category-types.js';

export class CategoryService {
  constructor(private categoryRepo: CategoryRepository) {}

  /**
   * @throws {DuplicateCategoryError} If the owner already has a category with this name
   */
  async createCategory(owner: Owner, params: CreateCategoryParams): Promise<Category> {
    const name = params.name.trim();

    if (await this.categoryRepo.findByName(owner.id, name)) {
      throw new DuplicateCategoryError(name);
    }

    return this.translateConflict(name, () =>
      this.categoryRepo.create({
        userId: owner.id,
        name,
        description: params.description ?? null,
      })
    );
  }

  listCategories(owner: Owner): Promise<CategoryWithCount[]> {
    return this.categoryRepo.listByUser(owner.id);
  }

  async getCategory(owner: Owner, categoryId: number): Promise<Category> {
    const category = await this.categoryRepo.findById(categoryId);
    return requireOwned(category, owner, () => new CategoryNotFoundError(categoryId));
  }

  /**
   * Renaming to the category's own name is not a conflict
   */
  async updateCategory(
    owner: Owner,
    categoryId: number,
    params: UpdateCategoryParams
  ): Promise<Category> {
    const category = await this.getCategory(owner, categoryId);
    const patch: UpdateCategoryData = definedOnly({
      name: params.name?.trim(),
      description: params.description,
    });

    if (!hasChanges(patch)) {
      return category;
    }

    const name = patch.name;
    if (name !== undefined && name !== category.name) {
      const clash = await this.categoryRepo.findByName(owner.id, name);
      if (clash && clash.id !== category.id) {
        throw new DuplicateCategoryError(name);
      }
    }

    const updated = await this.translateConflict(name ?? category.name, () =>
      this.categoryRepo.update(category.id, patch)
    );
    if (!updated) {
      throw new CategoryNotFoundError(categoryId);
    }
    return updated;
  }

  /**
   * Delete a category. Its tasks are kept and become uncategorised.
   */
  async deleteCategory(owner: Owner, categoryId: number): Promise<void> {
    const category = await this.getCategory(owner, categoryId);
    await this.categoryRepo.delete(category.id);
  }

  private async translateConflict<T>(name: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new DuplicateCategoryError(name, { cause: error });
      }
      throw error;
    }
  }
}
