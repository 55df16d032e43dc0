export { DrizzleCategoryRepository } from './category-repository.js';
export type { CategoryRepository } from './category-repository.js';
export { CategoryService } from './category-service.js';
export { CategoryNotFoundError, DuplicateCategoryError } from './category-errors.js';
export type {
  Category,
  CategoryWithCount,
  CreateCategoryData,
  CreateCategoryParams,
  UpdateCategoryData,
  UpdateCategoryParams,
} from './category-types.js';
