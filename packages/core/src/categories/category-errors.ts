import { ConflictError, NotFoundError } from '../errors.js';

export class CategoryNotFoundError extends NotFoundError {
  constructor(categoryId: number) {
    super(`Category not found: ${categoryId}`);
  }
}

export class DuplicateCategoryError extends ConflictError {
  constructor(name: string, options?: ErrorOptions) {
    super(`Category "${name}" already exists`, options);
  }
}
