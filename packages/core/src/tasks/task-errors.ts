import { InvalidReferenceError, NotFoundError } from '../errors.js';

export class TaskNotFoundError extends NotFoundError {
  constructor(taskId: number) {
    super(`Task not found: ${taskId}`);
  }
}

// Category missing or owned by another user
export class InvalidCategoryError extends InvalidReferenceError {
  constructor(categoryId: number) {
    super('invalid_category', `Invalid category: ${categoryId}`);
  }
}
