/**
 * In-memory stand-ins for the drizzle repositories.
 *
 * All three share one store so cross-table behaviour matches Postgres:
 * unique constraints, ON DELETE SET NULL on tasks.category_id and the
 * category join on task reads.
 */

import { UniqueConstraintError } from '@taskhub/database';
import { PRIORITY_RANK, type TaskStatus } from '@taskhub/types';
import type { CategoryRepository } from '../categories/category-repository.js';
import type {
  Category,
  CategoryWithCount,
  CreateCategoryData,
  UpdateCategoryData,
} from '../categories/category-types.js';
import type { TaskRepository } from '../tasks/task-repository.js';
import type {
  CreateTaskData,
  Task,
  TaskDetails,
  TaskListFilter,
  TaskStatusCounts,
  UpdateTaskData,
} from '../tasks/task-types.js';
import type { UserRepository } from '../users/user-repository.js';
import type { CreateUserData, UpdateUserData, User } from '../users/user-types.js';
import { definedOnly } from '../patch.js';

const STATUS_RANK: Record<TaskStatus, number> = { pending: 1, completed: 2 };

export class InMemoryStore {
  readonly users = new Map<number, User>();
  readonly categories = new Map<number, Category>();
  readonly tasks = new Map<number, Task>();
  private sequences = { users: 0, categories: 0, tasks: 0 };

  constructor(readonly now: () => Date = () => new Date()) {}

  nextId(table: 'users' | 'categories' | 'tasks'): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }
}

export class InMemoryUserRepository implements UserRepository {
  constructor(readonly store: InMemoryStore = new InMemoryStore()) {}

  async findById(id: number): Promise<User | null> {
    const user = this.store.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const normalizedEmail = email.toLowerCase().trim();
    return this.find((user) => user.email === normalizedEmail);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.find((user) => user.username === username);
  }

  async create(data: CreateUserData): Promise<User> {
    this.assertUnique(data, null);
    const now = this.store.now();
    const user: User = {
      id: this.store.nextId('users'),
      ...data,
      isActive: true,
      isSuperuser: false,
      createdAt: now,
      updatedAt: now,
    };
    this.store.users.set(user.id, user);
    return { ...user };
  }

  async update(id: number, data: UpdateUserData): Promise<User | null> {
    const existing = this.store.users.get(id);
    if (!existing) {
      return null;
    }
    this.assertUnique({ email: data.email }, id);
    const updated: User = { ...existing, ...definedOnly(data), updatedAt: this.store.now() };
    this.store.users.set(id, updated);
    return { ...updated };
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<void> {
    const existing = this.store.users.get(id);
    if (existing) {
      this.store.users.set(id, { ...existing, passwordHash, updatedAt: this.store.now() });
    }
  }

  /**
   * Flip the active flag (not exposed by the service layer)
   */
  setActive(id: number, isActive: boolean) {
    const existing = this.store.users.get(id);
    if (existing) {
      this.store.users.set(id, { ...existing, isActive });
    }
  }

  private find(predicate: (user: User) => boolean): User | null {
    for (const user of this.store.users.values()) {
      if (predicate(user)) {
        return { ...user };
      }
    }
    return null;
  }

  private assertUnique(data: { email?: string; username?: string }, selfId: number | null) {
    for (const user of this.store.users.values()) {
      if (user.id === selfId) {
        continue;
      }
      if (data.email !== undefined && user.email === data.email) {
        throw new UniqueConstraintError('users_email_unique');
      }
      if (data.username !== undefined && user.username === data.username) {
        throw new UniqueConstraintError('users_username_unique');
      }
    }
  }
}

export class InMemoryCategoryRepository implements CategoryRepository {
  constructor(readonly store: InMemoryStore = new InMemoryStore()) {}

  async findById(id: number): Promise<Category | null> {
    const category = this.store.categories.get(id);
    return category ? { ...category } : null;
  }

  async findByName(userId: number, name: string): Promise<Category | null> {
    for (const category of this.store.categories.values()) {
      if (category.userId === userId && category.name === name) {
        return { ...category };
      }
    }
    return null;
  }

  async listByUser(userId: number): Promise<CategoryWithCount[]> {
    const tasks = [...this.store.tasks.values()];
    return [...this.store.categories.values()]
      .filter((category) => category.userId === userId)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : a.id - b.id))
      .map((category) => ({
        ...category,
        tasksCount: tasks.filter((task) => task.categoryId === category.id).length,
      }));
  }

  async create(data: CreateCategoryData): Promise<Category> {
    this.assertUnique(data.userId, data.name, null);
    const now = this.store.now();
    const category: Category = {
      id: this.store.nextId('categories'),
      ...data,
      createdAt: now,
      updatedAt: now,
    };
    this.store.categories.set(category.id, category);
    return { ...category };
  }

  async update(id: number, data: UpdateCategoryData): Promise<Category | null> {
    const existing = this.store.categories.get(id);
    if (!existing) {
      return null;
    }
    if (data.name !== undefined) {
      this.assertUnique(existing.userId, data.name, id);
    }
    const updated: Category = { ...existing, ...definedOnly(data), updatedAt: this.store.now() };
    this.store.categories.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    for (const task of this.store.tasks.values()) {
      if (task.categoryId === id) {
        this.store.tasks.set(task.id, { ...task, categoryId: null, updatedAt: this.store.now() });
      }
    }
    this.store.categories.delete(id);
  }

  private assertUnique(userId: number, name: string, selfId: number | null) {
    for (const category of this.store.categories.values()) {
      if (category.id !== selfId && category.userId === userId && category.name === name) {
        throw new UniqueConstraintError('categories_user_id_name_unique');
      }
    }
  }
}

export class InMemoryTaskRepository implements TaskRepository {
  constructor(readonly store: InMemoryStore = new InMemoryStore()) {}

  async findById(id: number): Promise<TaskDetails | null> {
    const task = this.store.tasks.get(id);
    return task ? this.withCategory(task) : null;
  }

  async list(
    userId: number,
    filter: TaskListFilter
  ): Promise<{ items: TaskDetails[]; total: number }> {
    const search = filter.search?.toLowerCase();
    const matches = [...this.store.tasks.values()].filter(
      (task) =>
        task.userId === userId &&
        (filter.status === 'all' || task.status === filter.status) &&
        (filter.priority === undefined || task.priority === filter.priority) &&
        (filter.categoryId === undefined || task.categoryId === filter.categoryId) &&
        (search === undefined ||
          task.title.toLowerCase().includes(search) ||
          (task.description ?? '').toLowerCase().includes(search))
    );

    const sorted = matches.sort((a, b) => compareTasks(a, b, filter));
    const page = sorted.slice(filter.offset, filter.offset + filter.limit);

    return { items: page.map((task) => this.withCategory(task)), total: matches.length };
  }

  async create(data: CreateTaskData): Promise<TaskDetails> {
    const now = this.store.now();
    const task: Task = {
      id: this.store.nextId('tasks'),
      ...data,
      createdAt: now,
      updatedAt: now,
    };
    this.store.tasks.set(task.id, task);
    return this.withCategory(task);
  }

  async update(id: number, data: UpdateTaskData): Promise<TaskDetails | null> {
    const existing = this.store.tasks.get(id);
    if (!existing) {
      return null;
    }
    const updated: Task = { ...existing, ...definedOnly(data), updatedAt: this.store.now() };
    this.store.tasks.set(id, updated);
    return this.withCategory(updated);
  }

  async delete(id: number): Promise<void> {
    this.store.tasks.delete(id);
  }

  async countByStatus(userId: number): Promise<TaskStatusCounts> {
    const owned = [...this.store.tasks.values()].filter((task) => task.userId === userId);
    const completed = owned.filter((task) => task.status === 'completed').length;
    return { total: owned.length, completed, pending: owned.length - completed };
  }

  private withCategory(task: Task): TaskDetails {
    const category = task.categoryId === null ? undefined : this.store.categories.get(task.categoryId);
    return {
      ...task,
      categoryName: category?.name ?? null,
      categoryDescription: category?.description ?? null,
    };
  }
}

function compareTasks(a: Task, b: Task, filter: TaskListFilter): number {
  const sign = filter.order === 'asc' ? 1 : -1;
  let primary = 0;

  switch (filter.sortBy) {
    case 'priority':
      primary = sign * (PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
      break;
    case 'status':
      primary = sign * (STATUS_RANK[a.status] - STATUS_RANK[b.status]);
      break;
    case 'created_at':
      primary = sign * (a.createdAt.getTime() - b.createdAt.getTime());
      break;
    case 'due_date':
      // Missing due dates last in both directions
      if (a.dueDate === null || b.dueDate === null) {
        primary = a.dueDate === b.dueDate ? 0 : a.dueDate === null ? 1 : -1;
      } else {
        primary = sign * (a.dueDate.getTime() - b.dueDate.getTime());
      }
      break;
  }

  return primary !== 0 ? primary : a.id - b.id;
}

/**
 * Repositories wired to one shared store
 */
export function createInMemoryRepositories(now?: () => Date) {
  const store = new InMemoryStore(now);
  return {
    store,
    users: new InMemoryUserRepository(store),
    categories: new InMemoryCategoryRepository(store),
    tasks: new InMemoryTaskRepository(store),
  };
}
