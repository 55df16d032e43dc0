/**
 * Service Registry
 *
 * Dependency injection setup for domain services
 * Creates service instances with their dependencies
 */

import { type AuthEventSink, authEvents } from '@taskhub/auth';
import {
  type AuthCoreConfig,
  SessionService,
  type TokenRevocationList,
  TokenIssuer,
  TokenVerifier,
} from '@taskhub/auth-core';
import {
  type CategoryRepository,
  CategoryService,
  DrizzleCategoryRepository,
  DrizzleTaskRepository,
  DrizzleUserRepository,
  type TaskRepository,
  TaskService,
  type User,
  type UserRepository,
  UserService,
} from '@taskhub/core';
import { type Database, pingDatabase } from '@taskhub/database';

export type Repositories = {
  users: UserRepository;
  categories: CategoryRepository;
  tasks: TaskRepository;
};

export type AppServices = {
  userService: UserService;
  sessionService: SessionService<User>;
  taskService: TaskService;
  categoryService: CategoryService;
  // Rejects when the database cannot be reached
  checkDatabase: () => Promise<void>;
};

type CreateServicesOptions = {
  repositories: Repositories;
  authConfig: AuthCoreConfig;
  checkDatabase: () => Promise<void>;
  events?: AuthEventSink;
  revocationList?: TokenRevocationList;
  now?: () => Date;
};

export function createServices(options: CreateServicesOptions): AppServices {
  const { repositories, authConfig } = options;
  const events = options.events ?? authEvents;

  const issuer = new TokenIssuer({ config: authConfig, clock: options.now });
  const verifier = new TokenVerifier<User>({
    config: authConfig,
    users: repositories.users,
    revocationList: options.revocationList,
    clock: options.now,
  });

  return {
    userService: new UserService(repositories.users, events),
    sessionService: new SessionService<User>({
      users: repositories.users,
      issuer,
      verifier,
      events,
    }),
    taskService: new TaskService(repositories.tasks, repositories.categories, options.now),
    categoryService: new CategoryService(repositories.categories),
    checkDatabase: options.checkDatabase,
  };
}

/**
 * Services backed by Postgres
 */
export function createDatabaseServices(db: Database, authConfig: AuthCoreConfig): AppServices {
  return createServices({
    repositories: {
      users: new DrizzleUserRepository(db),
      categories: new DrizzleCategoryRepository(db),
      tasks: new DrizzleTaskRepository(db),
    },
    authConfig,
    checkDatabase: () => pingDatabase(db),
  });
}
