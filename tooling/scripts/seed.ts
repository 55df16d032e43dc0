#!/usr/bin/env tsx
/**
 * Replace the demo accounts (testuser1..testuser8) with fresh data.
 *
 * Usage:
 *   DATABASE_URL="..." npm run db:seed
 *
 * Every demo user logs in with SEED_PASSWORD (default "password123").
 */

import 'dotenv/config';
import process from 'node:process';
import { authEvents } from '@taskhub/auth';
import {
  type Category,
  CategoryService,
  DrizzleCategoryRepository,
  DrizzleTaskRepository,
  DrizzleUserRepository,
  TaskService,
  UserService,
} from '@taskhub/core';
import { createDatabase, users } from '@taskhub/database';
import { TASK_PRIORITIES } from '@taskhub/types';
import { like } from 'drizzle-orm';

const USER_COUNT = 8;
const TASKS_PER_USER = 30;
const CATEGORY_NAMES = ['Work', 'Personal', 'Home'];
const DAY_MS = 24 * 60 * 60 * 1000;

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL must be set.');
  }
  const password = process.env.SEED_PASSWORD?.trim() || 'password123';

  const database = createDatabase({ connectionString: databaseUrl });
  const { db } = database;

  try {
    // Categories and tasks go with their owner (ON DELETE CASCADE)
    const removed = await db
      .delete(users)
      .where(like(users.username, 'testuser%'))
      .returning({ id: users.id });
    console.log(`Removed ${removed.length} existing demo users`);

    const userService = new UserService(new DrizzleUserRepository(db), authEvents);
    const categoryRepo = new DrizzleCategoryRepository(db);
    const categoryService = new CategoryService(categoryRepo);
    const taskService = new TaskService(new DrizzleTaskRepository(db), categoryRepo);

    for (let u = 1; u <= USER_COUNT; u += 1) {
      const user = await userService.registerUser({
        username: `testuser${u}`,
        email: `testuser${u}@example.com`,
        password,
        firstName: 'Test',
        lastName: `User ${u}`,
      });

      const categories: Category[] = [];
      for (const name of CATEGORY_NAMES) {
        categories.push(await categoryService.createCategory(user, { name }));
      }

      for (let i = 0; i < TASKS_PER_USER; i += 1) {
        const category = i % 2 === 0 ? categories[i % categories.length] : undefined;
        const task = await taskService.createTask(user, {
          title: `Task ${i + 1}`,
          description: 'Some description',
          priority: TASK_PRIORITIES[i % TASK_PRIORITIES.length],
          categoryId: category?.id ?? null,
          dueDate: i % 3 === 0 ? null : new Date(Date.now() + (i - 10) * DAY_MS),
        });

        if (i % 2 === 1) {
          await taskService.setTaskStatus(user, task.id, 'completed');
        }
      }

      console.log(`Seeded ${user.username}`);
    }

    console.log('All demo data has been generated');
  } finally {
    await database.close();
  }
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
