/**
 * User Repository
 *
 * Data access layer for user operations.
 * Pure drizzle operations with no business logic.
 */

import { type Database, users, withUniqueConstraint } from '@taskhub/database';
import { eq } from 'drizzle-orm';
import { hasChanges } from '../patch.js';
import type { CreateUserData, UpdateUserData, User } from './user-types.js';

export interface UserRepository {
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  /** @throws {UniqueConstraintError} on duplicate email or username */
  create(data: CreateUserData): Promise<User>;
  /** @throws {UniqueConstraintError} on duplicate email */
  update(id: number, data: UpdateUserData): Promise<User | null>;
  updatePasswordHash(id: number, passwordHash: string): Promise<void>;
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private db: Database) {}

  async findById(id: number): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ?? null;
  }

  /**
   * Find user by email (stored lowercase)
   */
  async findByEmail(email: string): Promise<User | null> {
    const normalizedEmail = email.toLowerCase().trim();
    const [row] = await this.db
      .select()
      .from(users)
      .where(eq(users.email, normalizedEmail))
      .limit(1);
    return row ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.username, username)).limit(1);
    return row ?? null;
  }

  async create(data: CreateUserData): Promise<User> {
    const [row] = await withUniqueConstraint(() => this.db.insert(users).values(data).returning());
    if (!row) {
      throw new Error('User insert returned no row');
    }
    return row;
  }

  async update(id: number, data: UpdateUserData): Promise<User | null> {
    if (!hasChanges(data)) {
      return this.findById(id);
    }
    const [row] = await withUniqueConstraint(() =>
      this.db.update(users).set(data).where(eq(users.id, id)).returning()
    );
    return row ?? null;
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<void> {
    await this.db.update(users).set({ passwordHash }).where(eq(users.id, id));
  }
}
