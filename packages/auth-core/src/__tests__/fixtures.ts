import type { AuthCoreConfig } from '../config.js';
import type { AuthUserRepository } from '../interfaces.js';
import type { AuthUserRecord } from '../types.js';

export type TestUser = AuthUserRecord & { username: string };

export const testConfig: AuthCoreConfig = Object.freeze({
  secret: 'test-secret-test-secret-test-secret',
  algorithm: 'HS256',
  issuer: 'taskhub-test',
  accessTokenTtlSeconds: 30 * 60,
  refreshTokenTtlSeconds: 7 * 24 * 60 * 60,
});

export class FakeUserRepository implements AuthUserRepository<TestUser> {
  readonly users = new Map<number, TestUser>();

  add(user: TestUser): TestUser {
    this.users.set(user.id, user);
    return user;
  }

  async findById(id: number): Promise<TestUser | null> {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<TestUser | null> {
    return [...this.users.values()].find((user) => user.email === email) ?? null;
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, passwordHash });
    }
  }
}

/**
 * Mutable clock for expiry tests
 */
export function createTestClock(start = new Date('2025-01-01T00:00:00.000Z')) {
  let current = start;
  return {
    now: () => current,
    advanceSeconds(seconds: number) {
      current = new Date(current.getTime() + seconds * 1000);
    },
  };
}
