import type { TokenRevocationList } from './interfaces.js';
import { type Clock, systemClock } from './types.js';

/**
 * Process-local revocation list. Entries are dropped once the token they
 * refer to would have expired anyway.
 */
export class InMemoryTokenRevocationList implements TokenRevocationList {
  private revoked = new Map<string, Date>();

  constructor(private readonly clock: Clock = systemClock) {}

  revoke(jti: string, expiresAt: Date) {
    this.revoked.set(jti, expiresAt);
  }

  async isRevoked(jti: string): Promise<boolean> {
    this.prune();
    return this.revoked.has(jti);
  }

  get size(): number {
    this.prune();
    return this.revoked.size;
  }

  private prune() {
    const now = this.clock().getTime();
    for (const [jti, expiresAt] of this.revoked) {
      if (expiresAt.getTime() <= now) {
        this.revoked.delete(jti);
      }
    }
  }
}
