import { sql } from 'drizzle-orm';
import type { Database } from './client.js';

/**
 * Round-trip a trivial query. Rejects when the database is unreachable.
 */
export async function pingDatabase(db: Database): Promise<void> {
  await db.execute(sql`select 1`);
}
