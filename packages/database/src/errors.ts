/**
 * Postgres error translation at the repository boundary
 */

export const PG_UNIQUE_VIOLATION = '23505';

export class UniqueConstraintError extends Error {
  constructor(
    public readonly constraint: string | null,
    options?: { cause?: unknown }
  ) {
    super(`Unique constraint violated: ${constraint ?? 'unknown'}`, options);
    this.name = 'UniqueConstraintError';
  }
}

/**
 * Recognise a pg unique violation (SQLSTATE 23505), also when wrapped in `cause`.
 * Returns null for any other error.
 */
export function toUniqueConstraintError(error: unknown): UniqueConstraintError | null {
  let current: unknown = error;
  for (let depth = 0; depth < 3; depth++) {
    if (typeof current !== 'object' || current === null) {
      return null;
    }
    if ('code' in current && current.code === PG_UNIQUE_VIOLATION) {
      const constraint =
        'constraint' in current && typeof current.constraint === 'string'
          ? current.constraint
          : null;
      return new UniqueConstraintError(constraint, { cause: error });
    }
    current = 'cause' in current ? current.cause : null;
  }
  return null;
}

/**
 * Run a write and rethrow unique violations as UniqueConstraintError
 */
export async function withUniqueConstraint<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toUniqueConstraintError(error) ?? error;
  }
}
