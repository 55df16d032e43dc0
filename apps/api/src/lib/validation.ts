import { zValidator } from '@hono/zod-validator';
import type { ValidationTargets } from 'hono';
import type { ZodError, ZodSchema } from 'zod';

export type ValidationIssue = {
  path: string;
  message: string;
};

export function formatIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * zValidator with the API's 422 error body
 */
export const validate = <T extends ZodSchema, Target extends keyof ValidationTargets>(
  target: Target,
  schema: T
) =>
  zValidator(target, schema, (result, c) => {
    if (!result.success) {
      return c.json(
        {
          error: 'validation_error',
          message: 'Request validation failed',
          issues: formatIssues(result.error),
        },
        422
      );
    }
  });
