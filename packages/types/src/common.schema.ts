import { z } from 'zod';

// Largest value of a Postgres integer column
export const MAX_ID = 2_147_483_647;

/**
 * Positive integer id in the int4 range, for JSON bodies
 */
export function idField(field: string) {
  return z
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be positive`)
    .max(MAX_ID, `${field} is out of range`);
}

/**
 * Id given as a path or query string. Only plain digits are accepted.
 */
export function idString(field: string) {
  return z
    .string()
    .regex(/^\d+$/, `${field} must be a positive integer`)
    .transform(Number)
    .pipe(idField(field));
}

// Path parameter for numeric resource ids (/tasks/:id, /categories/:id)
export const IdParamSchema = z.object({
  id: idString('id'),
});

export type IdParam = z.infer<typeof IdParamSchema>;

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?(Z|[+-]\d{2}:\d{2})?)?$/;

/**
 * Parse an ISO 8601 date or date-time. Date-times without an offset are read as UTC.
 * Returns null for anything else, including numeric timestamps and impossible
 * calendar values such as February 30th or hour 24.
 */
export function parseIsoDateTime(value: string): Date | null {
  const match = ISO_DATE_TIME.exec(value);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = '00', minute = '00', second = '00', offset] = match;
  const fields = [year, month, day, hour, minute, second].map(Number);
  const [y = NaN, mo = NaN, d = NaN, h = NaN, mi = NaN, s = NaN] = fields;

  // Date.UTC rolls overflowing fields forward, so a round trip exposes them
  const wallClock = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  if (
    wallClock.getUTCFullYear() !== y ||
    wallClock.getUTCMonth() !== mo - 1 ||
    wallClock.getUTCDate() !== d ||
    wallClock.getUTCHours() !== h ||
    wallClock.getUTCMinutes() !== mi ||
    wallClock.getUTCSeconds() !== s
  ) {
    return null;
  }

  const normalized = value.includes('T') && !offset ? `${value}Z` : value;
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

const ISO_MESSAGE = "must be in ISO 8601 format (e.g. '2025-12-31T23:59:59'), not a Unix timestamp";

export function isoDateTime(field: string) {
  return z
    .string({ invalid_type_error: `${field} ${ISO_MESSAGE}` })
    .transform((value, ctx) => {
      const date = parseIsoDateTime(value);
      if (!date) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} ${ISO_MESSAGE}` });
        return z.NEVER;
      }
      return date;
    });
}
