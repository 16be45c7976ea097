import { z } from 'zod';
import { toIsoDate } from './numbers';

// Column readers shared by the knex-backed services. SQLite hands back the
// ISO strings we wrote; PostgreSQL hands back Date objects.

const utcDateOnly = (date: Date): Date =>
  new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));

/** DATE column as YYYY-MM-DD. */
export const dateOnlyColumn = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const parsed = typeof value === 'string' ? new Date(value.slice(0, 10)) : utcDateOnly(value);
  if (Number.isNaN(parsed.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${String(value)}` });
    return z.NEVER;
  }
  return toIsoDate(parsed);
});

/** DATETIME column as a full ISO-8601 timestamp. */
export const timestampColumn = z.union([z.string(), z.date(), z.number()]).transform((value, ctx) => {
  const parsed = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${String(value)}` });
    return z.NEVER;
  }
  return parsed.toISOString();
});

export const booleanColumn = z.union([z.boolean(), z.number()]).transform(value => Boolean(value));

export const numericColumn = z.union([z.number(), z.string()]).pipe(z.coerce.number().finite());
