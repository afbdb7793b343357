/**
 * Shared argument schemas for tools
 */

import { z } from 'zod';

export const scopeSchema = z.string().min(1, 'scope is required');

export const kindSchema = z.enum(['event', 'action', 'decision']);

/** Boolean that also accepts query-string spellings */
export const flagSchema = z.preprocess(value => {
  if (value === 'true' || value === '1' || value === '') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}, z.boolean().optional());

/** Timestamp as an ISO string or epoch milliseconds */
export const timestampSchema = z.union([z.string().min(1), z.number()]).transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});
