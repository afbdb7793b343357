/**
 * Option parsing shared by commands
 */

import type { Command } from 'commander';
import { z } from 'zod';

import { ValidationError } from '../../errors.js';
import type { GlobalOptions } from '../session.js';

const globalSchema = z.object({
  root: z.string().optional(),
  verbose: z.boolean().optional(),
});

/**
 * Parse a command's options (including global ones) against a schema
 */
export function parseOptions<S extends z.ZodTypeAny>(
  command: Command,
  schema: S,
): z.output<S> & GlobalOptions {
  const all = command.optsWithGlobals();
  const globals = globalSchema.safeParse(all);
  const local = schema.safeParse(all);

  if (!globals.success) throw invalidOptions(globals.error);
  if (!local.success) throw invalidOptions(local.error);
  return { ...globals.data, ...local.data };
}

function invalidOptions(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  const where = issue ? `--${issue.path.join('.')}: ${issue.message}` : 'invalid options';
  return new ValidationError(`Invalid options (${where})`);
}

/** Integer option given as a string */
export const intOption = z.coerce.number().int().positive();

/** Number option given as a string */
export const numberOption = z.coerce.number().positive();
