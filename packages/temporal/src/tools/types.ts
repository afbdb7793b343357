/**
 * Tool Types
 *
 * Each exposed operation is a tool: a name, the route it answers on
 * and a handler over already validated arguments.
 */

import type { z } from 'zod';

export type HttpMethod = 'GET' | 'POST';

export interface ToolDefinition {
  name: string;
  description: string;
  method: HttpMethod;
  /** Route template, e.g. /timeline/{scope} */
  path: string;
  handler: (args: unknown) => Promise<unknown>;
}

export interface ErrorBody {
  error: string;
}

export interface ToolResponse {
  status: number;
  body: unknown;
}

interface ToolConfig<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  method: HttpMethod;
  path: string;
  input: S;
  run: (input: z.output<S>) => Promise<unknown>;
}

/**
 * Build a tool whose handler parses its arguments before running
 */
export function defineTool<S extends z.ZodTypeAny>(config: ToolConfig<S>): ToolDefinition {
  return {
    name: config.name,
    description: config.description,
    method: config.method,
    path: config.path,
    handler: async (args: unknown) => config.run(config.input.parse(args)),
  };
}
