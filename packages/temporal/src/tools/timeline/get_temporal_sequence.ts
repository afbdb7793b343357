/**
 * get_temporal_sequence - Facts of a scope in chronological order.
 */

import { z } from 'zod';

import type { TimelineService } from '../../service/timeline-service.js';
import { kindSchema, scopeSchema } from '../schemas.js';
import { defineTool, type ToolDefinition } from '../types.js';

export function getTemporalSequence(service: TimelineService): ToolDefinition {
  return defineTool({
    name: 'get_temporal_sequence',
    description: 'Facts of a scope ordered by start time, optionally of one kind and limited.',
    method: 'GET',
    path: '/temporal_sequence/{scope}',
    input: z.object({
      scope: scopeSchema,
      kind: kindSchema.optional(),
      limit: z.coerce.number().int().positive().optional(),
    }),
    run: async ({ scope, kind, limit }) => ({
      scope,
      facts: service.store.findSequence(scope, kind, limit),
    }),
  });
}
