/**
 * get_events_in_timeframe - Facts touching a time window.
 */

import { z } from 'zod';

import type { TimelineService } from '../../service/timeline-service.js';
import { kindSchema, scopeSchema, timestampSchema } from '../schemas.js';
import { defineTool, type ToolDefinition } from '../types.js';

export function getEventsInTimeframe(service: TimelineService): ToolDefinition {
  return defineTool({
    name: 'get_events_in_timeframe',
    description:
      'Facts of a scope whose extent touches [start, end]. ' +
      'Open intervals match every frame after their start.',
    method: 'POST',
    path: '/events_in_timeframe',
    input: z.object({
      scope: scopeSchema,
      start: timestampSchema,
      end: timestampSchema,
      kind: kindSchema.optional(),
    }),
    run: async ({ scope, start, end, kind }) => ({
      scope,
      facts: service.store.findInTimeframe(scope, start, end, kind),
    }),
  });
}
