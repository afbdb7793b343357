/**
 * get_timeline - Structured timeline of a scope.
 */

import { z } from 'zod';

import type { TimelineService } from '../../service/timeline-service.js';
import { scopeSchema } from '../schemas.js';
import { defineTool, type ToolDefinition } from '../types.js';

export function getTimeline(service: TimelineService): ToolDefinition {
  return defineTool({
    name: 'get_timeline',
    description: 'Events, actions and decisions of a scope, each list in chronological order.',
    method: 'GET',
    path: '/timeline/{scope}',
    input: z.object({ scope: scopeSchema }),
    run: async ({ scope }) => service.narrator.buildTimeline(scope),
  });
}
