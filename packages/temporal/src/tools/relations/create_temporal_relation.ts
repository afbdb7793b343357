/**
 * create_temporal_relation - Record a relation and its inverse.
 */

import { z } from 'zod';

import type { TimelineService } from '../../service/timeline-service.js';
import { defineTool, type ToolDefinition } from '../types.js';

export function createTemporalRelation(service: TimelineService): ToolDefinition {
  return defineTool({
    name: 'create_temporal_relation',
    description:
      'Record that fact from holds type towards fact to. ' +
      'The inverse is written as well when the type has one.',
    method: 'POST',
    path: '/create_temporal_relation',
    input: z.object({
      from: z.string().min(1),
      to: z.string().min(1),
      type: z.string().min(1),
      confidence: z.number().min(0).max(1).optional(),
    }),
    run: async ({ from, to, type, confidence }) =>
      service.graph.createRelation(from, to, type, { confidence }),
  });
}
