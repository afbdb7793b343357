/**
 * get_temporal_relation - Facts holding a relation towards a fact.
 */

import { z } from 'zod';

import type { TimelineService } from '../../service/timeline-service.js';
import { defineTool, type ToolDefinition } from '../types.js';

export function getTemporalRelation(service: TimelineService): ToolDefinition {
  return defineTool({
    name: 'get_temporal_relation',
    description:
      'Facts that fact_id holds relation_type towards. ' +
      'Use follows to find what came before, precedes for what came after.',
    method: 'GET',
    path: '/temporal_relation/{fact_id}',
    input: z.object({
      fact_id: z.string().min(1),
      relation_type: z.string().min(1),
    }),
    run: async ({ fact_id, relation_type }) => ({
      fact_id,
      relation_type,
      related: service.graph.findRelated(fact_id, relation_type),
    }),
  });
}
