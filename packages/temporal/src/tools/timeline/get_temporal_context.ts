/**
 * get_temporal_context - Plain-text timeline for prompting.
 */

import { z } from 'zod';

import type { TimelineService } from '../../service/timeline-service.js';
import { flagSchema, scopeSchema } from '../schemas.js';
import { defineTool, type ToolDefinition } from '../types.js';

export function getTemporalContext(service: TimelineService): ToolDefinition {
  return defineTool({
    name: 'get_temporal_context',
    description:
      'Render a scope as a TIMELINE and TEMPORAL RELATIONSHIPS text block. ' +
      'Set confidence to annotate inferred relations and causal to repeat causal relations in their own section.',
    method: 'GET',
    path: '/temporal_context/{scope}',
    input: z.object({
      scope: scopeSchema,
      confidence: flagSchema,
      causal: flagSchema,
    }),
    run: async ({ scope, confidence, causal }) => ({
      scope,
      context: await service.narrator.getContext(scope, {
        includeConfidence: confidence,
        includeCausal: causal,
      }),
    }),
  });
}
