/**
 * Tool registry - registers the six timeline tools.
 *
 * Tools are thin wrappers over TimelineService. They are registered in
 * a flat map for dispatch by name, or matched by method and route.
 */

import type { TimelineService } from '../service/timeline-service.js';
import type { Logger } from '../logging/logger.js';
import type { ToolDefinition, ToolResponse } from './types.js';
import { statusFor, toErrorResponse } from './error-mapping.js';

// Timeline (4)
import { getTimeline } from './timeline/get_timeline.js';
import { getTemporalContext } from './timeline/get_temporal_context.js';
import { getEventsInTimeframe } from './timeline/get_events_in_timeframe.js';
import { getTemporalSequence } from './timeline/get_temporal_sequence.js';

// Relations (2)
import { getTemporalRelation } from './relations/get_temporal_relation.js';
import { createTemporalRelation } from './relations/create_temporal_relation.js';

const TOOL_FACTORIES: ((service: TimelineService) => ToolDefinition)[] = [
  getTimeline,
  getTemporalContext,
  getEventsInTimeframe,
  getTemporalSequence,
  getTemporalRelation,
  createTemporalRelation,
];

/**
 * Create all tools, keyed by name
 */
export function registerTools(service: TimelineService): Map<string, ToolDefinition> {
  const tools = new Map<string, ToolDefinition>();
  for (const factory of TOOL_FACTORIES) {
    const tool = factory(service);
    tools.set(tool.name, tool);
  }
  return tools;
}

/**
 * Run a tool by name and wrap the outcome as a response
 */
export async function callTool(
  tools: Map<string, ToolDefinition>,
  name: string,
  args: unknown,
  logger?: Logger | undefined,
): Promise<ToolResponse> {
  const tool = tools.get(name);
  if (!tool) {
    return { status: 404, body: { error: `Unknown tool: ${name}` } };
  }

  try {
    return { status: 200, body: await tool.handler(args) };
  } catch (error) {
    if (statusFor(error) >= 500) {
      logger?.error(`Tool ${name} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return toErrorResponse(error);
  }
}

export interface RouteMatch {
  tool: ToolDefinition;
  params: Record<string, string>;
}

/**
 * Find the tool answering a method and pathname, with its path parameters
 */
export function matchRoute(
  tools: Map<string, ToolDefinition>,
  method: string,
  pathname: string,
): RouteMatch | null {
  const segments = pathname.split('/').filter(Boolean);

  for (const tool of tools.values()) {
    if (tool.method !== method.toUpperCase()) continue;

    const pattern = tool.path.split('/').filter(Boolean);
    if (pattern.length !== segments.length) continue;

    const params: Record<string, string> = {};
    const matched = pattern.every((part, i) => {
      const segment = segments[i];
      if (segment === undefined) return false;
      const name = /^\{(\w+)\}$/.exec(part)?.[1];
      if (name) {
        params[name] = decodeURIComponent(segment);
        return true;
      }
      return part === segment;
    });

    if (matched) return { tool, params };
  }
  return null;
}

export * from './types.js';
export * from './error-mapping.js';
