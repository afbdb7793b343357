/**
 * casetime - Temporal reasoning for case timelines
 *
 * Records when the events, actions and decisions of a case happened,
 * relates them in time, infers missing relations and renders the
 * result as a structured timeline or a text context.
 */

// Types
export * from './types/index.js';
export * from './errors.js';

// Infrastructure
export * from './logging/logger.js';
export * from './config/index.js';
export * from './storage/index.js';

// Components
export { TemporalStore, type EnhanceOptions, type EnhanceActionOptions } from './store/temporal-store.js';
export { RelationGraph } from './relations/graph.js';
export {
  RELATION_TYPES,
  INVERSE_RELATIONS,
  CAUSAL_RELATION_TYPES,
  isRelationType,
  inverseOf,
  isCausalRelation,
} from './relations/relation-types.js';
export {
  InferenceEngine,
  classifyPair,
  type InferableRelation,
  type InferredRelation,
  type InferenceEngineConfig,
} from './inference/engine.js';
export {
  Segmenter,
  SEGMENT_STRATEGIES,
  UNASSIGNED_ACTOR,
  isSegmentStrategy,
  type SegmentStrategy,
  type SegmentParams,
  type SegmenterConfig,
} from './segmentation/segmenter.js';
export {
  Narrator,
  type Timeline,
  type TimelineEntry,
  type DecisionEntry,
  type RelationSummary,
  type ContextOptions,
} from './narrative/narrator.js';
export { RELATION_TEMPLATES, SECTION_TEMPLATES } from './narrative/templates.js';
export { StaticEntityResolver } from './resolvers/static.js';

// Service
export { ScopeExecutor } from './service/scope-executor.js';
export { TimelineService, type TimelineServiceOptions, type RefreshResult } from './service/timeline-service.js';

// Tools
export * from './tools/index.js';

// Case files
export { caseFileSchema, readCaseFile, loadCase, type CaseFile, type LoadedCase } from './cli/case-file.js';
