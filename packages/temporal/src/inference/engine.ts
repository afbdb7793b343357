/**
 * Temporal Inference Engine
 *
 * Derives relations between chronologically adjacent facts that
 * nobody related explicitly, and maintains the dense timeline order
 * of a scope.
 *
 * @module inference/engine
 */

import type { TemporalFact } from '../types/temporal.js';
import type { IFactStorage } from '../storage/interface.js';
import type { Logger } from '../logging/logger.js';
import type { RelationGraph } from '../relations/graph.js';
import { ValidationError } from '../errors.js';
import { coarserGranularity, sameBucket } from '../utils/time.js';
import { ScopeExecutor } from '../service/scope-executor.js';

/**
 * Relation types the engine can infer
 */
export type InferableRelation = 'precedes' | 'overlaps' | 'coincidesWith';

/**
 * A relation written by the engine
 */
export interface InferredRelation {
  sourceId: string;
  targetId: string;
  type: InferableRelation;
  confidence: number;
}

/**
 * Inference engine configuration
 */
export interface InferenceEngineConfig {
  /** Confidence given to inferred relations */
  confidence: number;
}

const DEFAULT_CONFIG: InferenceEngineConfig = {
  confidence: 0.8,
};

/**
 * Classify the relation of A towards B, where A does not start after B.
 * Instants count as zero-length regions.
 */
export function classifyPair(a: TemporalFact, b: TemporalFact): InferableRelation | null {
  const aStart = a.start.getTime();
  const bStart = b.start.getTime();

  if (a.regionType === 'instant') {
    if (aStart < bStart) return 'precedes';
  } else if (a.end !== null && a.end.getTime() <= bStart) {
    return 'precedes';
  }

  if (a.regionType === 'interval' || b.regionType === 'interval') {
    // a starts no later than b, so they intersect when a is still running at b's start
    const aEnd = a.regionType === 'interval' ? a.end : a.start;
    if (aEnd === null || aEnd.getTime() >= bStart) {
      return 'overlaps';
    }
  }

  if (sameBucket(a.start, b.start, coarserGranularity(a.granularity, b.granularity))) {
    return 'coincidesWith';
  }

  return null;
}

/**
 * Temporal inference engine
 */
export class InferenceEngine {
  private readonly config: InferenceEngineConfig;

  constructor(
    private readonly storage: IFactStorage,
    private readonly graph: RelationGraph,
    private readonly logger: Logger,
    config: Partial<InferenceEngineConfig> = {},
    private readonly executor: ScopeExecutor = new ScopeExecutor(),
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!(this.config.confidence >= 0 && this.config.confidence <= 1)) {
      throw new ValidationError(
        `Inference confidence must be between 0 and 1, got ${this.config.confidence}`,
      );
    }
  }

  /**
   * Relate every adjacent pair of facts in the scope that has no
   * relation in either direction. Returns the relations written.
   */
  async inferRelations(scopeId: string): Promise<InferredRelation[]> {
    return this.executor.run(scopeId, () =>
      this.storage.transaction(() => this.inferInScope(scopeId)),
    );
  }

  /**
   * Assign every fact of the scope its dense zero-based position by
   * (start, id). Running it twice yields the same order.
   */
  async recomputeTimelineOrder(scopeId: string): Promise<Map<string, number>> {
    return this.executor.run(scopeId, () =>
      this.storage.transaction(() => {
        const order = new Map<string, number>();
        this.storage.queryFacts({ scopeId }).forEach((fact, index) => {
          order.set(fact.id, index);
        });
        this.storage.setTimelineOrder(order);

        this.logger.debug('Recomputed timeline order', { scopeId, facts: order.size });
        return order;
      }),
    );
  }

  private inferInScope(scopeId: string): InferredRelation[] {
    const facts = this.storage.queryFacts({ scopeId });
    const related = new Set<string>();
    for (const edge of this.storage.relationsInScope(scopeId)) {
      related.add(pairKey(edge.sourceId, edge.targetId));
    }

    const inferred: InferredRelation[] = [];
    for (let i = 0; i + 1 < facts.length; i++) {
      const a = facts[i];
      const b = facts[i + 1];
      if (!a || !b) continue;
      if (related.has(pairKey(a.id, b.id))) continue;

      const type = classifyPair(a, b);
      if (!type) continue;

      this.graph.createRelation(a.id, b.id, type, {
        confidence: this.config.confidence,
        inferred: true,
      });
      related.add(pairKey(a.id, b.id));
      inferred.push({ sourceId: a.id, targetId: b.id, type, confidence: this.config.confidence });
    }

    this.logger.info('Inferred relations', { scopeId, facts: facts.length, inferred: inferred.length });
    return inferred;
  }
}

/** Unordered key for a pair of facts */
function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}
