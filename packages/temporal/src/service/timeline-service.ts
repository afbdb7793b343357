/**
 * Timeline Service
 *
 * Main entry point for temporal reasoning over a case. Wires the
 * store, relation graph, inference engine, segmenter and narrator
 * around one fact storage.
 *
 * @module service/timeline-service
 */

import type { EntityResolver } from '../types/entity.js';
import type { CasetimeConfig } from '../config/types.js';
import type { IFactStorage } from '../storage/interface.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { createFactStorage } from '../storage/factory.js';
import { ConsoleLogger, type Logger } from '../logging/logger.js';
import { TemporalStore } from '../store/temporal-store.js';
import { RelationGraph } from '../relations/graph.js';
import { InferenceEngine, type InferredRelation } from '../inference/engine.js';
import { Segmenter } from '../segmentation/segmenter.js';
import { Narrator } from '../narrative/narrator.js';
import { ScopeExecutor } from './scope-executor.js';

export interface TimelineServiceOptions {
  storage: IFactStorage;
  resolver: EntityResolver;
  logger?: Logger | undefined;
  config?: CasetimeConfig | undefined;
}

export interface RefreshResult {
  inferred: InferredRelation[];
  order: Map<string, number>;
}

/**
 * Timeline service instance
 */
export class TimelineService {
  readonly store: TemporalStore;
  readonly graph: RelationGraph;
  readonly inference: InferenceEngine;
  readonly segmenter: Segmenter;
  readonly narrator: Narrator;
  readonly logger: Logger;

  private readonly storage: IFactStorage;

  constructor(options: TimelineServiceOptions) {
    const config = options.config ?? DEFAULT_CONFIG;
    this.storage = options.storage;
    this.logger = options.logger ?? new ConsoleLogger(config.logging.level);

    this.store = new TemporalStore(this.storage, options.resolver, this.logger);
    this.graph = new RelationGraph(this.storage, this.logger);
    this.inference = new InferenceEngine(
      this.storage,
      this.graph,
      this.logger,
      config.inference,
      new ScopeExecutor(),
    );
    this.segmenter = new Segmenter(this.storage, options.resolver, this.logger, config.segmentation);
    this.narrator = new Narrator(this.storage, options.resolver, this.logger);
  }

  /**
   * Create a service over the storage named in the configuration
   */
  static create(
    config: CasetimeConfig,
    resolver: EntityResolver,
    logger?: Logger | undefined,
  ): TimelineService {
    return new TimelineService({
      storage: createFactStorage(config.storage),
      resolver,
      logger,
      config,
    });
  }

  /**
   * Infer missing relations, then recompute the timeline order
   */
  async refresh(scopeId: string): Promise<RefreshResult> {
    this.store.getScope(scopeId);
    const inferred = await this.inference.inferRelations(scopeId);
    const order = await this.inference.recomputeTimelineOrder(scopeId);
    return { inferred, order };
  }

  close(): void {
    this.storage.close();
  }
}
