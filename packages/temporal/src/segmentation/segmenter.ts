/**
 * Segmenter
 *
 * Partitions the chronological facts of a scope into named groups.
 * Every group keeps its facts in timeline order and groups appear in
 * the order they were first opened.
 *
 * @module segmentation/segmenter
 */

import type { EntityResolver } from '../types/entity.js';
import type { TemporalFact } from '../types/temporal.js';
import type { IFactStorage } from '../storage/interface.js';
import type { Logger } from '../logging/logger.js';
import { ValidationError } from '../errors.js';
import { secondsBetween } from '../utils/time.js';

export type SegmentStrategy = 'by_actor' | 'by_gap' | 'by_kind' | 'by_decision' | 'auto';

export const SEGMENT_STRATEGIES: readonly SegmentStrategy[] = [
  'by_actor',
  'by_gap',
  'by_kind',
  'by_decision',
  'auto',
];

export interface SegmentParams {
  /** by_gap: largest delta in seconds that stays within a segment */
  thresholdSeconds?: number | undefined;
  /** auto: facts per batch */
  batchSize?: number | undefined;
}

export interface SegmenterConfig {
  gapThresholdSeconds: number;
  batchSize: number;
}

const DEFAULT_CONFIG: SegmenterConfig = {
  gapThresholdSeconds: 3600,
  batchSize: 5,
};

export const UNASSIGNED_ACTOR = 'unassigned';

export function isSegmentStrategy(value: string): value is SegmentStrategy {
  return SEGMENT_STRATEGIES.some(item => item === value);
}

/**
 * Timeline segmenter
 */
export class Segmenter {
  private readonly config: SegmenterConfig;

  constructor(
    private readonly storage: IFactStorage,
    private readonly resolver: EntityResolver,
    private readonly logger: Logger,
    config: Partial<SegmenterConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async group(
    scopeId: string,
    strategy: string,
    params: SegmentParams = {},
  ): Promise<Map<string, TemporalFact[]>> {
    if (!isSegmentStrategy(strategy)) {
      throw new ValidationError(
        `Unknown segment strategy '${strategy}', expected one of ${SEGMENT_STRATEGIES.join(', ')}`,
        { scopeId },
      );
    }

    const facts = this.storage.queryFacts({ scopeId });
    const segments = await this.partition(facts, strategy, params, scopeId);

    this.logger.debug('Segmented timeline', { scopeId, strategy, segments: segments.size });
    return segments;
  }

  private async partition(
    facts: TemporalFact[],
    strategy: SegmentStrategy,
    params: SegmentParams,
    scopeId: string,
  ): Promise<Map<string, TemporalFact[]>> {
    switch (strategy) {
      case 'by_actor':
        return this.byActor(facts);
      case 'by_gap':
        return this.byGap(
          facts,
          this.positive(params.thresholdSeconds, this.config.gapThresholdSeconds, 'thresholdSeconds', scopeId),
        );
      case 'by_kind':
        return this.byKind(facts);
      case 'by_decision':
        return this.byDecision(facts);
      case 'auto':
        return this.inBatches(
          facts,
          this.positive(params.batchSize, this.config.batchSize, 'batchSize', scopeId, true),
        );
    }
  }

  private async byActor(facts: TemporalFact[]): Promise<Map<string, TemporalFact[]>> {
    const segments = new Map<string, TemporalFact[]>();
    for (const fact of facts) {
      append(segments, (await this.actorOf(fact)) ?? UNASSIGNED_ACTOR, fact);
    }
    return segments;
  }

  private async actorOf(fact: TemporalFact): Promise<string | undefined> {
    try {
      return (await this.resolver.resolve(fact.ownerRef))?.actorId;
    } catch (error) {
      this.logger.warn('Entity resolution failed', {
        factId: fact.id,
        owner: `${fact.ownerRef.kind}:${fact.ownerRef.id}`,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private byGap(facts: TemporalFact[], thresholdSeconds: number): Map<string, TemporalFact[]> {
    const segments = new Map<string, TemporalFact[]>();
    let index = 0;
    let previous: TemporalFact | undefined;

    for (const fact of facts) {
      if (!previous || secondsBetween(previous.start, fact.start) > thresholdSeconds) {
        index++;
      }
      append(segments, `segment-${index}`, fact);
      previous = fact;
    }
    return segments;
  }

  private byKind(facts: TemporalFact[]): Map<string, TemporalFact[]> {
    const segments = new Map<string, TemporalFact[]>([
      ['events', []],
      ['actions', []],
      ['decisions', []],
    ]);
    for (const fact of facts) {
      append(segments, `${fact.ownerRef.kind}s`, fact);
    }
    return segments;
  }

  /**
   * A decision closes the phase it falls in, unless the phase holds
   * nothing but decisions so far
   */
  private byDecision(facts: TemporalFact[]): Map<string, TemporalFact[]> {
    const segments = new Map<string, TemporalFact[]>();
    let index = 1;
    let hasNonDecision = false;

    for (const fact of facts) {
      append(segments, `phase-${index}`, fact);
      if (fact.ownerRef.kind !== 'decision') {
        hasNonDecision = true;
      } else if (hasNonDecision) {
        index++;
        hasNonDecision = false;
      }
    }
    return segments;
  }

  private inBatches(facts: TemporalFact[], batchSize: number): Map<string, TemporalFact[]> {
    const segments = new Map<string, TemporalFact[]>();
    for (let i = 0; i < facts.length; i += batchSize) {
      segments.set(`batch-${i / batchSize + 1}`, facts.slice(i, i + batchSize));
    }
    return segments;
  }

  private positive(
    value: number | undefined,
    fallback: number,
    name: string,
    scopeId: string,
    integer = false,
  ): number {
    if (value === undefined) return fallback;
    if (!(value > 0) || !Number.isFinite(value) || (integer && !Number.isInteger(value))) {
      throw new ValidationError(
        `${name} must be a positive ${integer ? 'integer' : 'number'}, got ${value}`,
        { scopeId },
      );
    }
    return value;
  }
}

function append(segments: Map<string, TemporalFact[]>, key: string, fact: TemporalFact): void {
  const list = segments.get(key);
  if (list) {
    list.push(fact);
  } else {
    segments.set(key, [fact]);
  }
}
