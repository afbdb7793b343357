/**
 * Temporal Inference Engine Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ValidationError } from '../../errors.js';
import { InferenceEngine, classifyPair } from '../../inference/engine.js';
import type { EntityDescriptor } from '../../types/entity.js';
import type { Granularity, OwnerRef, TemporalFact, UpsertFactRequest } from '../../types/temporal.js';
import { SCOPE, at, createTestContext, ref, type TestContext } from '../fixtures.js';

function eventEntity(id: string): [OwnerRef, EntityDescriptor] {
  return [ref('event', id), { description: `Event ${id}` }];
}

describe('InferenceEngine', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext(['e1', 'e2', 'e3', 'e4'].map(eventEntity));
  });

  afterEach(() => {
    ctx.service.close();
  });

  async function fact(id: string, request: Omit<UpsertFactRequest, 'ownerRef' | 'scopeId'>): Promise<string> {
    return ctx.service.store.upsertFact({ ...request, ownerRef: ref('event', id), scopeId: SCOPE });
  }

  describe('inferRelations', () => {
    it('should infer precedes for touching intervals', async () => {
      const a = await fact('e1', { regionType: 'interval', start: at('10:00'), end: at('10:30') });
      const b = await fact('e2', { regionType: 'interval', start: at('10:30'), end: at('11:00') });

      const inferred = await ctx.service.inference.inferRelations(SCOPE);

      expect(inferred).toEqual([{ sourceId: a, targetId: b, type: 'precedes', confidence: 0.8 }]);
      expect(ctx.service.graph.relationsOf(b)).toMatchObject([
        { type: 'follows', targetId: a, inferred: true, confidence: 0.8 },
      ]);
    });

    it('should infer overlaps for nested intervals', async () => {
      const a = await fact('e1', { regionType: 'interval', start: at('10:00'), end: at('11:00') });
      const b = await fact('e2', { regionType: 'interval', start: at('10:30'), end: at('10:45') });

      const inferred = await ctx.service.inference.inferRelations(SCOPE);

      expect(inferred).toEqual([{ sourceId: a, targetId: b, type: 'overlaps', confidence: 0.8 }]);
      expect(ctx.service.graph.relationsOf(b).map(r => r.type)).toEqual(['overlaps']);
    });

    it('should infer precedes for consecutive instants', async () => {
      await fact('e1', { regionType: 'instant', start: at('09:00') });
      await fact('e2', { regionType: 'instant', start: at('09:10') });

      const inferred = await ctx.service.inference.inferRelations(SCOPE);
      expect(inferred.map(r => r.type)).toEqual(['precedes']);
    });

    it('should infer coincidesWith for instants in the same bucket', async () => {
      await fact('e1', { regionType: 'instant', start: at('09:00:10') });
      await fact('e2', { regionType: 'instant', start: at('09:00:10'), granularity: 'seconds' });

      const inferred = await ctx.service.inference.inferRelations(SCOPE);
      expect(inferred.map(r => r.type)).toEqual(['coincidesWith']);
    });

    it('should relate every adjacent pair of a chain', async () => {
      await fact('e1', { regionType: 'instant', start: at('09:00') });
      await fact('e2', { regionType: 'instant', start: at('09:10') });
      await fact('e3', { regionType: 'instant', start: at('09:20') });
      await fact('e4', { regionType: 'instant', start: at('09:30') });

      const inferred = await ctx.service.inference.inferRelations(SCOPE);
      expect(inferred).toHaveLength(3);
      expect(ctx.service.graph.listRelations(SCOPE)).toHaveLength(6);
    });

    it('should skip pairs already related in either direction', async () => {
      const a = await fact('e1', { regionType: 'instant', start: at('09:00') });
      const b = await fact('e2', { regionType: 'instant', start: at('09:10') });
      ctx.service.graph.createRelation(b, a, 'causedBy');

      const inferred = await ctx.service.inference.inferRelations(SCOPE);

      expect(inferred).toEqual([]);
      expect(ctx.service.graph.relationsOf(a)).toEqual([]);
    });

    it('should not infer anything twice', async () => {
      await fact('e1', { regionType: 'instant', start: at('09:00') });
      await fact('e2', { regionType: 'instant', start: at('09:10') });

      await ctx.service.inference.inferRelations(SCOPE);
      expect(await ctx.service.inference.inferRelations(SCOPE)).toEqual([]);
    });

    it('should use the configured confidence', async () => {
      const engine = new InferenceEngine(ctx.storage, ctx.service.graph, ctx.logger, { confidence: 0.65 });
      await fact('e1', { regionType: 'instant', start: at('09:00') });
      await fact('e2', { regionType: 'instant', start: at('09:10') });

      const [relation] = await engine.inferRelations(SCOPE);
      expect(relation?.confidence).toBe(0.65);
    });

    it('should reject a confidence outside [0, 1]', () => {
      expect(
        () => new InferenceEngine(ctx.storage, ctx.service.graph, ctx.logger, { confidence: 2 }),
      ).toThrow(ValidationError);
    });

    it('should run concurrent calls for a scope one after another', async () => {
      await fact('e1', { regionType: 'instant', start: at('09:00') });
      await fact('e2', { regionType: 'instant', start: at('09:10') });

      const [first, second] = await Promise.all([
        ctx.service.inference.inferRelations(SCOPE),
        ctx.service.inference.inferRelations(SCOPE),
      ]);

      expect(first).toHaveLength(1);
      expect(second).toEqual([]);
    });
  });

  describe('recomputeTimelineOrder', () => {
    it('should assign a dense zero-based order by start', async () => {
      const late = await fact('e1', { regionType: 'instant', start: at('11:00') });
      const early = await fact('e2', { regionType: 'instant', start: at('09:00') });
      const middle = await fact('e3', { regionType: 'interval', start: at('10:00'), end: at('12:00') });

      const order = await ctx.service.inference.recomputeTimelineOrder(SCOPE);

      expect([...order.entries()]).toEqual([
        [early, 0],
        [middle, 1],
        [late, 2],
      ]);
      expect(ctx.service.store.getFact(late).timelineOrder).toBe(2);
    });

    it('should be idempotent', async () => {
      await fact('e1', { regionType: 'instant', start: at('11:00') });
      await fact('e2', { regionType: 'instant', start: at('09:00') });

      const first = await ctx.service.inference.recomputeTimelineOrder(SCOPE);
      const second = await ctx.service.inference.recomputeTimelineOrder(SCOPE);
      expect(second).toEqual(first);
    });
  });
});

describe('classifyPair', () => {
  const base: Omit<TemporalFact, 'regionType' | 'start' | 'end'> = {
    id: 'f',
    ownerRef: ref('event', 'x'),
    scopeId: SCOPE,
    granularity: 'minutes',
    confidence: 1,
    relations: [],
    timelineOrder: null,
    createdAt: '',
    updatedAt: '',
  };

  function instant(start: Date, granularity: Granularity = 'minutes'): TemporalFact {
    return { ...base, regionType: 'instant', start, end: null, granularity };
  }

  function interval(start: Date, end: Date | null): TemporalFact {
    return { ...base, regionType: 'interval', start, end };
  }

  it('should treat an open interval as extending forever', () => {
    expect(classifyPair(interval(at('09:00'), null), instant(at('18:00')))).toBe('overlaps');
  });

  it('should relate an interval containing an instant as overlapping', () => {
    expect(classifyPair(interval(at('09:00'), at('10:00')), instant(at('09:30')))).toBe('overlaps');
  });

  it('should let a closed interval precede an instant at its end', () => {
    expect(classifyPair(interval(at('09:00'), at('10:00')), instant(at('10:00')))).toBe('precedes');
  });

  it('should compare buckets at the coarser granularity', () => {
    expect(classifyPair(instant(at('09:00'), 'days'), instant(at('09:00')))).toBe('coincidesWith');
  });

  it('should return null when no rule applies', () => {
    expect(classifyPair(instant(at('09:00')), instant(at('08:59')))).toBeNull();
  });
});
