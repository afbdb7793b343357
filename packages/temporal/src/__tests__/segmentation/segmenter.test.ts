/**
 * Segmenter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ValidationError } from '../../errors.js';
import { Segmenter } from '../../segmentation/segmenter.js';
import type { EntityResolver } from '../../types/entity.js';
import type { TemporalFact } from '../../types/temporal.js';
import { SCOPE, at, createTestContext, ref, type TestContext } from '../fixtures.js';

function owners(segments: Map<string, TemporalFact[]>): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  for (const [key, facts] of segments) {
    result[key] = facts.map(f => f.ownerRef.id);
  }
  return result;
}

describe('Segmenter', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext([
      [ref('event', 'e1'), { description: 'Complaint filed', actorId: 'client' }],
      [ref('action', 'a1'), { description: 'Report drafted', actorId: 'engineer' }],
      [ref('decision', 'd1'), { description: 'Report withheld', actorId: 'engineer' }],
      [ref('event', 'e2'), { description: 'Audit' }],
      [ref('action', 'a2'), { description: 'Report published', actorId: 'engineer' }],
      [ref('event', 'e3'), { description: 'Hearing', actorId: 'client' }],
    ]);

    const store = ctx.service.store;
    await store.enhanceEvent('e1', SCOPE, at('09:00'));
    await store.enhanceAction('a1', SCOPE, at('09:30'));
    await store.enhanceAction('d1', SCOPE, at('10:30'), { isDecision: true });
    await store.enhanceEvent('e2', SCOPE, at('12:00'));
    await store.enhanceAction('a2', SCOPE, at('12:45'));
    await store.enhanceEvent('e3', SCOPE, at('15:00'));
  });

  afterEach(() => {
    ctx.service.close();
  });

  it('should group by actor in order of first appearance', async () => {
    const segments = await ctx.service.segmenter.group(SCOPE, 'by_actor');

    expect(owners(segments)).toEqual({
      client: ['e1', 'e3'],
      engineer: ['a1', 'd1', 'a2'],
      unassigned: ['e2'],
    });
    expect([...segments.keys()]).toEqual(['client', 'engineer', 'unassigned']);
  });

  it('should split on gaps above the default hour', async () => {
    const segments = await ctx.service.segmenter.group(SCOPE, 'by_gap');

    expect(owners(segments)).toEqual({
      'segment-1': ['e1', 'a1', 'd1'],
      'segment-2': ['e2', 'a2'],
      'segment-3': ['e3'],
    });
  });

  it('should honour a custom gap threshold', async () => {
    const segments = await ctx.service.segmenter.group(SCOPE, 'by_gap', { thresholdSeconds: 2700 });

    expect(owners(segments)).toEqual({
      'segment-1': ['e1', 'a1'],
      'segment-2': ['d1'],
      'segment-3': ['e2', 'a2'],
      'segment-4': ['e3'],
    });
  });

  it('should group by kind with every key present', async () => {
    const segments = await ctx.service.segmenter.group(SCOPE, 'by_kind');

    expect(owners(segments)).toEqual({
      events: ['e1', 'e2', 'e3'],
      actions: ['a1', 'a2'],
      decisions: ['d1'],
    });
  });

  it('should keep empty kind groups', async () => {
    const segments = await ctx.service.segmenter.group('empty-scope', 'by_kind');
    expect(owners(segments)).toEqual({ events: [], actions: [], decisions: [] });
  });

  it('should close a phase at each decision', async () => {
    const segments = await ctx.service.segmenter.group(SCOPE, 'by_decision');

    expect(owners(segments)).toEqual({
      'phase-1': ['e1', 'a1', 'd1'],
      'phase-2': ['e2', 'a2', 'e3'],
    });
  });

  it('should keep leading decisions in the first phase', async () => {
    ctx.resolver.register(ref('decision', 'd0'), { description: 'Engagement accepted' });
    await ctx.service.store.enhanceAction('d0', SCOPE, at('08:00'), { isDecision: true });

    const segments = await ctx.service.segmenter.group(SCOPE, 'by_decision');

    expect(owners(segments)).toEqual({
      'phase-1': ['d0', 'e1', 'a1', 'd1'],
      'phase-2': ['e2', 'a2', 'e3'],
    });
  });

  it('should treat a failing resolver as an unassigned actor', async () => {
    const failing: EntityResolver = {
      resolve: async () => {
        throw new Error('directory offline');
      },
    };
    const segmenter = new Segmenter(ctx.storage, failing, ctx.logger);

    const segments = await segmenter.group(SCOPE, 'by_actor');

    expect(owners(segments)).toEqual({ unassigned: ['e1', 'a1', 'd1', 'e2', 'a2', 'e3'] });
    expect(ctx.logger.messages('warn')).toHaveLength(6);
    const warnings = ctx.logger.entries.filter(entry => entry.level === 'warn');
    expect(warnings[5]?.context).toMatchObject({
      owner: 'event:e3',
      error: 'directory offline',
    });
  });

  it('should batch by five for auto', async () => {
    const segments = await ctx.service.segmenter.group(SCOPE, 'auto');

    expect(owners(segments)).toEqual({
      'batch-1': ['e1', 'a1', 'd1', 'e2', 'a2'],
      'batch-2': ['e3'],
    });
  });

  it('should take the batch size from params and config', async () => {
    expect(owners(await ctx.service.segmenter.group(SCOPE, 'auto', { batchSize: 4 }))).toEqual({
      'batch-1': ['e1', 'a1', 'd1', 'e2'],
      'batch-2': ['a2', 'e3'],
    });

    const configured = new Segmenter(ctx.storage, ctx.resolver, ctx.logger, { batchSize: 3 });
    expect([...(await configured.group(SCOPE, 'auto')).keys()]).toEqual(['batch-1', 'batch-2']);
  });

  it('should reject an unknown strategy', async () => {
    await expect(ctx.service.segmenter.group(SCOPE, 'by_mood')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject a non-positive threshold', async () => {
    await expect(
      ctx.service.segmenter.group(SCOPE, 'by_gap', { thresholdSeconds: 0 }),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
