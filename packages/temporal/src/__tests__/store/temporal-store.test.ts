/**
 * Temporal Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  InvalidIntervalError,
  InvalidRegionError,
  NotFoundError,
  ValidationError,
} from '../../errors.js';
import type { TemporalStore } from '../../store/temporal-store.js';
import { SCOPE, at, createTestContext, ref, type TestContext } from '../fixtures.js';

describe('TemporalStore', () => {
  let ctx: TestContext;
  let store: TemporalStore;

  beforeEach(() => {
    ctx = createTestContext([
      [ref('event', 'e1'), { description: 'Crack found in beam' }],
      [ref('event', 'e2'), { description: 'Inspection' }],
      [ref('event', 'e3'), { description: 'Site closed' }],
      [ref('action', 'a1'), { description: 'Notify client', actorId: 'engineer' }],
      [ref('decision', 'd1'), { description: 'Stop construction' }],
    ]);
    store = ctx.service.store;
  });

  afterEach(() => {
    ctx.service.close();
  });

  describe('upsertFact', () => {
    it('should create an instant fact with defaults', async () => {
      const id = await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
      });

      const fact = store.getFact(id);
      expect(fact.id).toBe(id);
      expect(fact.ownerRef).toEqual({ kind: 'event', id: 'e1' });
      expect(fact.scopeId).toBe(SCOPE);
      expect(fact.regionType).toBe('instant');
      expect(fact.start.toISOString()).toBe('2024-03-01T09:00:00.000Z');
      expect(fact.end).toBeNull();
      expect(fact.granularity).toBe('minutes');
      expect(fact.confidence).toBe(1);
      expect(fact.relations).toEqual([]);
      expect(fact.timelineOrder).toBeNull();
    });

    it('should register the scope implicitly', async () => {
      await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
      });

      expect(store.getScope(SCOPE).factCount).toBe(1);
    });

    it('should overwrite the fact of the same owner and keep its id', async () => {
      const first = await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
      });
      const second = await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'interval',
        start: at('10:00'),
        end: at('11:00'),
        granularity: 'hours',
        confidence: 0.5,
      });

      expect(second).toBe(first);
      const fact = store.getFact(first);
      expect(fact.regionType).toBe('interval');
      expect(fact.start.toISOString()).toBe('2024-03-01T10:00:00.000Z');
      expect(fact.end?.toISOString()).toBe('2024-03-01T11:00:00.000Z');
      expect(fact.granularity).toBe('hours');
      expect(fact.confidence).toBe(0.5);
      expect(store.findSequence(SCOPE)).toHaveLength(1);
    });

    it('should keep one fact per owner and scope', async () => {
      const a = await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: 'case-a',
        regionType: 'instant',
        start: at('09:00'),
      });
      const b = await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: 'case-b',
        regionType: 'instant',
        start: at('09:00'),
      });

      expect(a).not.toBe(b);
    });

    it('should clear the timeline order of an overwritten fact', async () => {
      const id = await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
      });
      await ctx.service.refresh(SCOPE);
      expect(store.getFact(id).timelineOrder).toBe(0);

      await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:05'),
      });
      expect(store.getFact(id).timelineOrder).toBeNull();
    });

    it('should accept an open interval', async () => {
      const id = await store.upsertFact({
        ownerRef: ref('event', 'e3'),
        scopeId: SCOPE,
        regionType: 'interval',
        start: at('12:00'),
      });

      const fact = store.getFact(id);
      expect(fact.regionType).toBe('interval');
      expect(fact.end).toBeNull();
    });

    it('should reject an instant with an end', async () => {
      const attempt = store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
        end: at('09:30'),
      });

      await expect(attempt).rejects.toBeInstanceOf(InvalidRegionError);
      await expect(attempt).rejects.toMatchObject({
        code: 'INVALID_REGION',
        scopeId: SCOPE,
        ownerRef: { kind: 'event', id: 'e1' },
      });
    });

    it('should reject an interval ending before it starts', async () => {
      const attempt = store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'interval',
        start: at('10:00'),
        end: at('09:00'),
      });

      await expect(attempt).rejects.toBeInstanceOf(InvalidIntervalError);
    });

    it('should reject an invalid start date', async () => {
      await expect(
        store.upsertFact({
          ownerRef: ref('event', 'e1'),
          scopeId: SCOPE,
          regionType: 'instant',
          start: new Date('not a date'),
        }),
      ).rejects.toBeInstanceOf(InvalidIntervalError);
    });

    it('should reject dates outside the four-digit years', async () => {
      await expect(
        store.upsertFact({
          ownerRef: ref('event', 'e1'),
          scopeId: SCOPE,
          regionType: 'instant',
          start: new Date('+010000-01-01T00:00:00Z'),
        }),
      ).rejects.toBeInstanceOf(InvalidIntervalError);
      await expect(
        store.upsertFact({
          ownerRef: ref('event', 'e1'),
          scopeId: SCOPE,
          regionType: 'interval',
          start: at('09:00'),
          end: new Date('+010000-01-01T00:00:00Z'),
        }),
      ).rejects.toBeInstanceOf(InvalidIntervalError);
      expect(store.listScopes()).toEqual([]);
    });

    it('should reject an owner the resolver does not know', async () => {
      const attempt = store.upsertFact({
        ownerRef: ref('event', 'missing'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
      });

      await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
      await expect(attempt).rejects.toMatchObject({ ownerRef: { kind: 'event', id: 'missing' } });
    });

    it('should reject confidence outside [0, 1]', async () => {
      await expect(
        store.upsertFact({
          ownerRef: ref('event', 'e1'),
          scopeId: SCOPE,
          regionType: 'instant',
          start: at('09:00'),
          confidence: 1.5,
        }),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should write nothing when validation fails', async () => {
      await expect(
        store.upsertFact({
          ownerRef: ref('event', 'e1'),
          scopeId: SCOPE,
          regionType: 'instant',
          start: at('09:00'),
          end: at('10:00'),
        }),
      ).rejects.toThrow();

      expect(store.listScopes()).toEqual([]);
    });
  });

  describe('findInTimeframe', () => {
    let ids: Record<string, string>;

    beforeEach(async () => {
      ids = {
        instant: await store.upsertFact({
          ownerRef: ref('event', 'e1'),
          scopeId: SCOPE,
          regionType: 'instant',
          start: at('09:00'),
        }),
        closed: await store.upsertFact({
          ownerRef: ref('event', 'e2'),
          scopeId: SCOPE,
          regionType: 'interval',
          start: at('09:30'),
          end: at('10:30'),
        }),
        open: await store.upsertFact({
          ownerRef: ref('event', 'e3'),
          scopeId: SCOPE,
          regionType: 'interval',
          start: at('08:00'),
        }),
        later: await store.upsertFact({
          ownerRef: ref('decision', 'd1'),
          scopeId: SCOPE,
          regionType: 'instant',
          start: at('11:00'),
        }),
      };
    });

    it('should return intervals touching the frame and instants inside it', () => {
      const facts = store.findInTimeframe(SCOPE, at('10:00'), at('10:45'));
      expect(facts.map(f => f.id)).toEqual([ids['open'], ids['closed']]);
    });

    it('should include instants on the frame boundary', () => {
      const facts = store.findInTimeframe(SCOPE, at('09:00'), at('09:00'));
      expect(facts.map(f => f.id)).toEqual([ids['open'], ids['instant']]);
    });

    it('should match an interval ending exactly at the frame start', () => {
      const facts = store.findInTimeframe(SCOPE, at('10:30'), at('10:40'));
      expect(facts.map(f => f.id)).toEqual([ids['open'], ids['closed']]);
    });

    it('should filter by kind', () => {
      const facts = store.findInTimeframe(SCOPE, at('08:00'), at('12:00'), 'decision');
      expect(facts.map(f => f.id)).toEqual([ids['later']]);
    });

    it('should reject an inverted frame', () => {
      expect(() => store.findInTimeframe(SCOPE, at('11:00'), at('10:00'))).toThrow(InvalidIntervalError);
    });

    it('should return nothing for an unknown scope', () => {
      expect(store.findInTimeframe('other', at('08:00'), at('12:00'))).toEqual([]);
    });

    it('should reject frame bounds outside the four-digit years', () => {
      expect(() => store.findInTimeframe(SCOPE, at('08:00'), new Date('+010000-01-01T00:00:00Z'))).toThrow(
        InvalidIntervalError,
      );
    });
  });

  describe('findSequence', () => {
    it('should order by start then id', async () => {
      const late = await store.upsertFact({
        ownerRef: ref('event', 'e1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('10:00'),
      });
      const tieA = await store.upsertFact({
        ownerRef: ref('event', 'e2'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
      });
      const tieB = await store.upsertFact({
        ownerRef: ref('action', 'a1'),
        scopeId: SCOPE,
        regionType: 'instant',
        start: at('09:00'),
      });

      const ties = [tieA, tieB].sort();
      expect(store.findSequence(SCOPE).map(f => f.id)).toEqual([...ties, late]);
    });

    it('should apply kind filter and limit', async () => {
      await store.upsertFact({ ownerRef: ref('event', 'e1'), scopeId: SCOPE, regionType: 'instant', start: at('09:00') });
      await store.upsertFact({ ownerRef: ref('event', 'e2'), scopeId: SCOPE, regionType: 'instant', start: at('09:10') });
      await store.upsertFact({ ownerRef: ref('event', 'e3'), scopeId: SCOPE, regionType: 'instant', start: at('09:20') });
      await store.upsertFact({ ownerRef: ref('action', 'a1'), scopeId: SCOPE, regionType: 'instant', start: at('09:05') });

      const events = store.findSequence(SCOPE, 'event', 2);
      expect(events.map(f => f.ownerRef.id)).toEqual(['e1', 'e2']);
      expect(store.findSequence(SCOPE)).toHaveLength(4);
    });

    it('should reject a negative limit', () => {
      expect(() => store.findSequence(SCOPE, undefined, -1)).toThrow(ValidationError);
    });
  });

  describe('criticalPath', () => {
    it('should list the decisions of a scope in timeline order', async () => {
      ctx.resolver.register(ref('decision', 'd2'), { description: 'Report to authority' });
      const report = await store.enhanceAction('d2', SCOPE, at('11:00'), { isDecision: true });
      await store.enhanceEvent('e1', SCOPE, at('09:00'));
      const stop = await store.enhanceAction('d1', SCOPE, at('10:00'), { isDecision: true });
      await store.enhanceAction('a1', SCOPE, at('10:30'));

      expect(store.criticalPath(SCOPE).map(f => f.id)).toEqual([stop.id, report.id]);
    });

    it('should be empty for a scope without decisions', async () => {
      await store.enhanceEvent('e1', SCOPE, at('09:00'));
      expect(store.criticalPath(SCOPE)).toEqual([]);
    });
  });

  describe('enhancers', () => {
    it('should make an event with a duration an interval', async () => {
      const fact = await store.enhanceEvent('e1', SCOPE, at('09:00'), { durationMinutes: 30 });

      expect(fact.regionType).toBe('interval');
      expect(fact.end?.toISOString()).toBe('2024-03-01T09:30:00.000Z');
      expect(fact.granularity).toBe('minutes');
    });

    it('should make an event without a duration an instant', async () => {
      const fact = await store.enhanceEvent('e1', SCOPE, at('09:00'), { granularity: 'days' });

      expect(fact.regionType).toBe('instant');
      expect(fact.granularity).toBe('days');
    });

    it('should record an action with a duration as an interval', async () => {
      const fact = await store.enhanceAction('a1', SCOPE, at('09:00'), { durationMinutes: 90 });

      expect(fact.ownerRef).toEqual({ kind: 'action', id: 'a1' });
      expect(fact.end?.toISOString()).toBe('2024-03-01T10:30:00.000Z');
    });

    it('should always record a decision as an instant', async () => {
      const fact = await store.enhanceAction('d1', SCOPE, at('09:00'), {
        durationMinutes: 30,
        isDecision: true,
      });

      expect(fact.ownerRef).toEqual({ kind: 'decision', id: 'd1' });
      expect(fact.regionType).toBe('instant');
      expect(fact.end).toBeNull();
    });
  });

  describe('scopes', () => {
    it('should register a scope with a title', () => {
      const scope = store.registerScope('case-9', 'Bridge inspection');
      expect(scope).toMatchObject({ id: 'case-9', title: 'Bridge inspection', factCount: 0 });
    });

    it('should list scopes with fact counts', async () => {
      await store.enhanceEvent('e1', 'case-b', at('09:00'));
      await store.enhanceEvent('e2', 'case-b', at('09:10'));
      await store.enhanceEvent('e1', 'case-a', at('09:00'));

      expect(store.listScopes().map(s => [s.id, s.factCount])).toEqual([
        ['case-a', 1],
        ['case-b', 2],
      ]);
    });

    it('should raise NotFound for an unknown scope', () => {
      expect(() => store.getScope('nope')).toThrow(NotFoundError);
    });

    it('should delete a scope with its facts and relations', async () => {
      const a = await store.enhanceEvent('e1', SCOPE, at('09:00'));
      const b = await store.enhanceEvent('e2', SCOPE, at('09:10'));
      ctx.service.graph.createRelation(a.id, b.id, 'precedes');

      expect(store.deleteScope(SCOPE)).toBe(2);
      expect(() => store.getFact(a.id)).toThrow(NotFoundError);
      expect(() => store.getScope(SCOPE)).toThrow(NotFoundError);
      expect(ctx.service.graph.listRelations(SCOPE)).toEqual([]);
    });
  });
});
