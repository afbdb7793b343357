/**
 * Relation Graph
 *
 * Directed temporal relations between facts of one scope. Each
 * ordered pair of facts holds at most one relation; writing a
 * relation with an inverse also rewrites the reverse direction.
 *
 * @module relations/graph
 */

import type {
  CreateRelationOptions,
  TemporalEdge,
  TemporalFact,
} from '../types/temporal.js';
import type { IFactStorage } from '../storage/interface.js';
import type { Logger } from '../logging/logger.js';
import {
  InvalidRelationTypeError,
  NotFoundError,
  ValidationError,
} from '../errors.js';
import { now } from '../utils/time.js';
import { inverseOf, isRelationType } from './relation-types.js';

/**
 * Temporal relation graph
 */
export class RelationGraph {
  constructor(
    private readonly storage: IFactStorage,
    private readonly logger: Logger,
  ) {}

  /**
   * Record that `fromId` holds `type` towards `toId`, plus the inverse
   * from `toId` to `fromId` when the type has one.
   */
  createRelation(
    fromId: string,
    toId: string,
    type: string,
    options: CreateRelationOptions = {},
  ): { success: true } {
    const from = this.storage.getFact(fromId);
    if (!from) {
      throw new NotFoundError(`Fact ${fromId} not found`, { factId: fromId });
    }
    const context = { factId: fromId, scopeId: from.scopeId };

    if (!isRelationType(type)) {
      throw new InvalidRelationTypeError(type, context);
    }
    const confidence = options.confidence ?? 1.0;
    if (!(confidence >= 0 && confidence <= 1)) {
      throw new ValidationError(`Confidence must be between 0 and 1, got ${confidence}`, context);
    }
    if (fromId === toId) {
      throw new ValidationError(`Fact ${fromId} cannot relate to itself`, context);
    }

    const to = this.storage.getFact(toId);
    if (!to) {
      throw new NotFoundError(`Fact ${toId} not found`, { factId: toId, scopeId: from.scopeId });
    }
    if (from.scopeId !== to.scopeId) {
      throw new ValidationError(
        `Facts ${fromId} and ${toId} belong to different scopes`,
        { factId: fromId, scopeId: from.scopeId },
      );
    }

    const inferred = options.inferred ?? false;
    const createdAt = now();
    const inverse = inverseOf(type);

    this.storage.transaction(() => {
      this.storage.putRelation({ sourceId: fromId, targetId: toId, type, confidence, inferred, createdAt });
      if (inverse) {
        this.storage.putRelation({
          sourceId: toId,
          targetId: fromId,
          type: inverse,
          confidence,
          inferred,
          createdAt,
        });
      }
    });

    this.logger.debug('Created relation', {
      scopeId: from.scopeId,
      from: fromId,
      to: toId,
      type,
      inverse,
      inferred,
    });
    return { success: true };
  }

  /**
   * Facts the given fact holds `type` towards, chronologically.
   * After `createRelation(a, b, 'precedes')`, `findRelated(b, 'follows')`
   * returns `[a]`.
   */
  findRelated(factId: string, type: string): TemporalFact[] {
    const fact = this.storage.getFact(factId);
    if (!fact) {
      throw new NotFoundError(`Fact ${factId} not found`, { factId });
    }
    if (!isRelationType(type)) {
      throw new InvalidRelationTypeError(type, { factId, scopeId: fact.scopeId });
    }

    const ids = new Set(fact.relations.filter(r => r.type === type).map(r => r.targetId));
    const inverse = inverseOf(type);
    if (inverse) {
      for (const edge of this.storage.relationsTo(factId, inverse)) {
        ids.add(edge.sourceId);
      }
    }

    const related: TemporalFact[] = [];
    for (const id of ids) {
      const other = this.storage.getFact(id);
      if (other) related.push(other);
    }
    return related.sort(
      (a, b) => a.start.getTime() - b.start.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    );
  }

  /**
   * Outgoing relations of a fact
   */
  relationsOf(factId: string): TemporalEdge[] {
    const fact = this.storage.getFact(factId);
    if (!fact) {
      throw new NotFoundError(`Fact ${factId} not found`, { factId });
    }
    return fact.relations.map(relation => ({ ...relation, sourceId: factId }));
  }

  /**
   * Every relation in a scope, ordered by source then target start
   */
  listRelations(scopeId: string): TemporalEdge[] {
    return this.storage.relationsInScope(scopeId);
  }
}
