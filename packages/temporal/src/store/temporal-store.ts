/**
 * Temporal Store
 *
 * Typed storage and query of temporal facts. Validates region and
 * interval invariants before anything is written, and keys facts by
 * (owner, scope) so re-enhancing an owner overwrites its fact.
 *
 * @module store/temporal-store
 */

import type { EntityResolver } from '../types/entity.js';
import type {
  EntityKind,
  Granularity,
  OwnerRef,
  ScopeRecord,
  TemporalFact,
  UpsertFactRequest,
} from '../types/temporal.js';
import type { IFactStorage } from '../storage/interface.js';
import type { Logger } from '../logging/logger.js';
import {
  InvalidIntervalError,
  InvalidRegionError,
  NotFoundError,
  ValidationError,
  formatOwnerRef,
} from '../errors.js';
import { generateFactId } from '../utils/id-generator.js';
import { isValidDate } from '../utils/time.js';

const DEFAULT_GRANULARITY: Granularity = 'minutes';

/**
 * Options for enhancing an event or action with temporal data
 */
export interface EnhanceOptions {
  /** Duration in minutes; makes the fact an interval */
  durationMinutes?: number | undefined;
  granularity?: Granularity | undefined;
}

export interface EnhanceActionOptions extends EnhanceOptions {
  /** Decisions are always instants */
  isDecision?: boolean | undefined;
}

/**
 * Temporal fact store
 */
export class TemporalStore {
  constructor(
    private readonly storage: IFactStorage,
    private readonly resolver: EntityResolver,
    private readonly logger: Logger,
  ) {}

  /**
   * Create or overwrite the temporal fact of an owner within a scope.
   * Returns the fact id, which is stable across overwrites.
   */
  async upsertFact(request: UpsertFactRequest): Promise<string> {
    const { ownerRef, scopeId } = request;
    const existing = this.storage.getFactByOwner(ownerRef, scopeId);
    const context = { scopeId, ownerRef, factId: existing?.id };

    const end = this.validateRegion(request, context);
    const confidence = request.confidence ?? 1.0;
    if (!(confidence >= 0 && confidence <= 1)) {
      throw new ValidationError(`Confidence must be between 0 and 1, got ${confidence}`, context);
    }

    const descriptor = await this.resolver.resolve(ownerRef);
    if (!descriptor) {
      throw new NotFoundError(`Owner ${formatOwnerRef(ownerRef)} not found`, context);
    }

    const id = this.storage.transaction(() => {
      this.storage.ensureScope(scopeId);
      return this.storage.writeFact({
        id: existing?.id ?? generateFactId(),
        ownerRef,
        scopeId,
        regionType: request.regionType,
        start: request.start,
        end,
        granularity: request.granularity ?? DEFAULT_GRANULARITY,
        confidence,
      });
    });

    this.logger.debug(existing ? 'Overwrote temporal fact' : 'Created temporal fact', {
      factId: id,
      scopeId,
      owner: formatOwnerRef(ownerRef),
    });
    return id;
  }

  /**
   * Give an event its temporal fact. A duration makes it an interval.
   */
  async enhanceEvent(
    eventId: string,
    scopeId: string,
    at: Date,
    options: EnhanceOptions = {},
  ): Promise<TemporalFact> {
    return this.enhance({ kind: 'event', id: eventId }, scopeId, at, options.durationMinutes, options.granularity);
  }

  /**
   * Give an action its temporal fact. Decisions are recorded as
   * instants even when a duration is given.
   */
  async enhanceAction(
    actionId: string,
    scopeId: string,
    at: Date,
    options: EnhanceActionOptions = {},
  ): Promise<TemporalFact> {
    if (options.isDecision) {
      return this.enhance({ kind: 'decision', id: actionId }, scopeId, at, undefined, options.granularity);
    }
    return this.enhance({ kind: 'action', id: actionId }, scopeId, at, options.durationMinutes, options.granularity);
  }

  /**
   * Facts whose extent touches [start, end], ascending by start.
   * Intervals match when they start before the frame ends and have
   * not ended before it starts; instants match when inside the frame.
   */
  findInTimeframe(
    scopeId: string,
    start: Date,
    end: Date,
    kindFilter?: EntityKind | undefined,
  ): TemporalFact[] {
    if (!isValidDate(start) || !isValidDate(end)) {
      throw new InvalidIntervalError('Timeframe bounds must be valid dates', { scopeId });
    }
    if (end.getTime() < start.getTime()) {
      throw new InvalidIntervalError(
        `Timeframe end ${end.toISOString()} is before start ${start.toISOString()}`,
        { scopeId },
      );
    }

    return this.storage.queryFacts({
      scopeId,
      kinds: kindFilter ? [kindFilter] : undefined,
      frame: { start, end },
    });
  }

  /**
   * All facts of a scope in chronological order
   */
  findSequence(
    scopeId: string,
    kindFilter?: EntityKind | undefined,
    limit?: number | undefined,
  ): TemporalFact[] {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new ValidationError(`Limit must be a non-negative integer, got ${limit}`, { scopeId });
    }

    return this.storage.queryFacts({
      scopeId,
      kinds: kindFilter ? [kindFilter] : undefined,
      limit,
    });
  }

  /**
   * Decision facts of a scope in timeline order
   */
  criticalPath(scopeId: string): TemporalFact[] {
    return this.storage.queryFacts({ scopeId, kinds: ['decision'] });
  }

  getFact(factId: string): TemporalFact {
    const fact = this.storage.getFact(factId);
    if (!fact) {
      throw new NotFoundError(`Fact ${factId} not found`, { factId });
    }
    return fact;
  }

  getFactByOwner(ownerRef: OwnerRef, scopeId: string): TemporalFact | null {
    return this.storage.getFactByOwner(ownerRef, scopeId);
  }

  // ==========================================================================
  // Scopes
  // ==========================================================================

  registerScope(scopeId: string, title?: string | undefined): ScopeRecord {
    this.storage.ensureScope(scopeId, title);
    return this.getScope(scopeId);
  }

  getScope(scopeId: string): ScopeRecord {
    const scope = this.storage.getScope(scopeId);
    if (!scope) {
      throw new NotFoundError(`Scope ${scopeId} not found`, { scopeId });
    }
    return scope;
  }

  listScopes(): ScopeRecord[] {
    return this.storage.listScopes();
  }

  /**
   * Delete a scope together with all its facts and relations
   */
  deleteScope(scopeId: string): number {
    this.getScope(scopeId);
    const removed = this.storage.deleteScope(scopeId);
    this.logger.info('Deleted scope', { scopeId, removedFacts: removed });
    return removed;
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async enhance(
    ownerRef: OwnerRef,
    scopeId: string,
    at: Date,
    durationMinutes: number | undefined,
    granularity: Granularity | undefined,
  ): Promise<TemporalFact> {
    const request: UpsertFactRequest = durationMinutes
      ? {
          ownerRef,
          scopeId,
          regionType: 'interval',
          start: at,
          end: new Date(at.getTime() + durationMinutes * 60_000),
          granularity,
        }
      : { ownerRef, scopeId, regionType: 'instant', start: at, granularity };

    const id = await this.upsertFact(request);
    return this.getFact(id);
  }

  /**
   * Check region invariants and return the end to store
   */
  private validateRegion(
    request: UpsertFactRequest,
    context: { scopeId: string; ownerRef: OwnerRef; factId: string | undefined },
  ): Date | null {
    const end = request.end ?? null;

    if (!isValidDate(request.start)) {
      throw new InvalidIntervalError('Start must be a valid date', context);
    }

    if (request.regionType === 'instant') {
      if (end !== null) {
        throw new InvalidRegionError(
          `Instant fact for ${formatOwnerRef(request.ownerRef)} cannot have an end`,
          context,
        );
      }
      return null;
    }

    if (end !== null) {
      if (!isValidDate(end)) {
        throw new InvalidIntervalError('End must be a valid date', context);
      }
      if (end.getTime() < request.start.getTime()) {
        throw new InvalidIntervalError(
          `Interval end ${end.toISOString()} is before start ${request.start.toISOString()}`,
          context,
        );
      }
    }
    return end;
  }
}
