/**
 * Fact Storage Interface
 *
 * Defines the contract for persisting temporal facts and their
 * relations. Implementations are synchronous and transactional:
 * every call either completes or leaves the store untouched, and
 * `transaction` groups several calls into one unit.
 *
 * @module storage/interface
 */

import type {
  EntityKind,
  Granularity,
  OwnerRef,
  RegionType,
  ScopeRecord,
  TemporalEdge,
  TemporalFact,
} from '../types/temporal.js';

/**
 * Fields written for a fact. The id is only used when the owner has
 * no fact in the scope yet; otherwise the existing id is kept.
 */
export interface FactWrite {
  id: string;
  ownerRef: OwnerRef;
  scopeId: string;
  regionType: RegionType;
  start: Date;
  end: Date | null;
  granularity: Granularity;
  confidence: number;
}

/**
 * Query options for fact retrieval
 */
export interface FactQuery {
  scopeId: string;
  /** Restrict to owner kinds */
  kinds?: EntityKind[] | undefined;
  /** Only facts whose extent touches this frame */
  frame?: { start: Date; end: Date } | undefined;
  /** Maximum results */
  limit?: number | undefined;
}

/**
 * Temporal fact storage
 */
export interface IFactStorage {
  // Lifecycle
  /** Initialize the storage (create tables, indexes) */
  initialize(): void;
  /** Close the storage connection */
  close(): void;
  /** Run several operations as one unit */
  transaction<T>(fn: () => T): T;

  // Scopes
  /** Create the scope if it does not exist */
  ensureScope(scopeId: string, title?: string | undefined): void;
  getScope(scopeId: string): ScopeRecord | null;
  listScopes(): ScopeRecord[];
  /** Delete a scope with its facts and relations; returns deleted fact count */
  deleteScope(scopeId: string): number;

  // Facts
  getFact(id: string): TemporalFact | null;
  getFactByOwner(ownerRef: OwnerRef, scopeId: string): TemporalFact | null;
  /** Insert or overwrite the owner's fact; returns the fact id */
  writeFact(fact: FactWrite): string;
  /** Facts ordered ascending by (start, id) */
  queryFacts(query: FactQuery): TemporalFact[];
  /** Persist a dense order for the given facts */
  setTimelineOrder(assignments: ReadonlyMap<string, number>): void;

  // Relations
  /** Insert or replace the relation from source to target */
  putRelation(edge: TemporalEdge): void;
  /** Edges pointing at a fact, optionally of one type */
  relationsTo(factId: string, type?: TemporalEdge['type'] | undefined): TemporalEdge[];
  /** All edges whose source lies in the scope */
  relationsInScope(scopeId: string): TemporalEdge[];
}
