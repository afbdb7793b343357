/**
 * Temporal Fact Types
 *
 * Defines the temporal facts tracked for a case: when an event,
 * action or decision happened, at what granularity, and how it
 * relates in time to other facts.
 *
 * @module types/temporal
 */

/**
 * Kind of entity a temporal fact describes
 */
export type EntityKind = 'event' | 'action' | 'decision';

export const ENTITY_KINDS: readonly EntityKind[] = ['event', 'action', 'decision'];

/**
 * Reference to the domain object a fact is about
 */
export interface OwnerRef {
  kind: EntityKind;
  id: string;
}

/**
 * Whether a fact is a durationless instant or an interval
 */
export type RegionType = 'instant' | 'interval';

/**
 * Temporal granularity, finest first
 */
export type Granularity =
  | 'seconds'
  | 'minutes'
  | 'hours'
  | 'days'
  | 'weeks'
  | 'months'
  | 'years';

export const GRANULARITIES: readonly Granularity[] = [
  'seconds',
  'minutes',
  'hours',
  'days',
  'weeks',
  'months',
  'years',
];

/**
 * The relation types a fact may hold towards another fact
 *
 * - precedes / follows: strict ordering
 * - coincidesWith: same moment at the facts' granularity (symmetric)
 * - overlaps: intervals intersect (symmetric)
 * - necessitates / isNecessitatedBy: one fact makes the other unavoidable
 * - hasConsequence / isConsequenceOf: one fact leads to the other
 * - causedBy, enabledBy, preventedBy: one-directional causal annotations
 */
export type RelationType =
  | 'precedes'
  | 'follows'
  | 'coincidesWith'
  | 'overlaps'
  | 'necessitates'
  | 'isNecessitatedBy'
  | 'hasConsequence'
  | 'isConsequenceOf'
  | 'causedBy'
  | 'enabledBy'
  | 'preventedBy';

/**
 * An outgoing relation stored on a fact
 */
export interface TemporalRelation {
  /** Type of relation */
  type: RelationType;
  /** Fact the relation points at */
  targetId: string;
  /** Confidence in this relation (0.0 - 1.0) */
  confidence: number;
  /** Whether this relation was inferred from timestamps */
  inferred: boolean;
  /** When this relation was last written */
  createdAt: string;
}

/**
 * A relation together with the fact it starts from
 */
export interface TemporalEdge extends TemporalRelation {
  sourceId: string;
}

interface InstantRegion {
  regionType: 'instant';
  start: Date;
  end: null;
}

interface IntervalRegion {
  regionType: 'interval';
  start: Date;
  /** null while the interval is still ongoing */
  end: Date | null;
}

/**
 * The temporal extent of a fact
 */
export type TemporalRegion = InstantRegion | IntervalRegion;

/**
 * A single temporal claim about one owning entity
 */
export type TemporalFact = TemporalRegion & {
  /** Unique identifier, immutable */
  id: string;
  /** Entity this fact describes */
  ownerRef: OwnerRef;
  /** Case or scenario the fact belongs to */
  scopeId: string;
  /** Granularity the timestamps were recorded at */
  granularity: Granularity;
  /** Confidence in the fact itself (0.0 - 1.0) */
  confidence: number;
  /** Outgoing relations, ordered by target */
  relations: TemporalRelation[];
  /** Dense chronological index within the scope */
  timelineOrder: number | null;
  createdAt: string;
  updatedAt: string;
};

/**
 * Request to create or overwrite the fact of an owner
 */
export interface UpsertFactRequest {
  ownerRef: OwnerRef;
  scopeId: string;
  regionType: RegionType;
  start: Date;
  end?: Date | null | undefined;
  granularity?: Granularity | undefined;
  confidence?: number | undefined;
}

/**
 * Options for creating a relation
 */
export interface CreateRelationOptions {
  /** Confidence in the relation (default 1.0) */
  confidence?: number | undefined;
  /** Whether the relation was inferred (default false) */
  inferred?: boolean | undefined;
}

/**
 * A scope registered in the store
 */
export interface ScopeRecord {
  id: string;
  title: string | null;
  createdAt: string;
  factCount: number;
}

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some(item => item === value);
}

export function isGranularity(value: string): value is Granularity {
  return GRANULARITIES.some(item => item === value);
}
