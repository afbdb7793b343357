/**
 * Relation Types
 *
 * The closed set of relation types and their inverses. Types without
 * an inverse are one-directional annotations; creating one never
 * touches the target fact.
 *
 * @module relations/relation-types
 */

import type { RelationType } from '../types/temporal.js';

export const RELATION_TYPES: readonly RelationType[] = [
  'precedes',
  'follows',
  'coincidesWith',
  'overlaps',
  'necessitates',
  'isNecessitatedBy',
  'hasConsequence',
  'isConsequenceOf',
  'causedBy',
  'enabledBy',
  'preventedBy',
];

/**
 * Inverse of each relation type, or null when none is defined
 */
export const INVERSE_RELATIONS: Record<RelationType, RelationType | null> = {
  precedes: 'follows',
  follows: 'precedes',
  coincidesWith: 'coincidesWith',
  overlaps: 'overlaps',
  necessitates: 'isNecessitatedBy',
  isNecessitatedBy: 'necessitates',
  hasConsequence: 'isConsequenceOf',
  isConsequenceOf: 'hasConsequence',
  causedBy: null,
  enabledBy: null,
  preventedBy: null,
};

/**
 * Relation types rendered in the causal section of a narrative
 */
export const CAUSAL_RELATION_TYPES: readonly RelationType[] = [
  'causedBy',
  'enabledBy',
  'preventedBy',
  'hasConsequence',
];

export function isRelationType(value: string): value is RelationType {
  return RELATION_TYPES.some(item => item === value);
}

export function inverseOf(type: RelationType): RelationType | null {
  return INVERSE_RELATIONS[type];
}

export function isCausalRelation(type: RelationType): boolean {
  return CAUSAL_RELATION_TYPES.includes(type);
}
