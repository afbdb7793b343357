/**
 * Narrative Templates
 *
 * Sentence fragments and section headings used to render a scope's
 * timeline as plain text.
 *
 * @module narrative/templates
 */

import type { EntityKind, RelationType } from '../types/temporal.js';
import { formatTimestamp } from '../utils/time.js';

/**
 * Phrase placed between the two endpoints of a relation
 */
export const RELATION_TEMPLATES: Record<RelationType, string> = {
  precedes: 'happens before',
  follows: 'happens after',
  coincidesWith: 'happens at the same time as',
  overlaps: 'overlaps with',
  necessitates: 'necessitates',
  isNecessitatedBy: 'is necessitated by',
  hasConsequence: 'leads to',
  isConsequenceOf: 'is a consequence of',
  causedBy: 'was caused by',
  enabledBy: 'was enabled by',
  preventedBy: 'was prevented by',
};

/**
 * Narrative section templates
 */
export const SECTION_TEMPLATES = {
  timeline: {
    title: 'TIMELINE:',
  },
  relations: {
    title: 'TEMPORAL RELATIONSHIPS:',
    empty: '- No temporal relationships recorded.',
  },
  causal: {
    title: 'CAUSAL RELATIONSHIPS:',
    empty: '- No causal relationships recorded.',
  },
  options: {
    title: '  Options:',
    noDescription: 'No description',
  },
};

const KIND_LABELS: Record<EntityKind, string> = {
  event: 'Event',
  action: 'Action',
  decision: 'Decision',
};

export function getKindLabel(kind: EntityKind): string {
  return KIND_LABELS[kind];
}

/**
 * Placeholder for an owner the resolver does not know
 */
export function unnamed(kind: EntityKind): string {
  return `Unnamed ${kind}`;
}

/**
 * Bracketed time span of a fact
 */
export function formatSpan(start: Date, end: Date | null, isInterval: boolean): string {
  if (!isInterval) {
    return `[${formatTimestamp(start)}]`;
  }
  return end
    ? `[${formatTimestamp(start)} to ${formatTimestamp(end)}]`
    : `[${formatTimestamp(start)} onwards]`;
}

/**
 * Generate the sentence describing a relation
 */
export function generateRelationSentence(
  sourceKind: EntityKind,
  sourceDescription: string,
  relation: RelationType,
  targetKind: EntityKind,
  targetDescription: string,
): string {
  return `- ${getKindLabel(sourceKind)} '${sourceDescription}' ${RELATION_TEMPLATES[relation]} ${getKindLabel(targetKind)} '${targetDescription}'`;
}

export function formatConfidence(confidence: number): string {
  return ` (confidence: ${confidence.toFixed(2)})`;
}
