/**
 * Entity Resolution Types
 *
 * The engine never owns events, actions or decisions; it asks an
 * EntityResolver for the human-readable side of each owner.
 *
 * @module types/entity
 */

import type { OwnerRef } from './temporal.js';

/**
 * One alternative offered by a decision
 */
export interface DecisionOption {
  /** Short label, matched against the selected option */
  label: string;
  description?: string | undefined;
  /** Ethical principles the option appeals to */
  ethicalPrinciples?: string[] | undefined;
}

/**
 * Human-readable description of an owning entity
 */
export interface EntityDescriptor {
  description: string;
  /** Actor responsible for the entity, if any */
  actorId?: string | undefined;
  /** Alternatives considered (decisions only) */
  options?: DecisionOption[] | undefined;
  /** Label of the chosen option (decisions only) */
  selectedOption?: string | undefined;
}

/**
 * Maps an owner reference to its description.
 *
 * Returns null when the owner does not exist.
 */
export interface EntityResolver {
  resolve(ownerRef: OwnerRef): Promise<EntityDescriptor | null>;
}
