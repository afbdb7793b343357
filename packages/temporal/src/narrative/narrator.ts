/**
 * Narrator
 *
 * Turns the facts and relations of a scope into a structured timeline
 * and a plain-text context block. Rendering never aborts: a relation
 * whose endpoint cannot be resolved is skipped and logged.
 *
 * @module narrative/narrator
 */

import type { DecisionOption, EntityDescriptor, EntityResolver } from '../types/entity.js';
import type {
  RegionType,
  RelationType,
  TemporalEdge,
  TemporalFact,
} from '../types/temporal.js';
import type { IFactStorage } from '../storage/interface.js';
import type { Logger } from '../logging/logger.js';
import { NotFoundError } from '../errors.js';
import { inverseOf, isCausalRelation } from '../relations/relation-types.js';
import {
  SECTION_TEMPLATES,
  formatConfidence,
  formatSpan,
  generateRelationSentence,
  unnamed,
} from './templates.js';

/**
 * An outgoing relation as listed on a timeline entry
 */
export interface RelationSummary {
  type: RelationType;
  targetId: string;
  confidence: number;
  inferred: boolean;
}

/**
 * One fact on the structured timeline
 */
export interface TimelineEntry {
  id: string;
  regionType: RegionType;
  start: Date;
  end: Date | null;
  description: string;
  actorId: string | null;
  relationSummary: RelationSummary[];
  timelineOrder: number | null;
}

export interface DecisionEntry extends TimelineEntry {
  options: DecisionOption[];
  selectedOption: string | null;
}

/**
 * Structured timeline of a scope; each list is chronological
 */
export interface Timeline {
  scopeId: string;
  events: TimelineEntry[];
  actions: TimelineEntry[];
  decisions: DecisionEntry[];
}

export interface ContextOptions {
  /** Append the confidence of inferred relations */
  includeConfidence?: boolean | undefined;
  /** Add a section for causal relations */
  includeCausal?: boolean | undefined;
}

/**
 * Timeline narrator
 */
export class Narrator {
  constructor(
    private readonly storage: IFactStorage,
    private readonly resolver: EntityResolver,
    private readonly logger: Logger,
  ) {}

  async buildTimeline(scopeId: string): Promise<Timeline> {
    this.requireScope(scopeId);

    const timeline: Timeline = { scopeId, events: [], actions: [], decisions: [] };
    for (const fact of this.storage.queryFacts({ scopeId })) {
      const descriptor = await this.describe(fact);
      const entry: TimelineEntry = {
        id: fact.id,
        regionType: fact.regionType,
        start: fact.start,
        end: fact.end,
        description: descriptor?.description ?? unnamed(fact.ownerRef.kind),
        actorId: descriptor?.actorId ?? null,
        relationSummary: fact.relations.map(r => ({
          type: r.type,
          targetId: r.targetId,
          confidence: r.confidence,
          inferred: r.inferred,
        })),
        timelineOrder: fact.timelineOrder,
      };

      switch (fact.ownerRef.kind) {
        case 'event':
          timeline.events.push(entry);
          break;
        case 'action':
          timeline.actions.push(entry);
          break;
        case 'decision':
          timeline.decisions.push({
            ...entry,
            options: descriptor?.options ?? [],
            selectedOption: descriptor?.selectedOption ?? null,
          });
          break;
      }
    }
    return timeline;
  }

  /**
   * Render the scope as a plain-text context block
   */
  async getContext(scopeId: string, options: ContextOptions = {}): Promise<string> {
    this.requireScope(scopeId);

    const facts = this.storage.queryFacts({ scopeId });
    const byId = new Map(facts.map(fact => [fact.id, fact]));
    const descriptors = new Map<string, EntityDescriptor | null>();
    for (const fact of facts) {
      descriptors.set(fact.id, await this.describe(fact));
    }

    const lines: string[] = [SECTION_TEMPLATES.timeline.title, ''];
    for (const fact of facts) {
      lines.push(...this.renderEntry(fact, descriptors.get(fact.id) ?? null), '');
    }

    const allEdges = this.storage.relationsInScope(scopeId);
    const temporalLines = this.renderRelations(
      scopeId,
      this.pairedEdges(allEdges, byId),
      byId,
      descriptors,
      options,
    );

    lines.push(SECTION_TEMPLATES.relations.title, '');
    lines.push(...(temporalLines.length > 0 ? temporalLines : [SECTION_TEMPLATES.relations.empty]));

    if (options.includeCausal) {
      // Forward causal types only; a consequence pair shows as hasConsequence
      const causal = allEdges.filter(edge => isCausalRelation(edge.type));
      const causalLines = this.renderRelations(scopeId, causal, byId, descriptors, options);
      lines.push('', SECTION_TEMPLATES.causal.title, '');
      lines.push(...(causalLines.length > 0 ? causalLines : [SECTION_TEMPLATES.causal.empty]));
    }

    return lines.join('\n') + '\n';
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private requireScope(scopeId: string): void {
    if (!this.storage.getScope(scopeId)) {
      throw new NotFoundError(`Scope ${scopeId} not found`, { scopeId });
    }
  }

  private async describe(fact: TemporalFact): Promise<EntityDescriptor | null> {
    try {
      return await this.resolver.resolve(fact.ownerRef);
    } catch (error) {
      this.logger.warn('Entity resolution failed', {
        factId: fact.id,
        owner: `${fact.ownerRef.kind}:${fact.ownerRef.id}`,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private renderEntry(fact: TemporalFact, descriptor: EntityDescriptor | null): string[] {
    const kind = fact.ownerRef.kind;
    const description = descriptor?.description ?? unnamed(kind);
    const span = formatSpan(fact.start, fact.end, fact.regionType === 'interval');
    const lines = [`${kind.toUpperCase()} ${span}: ${description}`];

    const options = descriptor?.options ?? [];
    if (kind === 'decision' && options.length > 0) {
      lines.push(SECTION_TEMPLATES.options.title);
      for (const option of options) {
        const selected = option.label === descriptor?.selectedOption ? ' (SELECTED)' : '';
        const text = option.description ?? SECTION_TEMPLATES.options.noDescription;
        lines.push(`    - ${option.label}${selected}: ${text}`);
        if (option.ethicalPrinciples && option.ethicalPrinciples.length > 0) {
          lines.push(`      Ethical principles: ${option.ethicalPrinciples.join(', ')}`);
        }
      }
    }
    return lines;
  }

  /**
   * Drop the inverse half of each forward/inverse pair, keeping the
   * edge that starts at the chronologically earlier fact
   */
  private pairedEdges(edges: TemporalEdge[], byId: Map<string, TemporalFact>): TemporalEdge[] {
    const index = new Map<string, TemporalEdge>();
    for (const edge of edges) {
      index.set(`${edge.sourceId}|${edge.targetId}`, edge);
    }

    return edges.filter(edge => {
      const reverse = index.get(`${edge.targetId}|${edge.sourceId}`);
      if (!reverse || inverseOf(reverse.type) !== edge.type) return true;
      return !isEarlier(byId.get(edge.targetId), byId.get(edge.sourceId));
    });
  }

  private renderRelations(
    scopeId: string,
    edges: TemporalEdge[],
    byId: Map<string, TemporalFact>,
    descriptors: Map<string, EntityDescriptor | null>,
    options: ContextOptions,
  ): string[] {
    const lines: string[] = [];
    for (const edge of edges) {
      const source = byId.get(edge.sourceId);
      const target = byId.get(edge.targetId);
      const sourceDescriptor = descriptors.get(edge.sourceId);
      const targetDescriptor = descriptors.get(edge.targetId);

      if (!source || !target || !sourceDescriptor || !targetDescriptor) {
        this.logger.warn('RENDER_SKIPPED', {
          scopeId,
          sourceId: edge.sourceId,
          targetId: edge.targetId,
          relation: edge.type,
        });
        continue;
      }

      let line = generateRelationSentence(
        source.ownerRef.kind,
        sourceDescriptor.description,
        edge.type,
        target.ownerRef.kind,
        targetDescriptor.description,
      );
      if (options.includeConfidence && edge.inferred) {
        line += formatConfidence(edge.confidence);
      }
      lines.push(line);
    }
    return lines;
  }
}

/** Whether `a` comes before `b` by (start, id) */
function isEarlier(a: TemporalFact | undefined, b: TemporalFact | undefined): boolean {
  if (!a || !b) return false;
  const delta = a.start.getTime() - b.start.getTime();
  return delta < 0 || (delta === 0 && a.id < b.id);
}
