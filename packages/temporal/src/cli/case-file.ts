/**
 * Case File
 *
 * A JSON description of one case: the entities it mentions, when each
 * happened, and any relations asserted between them. Loading a case
 * replays it into a fresh in-memory timeline.
 */

import * as fs from 'node:fs/promises';

import { z } from 'zod';

import type { CasetimeConfig } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import type { OwnerRef } from '../types/temporal.js';
import { NotFoundError, ValidationError, formatOwnerRef } from '../errors.js';
import { StaticEntityResolver } from '../resolvers/static.js';
import { TimelineService } from '../service/timeline-service.js';
import { createInMemoryFactStorage } from '../storage/factory.js';

const kindSchema = z.enum(['event', 'action', 'decision']);

const ownerRefSchema = z.object({
  kind: kindSchema,
  id: z.string().min(1),
});

const entitySchema = z.object({
  kind: kindSchema,
  id: z.string().min(1),
  description: z.string(),
  actorId: z.string().optional(),
  options: z
    .array(
      z.object({
        label: z.string().min(1),
        description: z.string().optional(),
        ethicalPrinciples: z.array(z.string()).optional(),
      }),
    )
    .optional(),
  selectedOption: z.string().optional(),
});

const factSchema = z.object({
  kind: kindSchema,
  id: z.string().min(1),
  start: z.string().min(1),
  end: z.string().min(1).nullable().optional(),
  regionType: z.enum(['instant', 'interval']).optional(),
  granularity: z.enum(['seconds', 'minutes', 'hours', 'days', 'weeks', 'months', 'years']).optional(),
  confidence: z.number().optional(),
});

const relationSchema = z.object({
  from: ownerRefSchema,
  to: ownerRefSchema,
  type: z.string().min(1),
  confidence: z.number().optional(),
});

export const caseFileSchema = z.object({
  scope: z.string().min(1),
  title: z.string().optional(),
  entities: z.array(entitySchema).default([]),
  facts: z.array(factSchema).default([]),
  relations: z.array(relationSchema).default([]),
});

export type CaseFile = z.infer<typeof caseFileSchema>;

export interface LoadedCase {
  service: TimelineService;
  scopeId: string;
  title: string | null;
}

/**
 * Read and validate a case file
 */
export async function readCaseFile(filePath: string): Promise<CaseFile> {
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      `Cannot read case file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = caseFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
    throw new ValidationError(`Invalid case file ${filePath} (${where})`);
  }
  return parsed.data;
}

/**
 * Replay a case into a new in-memory timeline service
 */
export async function loadCase(
  caseFile: CaseFile,
  config: CasetimeConfig,
  logger: Logger,
): Promise<LoadedCase> {
  const resolver = new StaticEntityResolver();
  for (const entity of caseFile.entities) {
    resolver.register(
      { kind: entity.kind, id: entity.id },
      {
        description: entity.description,
        actorId: entity.actorId,
        options: entity.options,
        selectedOption: entity.selectedOption,
      },
    );
  }

  const service = new TimelineService({
    storage: createInMemoryFactStorage(),
    resolver,
    logger,
    config,
  });
  const scopeId = caseFile.scope;
  service.store.registerScope(scopeId, caseFile.title);

  try {
    const factIds = new Map<string, string>();
    for (const fact of caseFile.facts) {
      const ownerRef: OwnerRef = { kind: fact.kind, id: fact.id };
      const regionType = fact.regionType ?? (fact.end !== undefined ? 'interval' : 'instant');
      const id = await service.store.upsertFact({
        ownerRef,
        scopeId,
        regionType,
        start: new Date(fact.start),
        end: fact.end === undefined || fact.end === null ? null : new Date(fact.end),
        granularity: fact.granularity,
        confidence: fact.confidence,
      });
      factIds.set(formatOwnerRef(ownerRef), id);
    }

    for (const relation of caseFile.relations) {
      service.graph.createRelation(
        requireFactId(factIds, relation.from, scopeId),
        requireFactId(factIds, relation.to, scopeId),
        relation.type,
        { confidence: relation.confidence },
      );
    }
  } catch (error) {
    service.close();
    throw error;
  }

  logger.debug('Loaded case', {
    scopeId,
    entities: caseFile.entities.length,
    facts: caseFile.facts.length,
    relations: caseFile.relations.length,
  });
  return { service, scopeId, title: caseFile.title ?? null };
}

function requireFactId(factIds: Map<string, string>, ownerRef: OwnerRef, scopeId: string): string {
  const id = factIds.get(formatOwnerRef(ownerRef));
  if (!id) {
    throw new NotFoundError(`No fact recorded for ${formatOwnerRef(ownerRef)}`, { scopeId, ownerRef });
  }
  return id;
}
