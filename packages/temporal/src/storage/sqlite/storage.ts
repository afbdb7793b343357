/**
 * SQLite Fact Storage Implementation
 *
 * Persists temporal facts and relations to SQLite.
 *
 * @module storage/sqlite/storage
 */

import type {
  OwnerRef,
  RelationType,
  ScopeRecord,
  TemporalEdge,
  TemporalFact,
  TemporalRelation,
} from '../../types/temporal.js';
import { isEntityKind, isGranularity } from '../../types/temporal.js';
import { isRelationType } from '../../relations/relation-types.js';
import type { FactQuery, FactWrite, IFactStorage } from '../interface.js';
import { SQLiteClient, type SQLiteClientConfig } from './client.js';
import { SCHEMA } from './schema.js';

/**
 * Row types from database
 */
interface FactRow {
  id: string;
  scope_id: string;
  owner_kind: string;
  owner_id: string;
  region_type: string;
  start_time: string;
  end_time: string | null;
  granularity: string;
  confidence: number;
  timeline_order: number | null;
  created_at: string;
  updated_at: string;
}

interface RelationRow {
  source_id: string;
  target_id: string;
  relation: string;
  confidence: number;
  inferred: number;
  created_at: string;
}

interface ScopeRow {
  id: string;
  title: string | null;
  created_at: string;
  fact_count: number;
}

/**
 * SQLite implementation of fact storage
 */
export class SQLiteFactStorage implements IFactStorage {
  private client: SQLiteClient;
  private initialized = false;

  constructor(config: SQLiteClientConfig | string) {
    this.client = new SQLiteClient(typeof config === 'string' ? { dbPath: config } : config);
  }

  initialize(): void {
    if (this.initialized) return;

    this.client.exec(SCHEMA);
    this.initialized = true;
  }

  close(): void {
    this.client.close();
    this.initialized = false;
  }

  transaction<T>(fn: () => T): T {
    return this.client.transaction(fn);
  }

  // ==========================================================================
  // Scopes
  // ==========================================================================

  ensureScope(scopeId: string, title?: string | undefined): void {
    this.client
      .prepare('INSERT OR IGNORE INTO scopes (id, title, created_at) VALUES (?, ?, ?)')
      .run(scopeId, title ?? null, new Date().toISOString());

    if (title !== undefined) {
      this.client.prepare('UPDATE scopes SET title = ? WHERE id = ?').run(title, scopeId);
    }
  }

  getScope(scopeId: string): ScopeRecord | null {
    const row = this.client
      .prepare(`
        SELECT s.id, s.title, s.created_at, COUNT(f.id) AS fact_count
        FROM scopes s LEFT JOIN temporal_facts f ON f.scope_id = s.id
        WHERE s.id = ?
        GROUP BY s.id
      `)
      .get(scopeId) as ScopeRow | undefined;

    return row ? this.rowToScope(row) : null;
  }

  listScopes(): ScopeRecord[] {
    const rows = this.client
      .prepare(`
        SELECT s.id, s.title, s.created_at, COUNT(f.id) AS fact_count
        FROM scopes s LEFT JOIN temporal_facts f ON f.scope_id = s.id
        GROUP BY s.id
        ORDER BY s.id
      `)
      .all() as ScopeRow[];

    return rows.map(row => this.rowToScope(row));
  }

  deleteScope(scopeId: string): number {
    return this.transaction(() => {
      const { count } = this.client
        .prepare('SELECT COUNT(*) AS count FROM temporal_facts WHERE scope_id = ?')
        .get(scopeId) as { count: number };

      this.client.prepare('DELETE FROM scopes WHERE id = ?').run(scopeId);
      return count;
    });
  }

  // ==========================================================================
  // Facts
  // ==========================================================================

  getFact(id: string): TemporalFact | null {
    const row = this.client
      .prepare('SELECT * FROM temporal_facts WHERE id = ?')
      .get(id) as FactRow | undefined;

    return row ? this.rowToFact(row, this.relationsFrom(row.id)) : null;
  }

  getFactByOwner(ownerRef: OwnerRef, scopeId: string): TemporalFact | null {
    const row = this.client
      .prepare('SELECT * FROM temporal_facts WHERE scope_id = ? AND owner_kind = ? AND owner_id = ?')
      .get(scopeId, ownerRef.kind, ownerRef.id) as FactRow | undefined;

    return row ? this.rowToFact(row, this.relationsFrom(row.id)) : null;
  }

  writeFact(fact: FactWrite): string {
    const now = new Date().toISOString();
    const startTime = fact.start.toISOString();
    const endTime = fact.end ? fact.end.toISOString() : null;

    return this.transaction(() => {
      const existing = this.client
        .prepare('SELECT id FROM temporal_facts WHERE scope_id = ? AND owner_kind = ? AND owner_id = ?')
        .get(fact.scopeId, fact.ownerRef.kind, fact.ownerRef.id) as { id: string } | undefined;

      if (existing) {
        this.client
          .prepare(`
            UPDATE temporal_facts
            SET region_type = ?, start_time = ?, end_time = ?, granularity = ?,
                confidence = ?, timeline_order = NULL, updated_at = ?
            WHERE id = ?
          `)
          .run(fact.regionType, startTime, endTime, fact.granularity, fact.confidence, now, existing.id);
        return existing.id;
      }

      this.client
        .prepare(`
          INSERT INTO temporal_facts (
            id, scope_id, owner_kind, owner_id, region_type, start_time, end_time,
            granularity, confidence, timeline_order, created_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, NULL, ?, ?)
        `)
        .run(
          fact.id,
          fact.scopeId,
          fact.ownerRef.kind,
          fact.ownerRef.id,
          fact.regionType,
          startTime,
          endTime,
          fact.granularity,
          fact.confidence,
          now,
          now,
        );
      return fact.id;
    });
  }

  queryFacts(query: FactQuery): TemporalFact[] {
    const conditions = ['scope_id = ?'];
    const params: unknown[] = [query.scopeId];

    if (query.kinds && query.kinds.length > 0) {
      conditions.push(`owner_kind IN (${query.kinds.map(() => '?').join(', ')})`);
      params.push(...query.kinds);
    }

    if (query.frame) {
      const frameStart = query.frame.start.toISOString();
      const frameEnd = query.frame.end.toISOString();
      conditions.push(`start_time <= ?`);
      conditions.push(`(
        (region_type = 'instant' AND start_time >= ?) OR
        (region_type = 'interval' AND (end_time IS NULL OR end_time >= ?))
      )`);
      params.push(frameEnd, frameStart, frameStart);
    }

    let sql = `SELECT * FROM temporal_facts WHERE ${conditions.join(' AND ')} ORDER BY start_time, id`;
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    const rows = this.client.prepare(sql).all(...params) as FactRow[];
    if (rows.length === 0) return [];

    const bySource = new Map<string, TemporalRelation[]>();
    for (const edge of this.relationsInScope(query.scopeId)) {
      const list = bySource.get(edge.sourceId) ?? [];
      list.push(this.edgeToRelation(edge));
      bySource.set(edge.sourceId, list);
    }

    return rows.map(row => this.rowToFact(row, bySource.get(row.id) ?? []));
  }

  setTimelineOrder(assignments: ReadonlyMap<string, number>): void {
    const stmt = this.client.prepare('UPDATE temporal_facts SET timeline_order = ? WHERE id = ?');

    this.transaction(() => {
      for (const [id, order] of assignments) {
        stmt.run(order, id);
      }
    });
  }

  // ==========================================================================
  // Relations
  // ==========================================================================

  putRelation(edge: TemporalEdge): void {
    this.client
      .prepare(`
        INSERT OR REPLACE INTO temporal_relations
          (source_id, target_id, relation, confidence, inferred, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(
        edge.sourceId,
        edge.targetId,
        edge.type,
        edge.confidence,
        edge.inferred ? 1 : 0,
        edge.createdAt,
      );
  }

  relationsTo(factId: string, type?: RelationType | undefined): TemporalEdge[] {
    const params: unknown[] = [factId];
    let sql = `
      SELECT r.* FROM temporal_relations r
      JOIN temporal_facts s ON s.id = r.source_id
      WHERE r.target_id = ?
    `;
    if (type !== undefined) {
      sql += ' AND r.relation = ?';
      params.push(type);
    }
    sql += ' ORDER BY s.start_time, s.id';

    const rows = this.client.prepare(sql).all(...params) as RelationRow[];
    return rows.map(row => this.rowToEdge(row));
  }

  relationsInScope(scopeId: string): TemporalEdge[] {
    const rows = this.client
      .prepare(`
        SELECT r.* FROM temporal_relations r
        JOIN temporal_facts s ON s.id = r.source_id
        JOIN temporal_facts t ON t.id = r.target_id
        WHERE s.scope_id = ?
        ORDER BY s.start_time, s.id, t.start_time, t.id
      `)
      .all(scopeId) as RelationRow[];

    return rows.map(row => this.rowToEdge(row));
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private relationsFrom(factId: string): TemporalRelation[] {
    const rows = this.client
      .prepare(`
        SELECT r.* FROM temporal_relations r
        JOIN temporal_facts t ON t.id = r.target_id
        WHERE r.source_id = ?
        ORDER BY t.start_time, t.id
      `)
      .all(factId) as RelationRow[];

    return rows.map(row => this.edgeToRelation(this.rowToEdge(row)));
  }

  private rowToFact(row: FactRow, relations: TemporalRelation[]): TemporalFact {
    if (!isEntityKind(row.owner_kind)) {
      throw new Error(`Corrupt fact ${row.id}: unknown owner kind '${row.owner_kind}'`);
    }
    if (!isGranularity(row.granularity)) {
      throw new Error(`Corrupt fact ${row.id}: unknown granularity '${row.granularity}'`);
    }

    const base = {
      id: row.id,
      ownerRef: { kind: row.owner_kind, id: row.owner_id },
      scopeId: row.scope_id,
      granularity: row.granularity,
      confidence: row.confidence,
      relations,
      timelineOrder: row.timeline_order,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
    const start = new Date(row.start_time);

    switch (row.region_type) {
      case 'instant':
        return { ...base, regionType: 'instant', start, end: null };
      case 'interval':
        return {
          ...base,
          regionType: 'interval',
          start,
          end: row.end_time !== null ? new Date(row.end_time) : null,
        };
      default:
        throw new Error(`Corrupt fact ${row.id}: unknown region type '${row.region_type}'`);
    }
  }

  private rowToEdge(row: RelationRow): TemporalEdge {
    if (!isRelationType(row.relation)) {
      throw new Error(`Corrupt relation ${row.source_id} -> ${row.target_id}: '${row.relation}'`);
    }

    return {
      sourceId: row.source_id,
      targetId: row.target_id,
      type: row.relation,
      confidence: row.confidence,
      inferred: row.inferred === 1,
      createdAt: row.created_at,
    };
  }

  private edgeToRelation(edge: TemporalEdge): TemporalRelation {
    return {
      type: edge.type,
      targetId: edge.targetId,
      confidence: edge.confidence,
      inferred: edge.inferred,
      createdAt: edge.createdAt,
    };
  }

  private rowToScope(row: ScopeRow): ScopeRecord {
    return {
      id: row.id,
      title: row.title,
      createdAt: row.created_at,
      factCount: row.fact_count,
    };
  }
}
