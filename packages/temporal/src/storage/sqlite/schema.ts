/**
 * SQLite Schema Definition
 *
 * Scopes own temporal facts; facts own their outgoing relations.
 * Deleting a scope cascades to its facts and their relations.
 */

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS scopes (
  id TEXT PRIMARY KEY,
  title TEXT,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS temporal_facts (
  id TEXT PRIMARY KEY,
  scope_id TEXT NOT NULL,
  owner_kind TEXT NOT NULL CHECK (owner_kind IN ('event', 'action', 'decision')),
  owner_id TEXT NOT NULL,
  region_type TEXT NOT NULL CHECK (region_type IN ('instant', 'interval')),
  start_time TEXT NOT NULL,  -- ISO 8601, UTC
  end_time TEXT,             -- NULL for instants and open intervals
  granularity TEXT NOT NULL CHECK (granularity IN (
    'seconds', 'minutes', 'hours', 'days', 'weeks', 'months', 'years'
  )),
  confidence REAL NOT NULL DEFAULT 1.0 CHECK (confidence >= 0 AND confidence <= 1),
  timeline_order INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,

  UNIQUE (scope_id, owner_kind, owner_id),
  CHECK (region_type = 'interval' OR end_time IS NULL),
  FOREIGN KEY (scope_id) REFERENCES scopes(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_facts_scope_start ON temporal_facts(scope_id, start_time, id);
CREATE INDEX IF NOT EXISTS idx_facts_owner ON temporal_facts(owner_kind, owner_id);

-- One relation per ordered pair of facts; rewriting a pair replaces it
CREATE TABLE IF NOT EXISTS temporal_relations (
  source_id TEXT NOT NULL,
  target_id TEXT NOT NULL,
  relation TEXT NOT NULL CHECK (relation IN (
    'precedes', 'follows', 'coincidesWith', 'overlaps',
    'necessitates', 'isNecessitatedBy', 'hasConsequence', 'isConsequenceOf',
    'causedBy', 'enabledBy', 'preventedBy'
  )),
  confidence REAL NOT NULL DEFAULT 1.0 CHECK (confidence >= 0 AND confidence <= 1),
  inferred INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,

  PRIMARY KEY (source_id, target_id),
  FOREIGN KEY (source_id) REFERENCES temporal_facts(id) ON DELETE CASCADE,
  FOREIGN KEY (target_id) REFERENCES temporal_facts(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_relations_target ON temporal_relations(target_id, relation);
`;
