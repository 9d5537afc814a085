// ============================================================
// Identity Graph Engine — SQLite schema
//
// The property graph lives in two tables: `nodes` carries the
// node kind plus a JSON property bag, `edges` the typed links.
// `ingestion_events` is the append-only ledger of received
// events.
// ============================================================

export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS nodes (
  node_id     TEXT PRIMARY KEY,
  node_type   TEXT NOT NULL,
  properties  TEXT NOT NULL DEFAULT '{}',
  created_at  TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_nodes_type ON nodes (node_type);

CREATE INDEX IF NOT EXISTS idx_claim_attribute
  ON nodes (json_extract(properties, '$.attribute'))
  WHERE node_type = 'Claim';

CREATE TABLE IF NOT EXISTS edges (
  edge_id     TEXT PRIMARY KEY,
  edge_type   TEXT NOT NULL,
  source_id   TEXT NOT NULL REFERENCES nodes (node_id),
  target_id   TEXT NOT NULL REFERENCES nodes (node_id),
  confidence  REAL NOT NULL DEFAULT 1.0,
  created_at  TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_edges_source ON edges (source_id, edge_type);
CREATE INDEX IF NOT EXISTS idx_edges_target ON edges (target_id, edge_type);

CREATE TABLE IF NOT EXISTS ingestion_events (
  event_id     TEXT PRIMARY KEY,
  user_id      TEXT NOT NULL,
  source_type  TEXT NOT NULL,
  raw_payload  TEXT NOT NULL,
  checksum     TEXT NOT NULL,
  received_at  TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_ingestion_events_user
  ON ingestion_events (user_id, received_at DESC);
`;
