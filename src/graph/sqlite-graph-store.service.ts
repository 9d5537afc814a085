// ============================================================
// Identity Graph Engine — SQLite GraphStore
//
// Property-graph persistence on better-sqlite3. Node properties
// are a JSON bag; claim lookups go through the expression index
// on json_extract(properties, '$.attribute').
// ============================================================

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { DatabaseService } from '../database.service';
import { GraphStore, GraphStoreError } from './graph-store';
import {
  ClaimNode,
  ConflictListing,
  CredentialNode,
  EdgeType,
  ExistingClaim,
  GraphEdgeView,
  GraphNodeView,
  GraphStatistics,
  IdentityGraph,
  NodeType,
} from './graph.types';

interface NodeRow {
  node_id: string;
  node_type: string;
  properties: string;
  created_at: string;
}

interface EdgeRow {
  edge_id: string;
  edge_type: string;
  source_id: string;
  target_id: string;
  confidence: number;
  created_at: string;
}

interface CountRow {
  type: string;
  count: number;
}

/** True when the claim at `column` is supported by a credential owned by @subjectId. */
function ownedClaim(column: string): string {
  return `EXISTS (
    SELECT 1 FROM edges s
    JOIN edges b ON b.source_id = s.source_id
      AND b.edge_type = '${EdgeType.BELONGS_TO}'
      AND b.target_id = @subjectId
    WHERE s.target_id = ${column} AND s.edge_type = '${EdgeType.SUPPORTS}'
  )`;
}

/** The subject, the credentials it owns, and the claims those credentials support. */
const MEMBERS_CTE = `
  WITH owned AS (
    SELECT source_id AS node_id FROM edges
    WHERE edge_type = '${EdgeType.BELONGS_TO}' AND target_id = @subjectId
  ),
  supported AS (
    SELECT e.target_id AS node_id FROM edges e
    JOIN owned o ON o.node_id = e.source_id
    WHERE e.edge_type = '${EdgeType.SUPPORTS}'
  ),
  members AS (
    SELECT @subjectId AS node_id
    UNION SELECT node_id FROM owned
    UNION SELECT node_id FROM supported
  )`;

function parseProperties(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toNodeView(row: NodeRow): GraphNodeView {
  return {
    node_id: row.node_id,
    node_type: row.node_type,
    properties: parseProperties(row.properties),
    created_at: row.created_at,
  };
}

function toEdgeView(row: EdgeRow): GraphEdgeView {
  return { ...row };
}

@Injectable()
export class SqliteGraphStore implements GraphStore {
  private readonly logger = new Logger(SqliteGraphStore.name);

  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.connection;
  }

  // ── NODES ─────────────────────────────────────────────────

  async upsertSubject(subjectId: string): Promise<string> {
    const result = this.db
      .prepare<[string, string, string]>(
        `INSERT INTO nodes (node_id, node_type, properties, created_at)
         VALUES (?, ?, '{}', ?)
         ON CONFLICT (node_id) DO NOTHING`,
      )
      .run(subjectId, NodeType.USER, new Date().toISOString());

    if (result.changes > 0) {
      this.logger.debug(`Created subject node ${subjectId}`);
    }
    return subjectId;
  }

  async createCredentialNode(credential: CredentialNode, subjectId: string): Promise<string> {
    const insert = this.db.transaction(() => {
      this.requireNode(subjectId, NodeType.USER);
      this.insertNode(credential.nodeId, NodeType.CREDENTIAL, credential.createdAt, {
        issuer: credential.issuer,
        issuer_name: credential.issuerName ?? null,
        credential_type: credential.credentialType,
        issuance_date: credential.issuanceDate?.toISOString() ?? null,
        event_id: credential.eventId,
      });
      this.insertEdge(EdgeType.BELONGS_TO, credential.nodeId, subjectId, 1.0);
    });
    insert();
    return credential.nodeId;
  }

  async createClaimNode(claim: ClaimNode): Promise<string> {
    this.insertNode(claim.nodeId, NodeType.CLAIM, claim.createdAt, {
      attribute: claim.attribute,
      value: claim.value,
      confidence: claim.confidence,
    });
    return claim.nodeId;
  }

  // ── EDGES ─────────────────────────────────────────────────

  async createSupportsEdge(credentialId: string, claimId: string): Promise<string> {
    this.requireNode(credentialId, NodeType.CREDENTIAL);
    this.requireNode(claimId, NodeType.CLAIM);
    return this.insertEdge(EdgeType.SUPPORTS, credentialId, claimId, 1.0);
  }

  async createContradictsEdge(
    claimAId: string,
    claimBId: string,
    confidence: number,
  ): Promise<string> {
    this.requireNode(claimAId, NodeType.CLAIM);
    this.requireNode(claimBId, NodeType.CLAIM);
    return this.insertEdge(EdgeType.CONTRADICTS, claimAId, claimBId, confidence);
  }

  // ── QUERIES ───────────────────────────────────────────────

  async findExistingClaims(subjectId: string, attribute: string): Promise<ExistingClaim[]> {
    return this.db
      .prepare<{ subjectId: string; attribute: string }, ExistingClaim>(
        `SELECT c.node_id AS nodeId,
                json_extract(c.properties, '$.attribute') AS attribute,
                json_extract(c.properties, '$.value') AS value
         FROM nodes c
         WHERE c.node_type = '${NodeType.CLAIM}'
           AND json_extract(c.properties, '$.attribute') = @attribute
           AND ${ownedClaim('c.node_id')}
         ORDER BY c.created_at, c.rowid`,
      )
      .all({ subjectId, attribute });
  }

  async getConflicts(subjectId: string): Promise<ConflictListing[]> {
    const rows = this.db
      .prepare<
        { subjectId: string },
        {
          conflictId: string;
          attribute: string;
          claimAId: string;
          claimAValue: string | null;
          claimBId: string;
          claimBValue: string | null;
        }
      >(
        `SELECT r.edge_id AS conflictId,
                json_extract(a.properties, '$.attribute') AS attribute,
                a.node_id AS claimAId,
                json_extract(a.properties, '$.value') AS claimAValue,
                b.node_id AS claimBId,
                json_extract(b.properties, '$.value') AS claimBValue
         FROM edges r
         JOIN nodes a ON a.node_id = r.source_id
         JOIN nodes b ON b.node_id = r.target_id
         WHERE r.edge_type = '${EdgeType.CONTRADICTS}'
           AND (${ownedClaim('a.node_id')} OR ${ownedClaim('b.node_id')})
         ORDER BY r.created_at, r.rowid`,
      )
      .all({ subjectId });

    return rows.map((r) => ({
      ...r,
      claimAValue: r.claimAValue ?? '',
      claimBValue: r.claimBValue ?? '',
    }));
  }

  async getUserGraph(subjectId: string): Promise<IdentityGraph> {
    const nodes = this.db
      .prepare<{ subjectId: string }, NodeRow>(
        `${MEMBERS_CTE}
         SELECT n.node_id, n.node_type, n.properties, n.created_at
         FROM nodes n JOIN members m ON m.node_id = n.node_id
         ORDER BY n.created_at, n.rowid`,
      )
      .all({ subjectId });

    if (nodes.length === 0) {
      return { nodes: [], edges: [] };
    }

    const edges = this.db
      .prepare<{ subjectId: string }, EdgeRow>(
        `${MEMBERS_CTE}
         SELECT e.edge_id, e.edge_type, e.source_id, e.target_id, e.confidence, e.created_at
         FROM edges e
         WHERE e.source_id IN (SELECT node_id FROM members)
           AND e.target_id IN (SELECT node_id FROM members)
         ORDER BY e.created_at, e.rowid`,
      )
      .all({ subjectId });

    return {
      nodes: nodes.map(toNodeView),
      edges: edges.map(toEdgeView),
    };
  }

  async getNode(nodeId: string): Promise<GraphNodeView | null> {
    const row = this.db
      .prepare<[string], NodeRow>(
        `SELECT node_id, node_type, properties, created_at FROM nodes WHERE node_id = ?`,
      )
      .get(nodeId);
    return row ? toNodeView(row) : null;
  }

  async countNodes(nodeType: NodeType): Promise<number> {
    const row = this.db
      .prepare<[string], { count: number }>(
        `SELECT COUNT(*) AS count FROM nodes WHERE node_type = ?`,
      )
      .get(nodeType);
    return row?.count ?? 0;
  }

  async getStatistics(): Promise<GraphStatistics> {
    const nodeRows = this.db
      .prepare<[], CountRow>(
        `SELECT node_type AS type, COUNT(*) AS count FROM nodes GROUP BY node_type ORDER BY node_type`,
      )
      .all();
    const edgeRows = this.db
      .prepare<[], CountRow>(
        `SELECT edge_type AS type, COUNT(*) AS count FROM edges GROUP BY edge_type ORDER BY edge_type`,
      )
      .all();

    const toCounts = (rows: CountRow[]) =>
      Object.fromEntries(rows.map((r) => [r.type, r.count]));

    return { nodes: toCounts(nodeRows), edges: toCounts(edgeRows) };
  }

  // ── HELPERS ───────────────────────────────────────────────

  private requireNode(nodeId: string, nodeType: NodeType): void {
    const row = this.db
      .prepare<[string], { node_type: string }>(`SELECT node_type FROM nodes WHERE node_id = ?`)
      .get(nodeId);
    if (!row || row.node_type !== nodeType) {
      throw new GraphStoreError(`${nodeType} node not found: ${nodeId}`);
    }
  }

  private insertNode(
    nodeId: string,
    nodeType: NodeType,
    createdAt: Date,
    properties: Record<string, unknown>,
  ): void {
    this.db
      .prepare<[string, string, string, string]>(
        `INSERT INTO nodes (node_id, node_type, properties, created_at) VALUES (?, ?, ?, ?)`,
      )
      .run(nodeId, nodeType, JSON.stringify(properties), createdAt.toISOString());
  }

  private insertEdge(
    edgeType: EdgeType,
    sourceId: string,
    targetId: string,
    confidence: number,
  ): string {
    const edgeId = randomUUID();
    this.db
      .prepare<[string, string, string, string, number, string]>(
        `INSERT INTO edges (edge_id, edge_type, source_id, target_id, confidence, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(edgeId, edgeType, sourceId, targetId, confidence, new Date().toISOString());
    return edgeId;
  }
}
