// ============================================================
// Identity Graph Engine — Graph model
//
// Node and edge kinds of the identity graph, the node records
// the pipeline creates, and the read shapes the API returns.
// ============================================================

import { randomUUID } from 'crypto';

export enum NodeType {
  USER = 'User',
  FRAGMENT = 'Fragment',
  CREDENTIAL = 'Credential',
  CLAIM = 'Claim',
  CONTEXT = 'Context',
}

export enum EdgeType {
  /** Credential → Claim */
  SUPPORTS = 'SUPPORTS',
  /** Claim → Claim, same attribute with differing values */
  CONTRADICTS = 'CONTRADICTS',
  /** Claim → Credential */
  DERIVED_FROM = 'DERIVED_FROM',
  /** Fragment ~ Fragment (probabilistic link) */
  LIKELY_SAME = 'LIKELY_SAME',
  /** Fragment = Fragment (user confirmed) */
  CONFIRMED_SAME = 'CONFIRMED_SAME',
  /** Credential or Fragment → User */
  BELONGS_TO = 'BELONGS_TO',
  /** Claim → Claim (updated value) */
  TEMPORAL_SUCCESSOR = 'TEMPORAL_SUCCESSOR',
}

/** An atomic attribute/value assertion. Never mutated after creation. */
export interface ClaimNode {
  readonly nodeId: string;
  readonly attribute: string;
  /** Stringified source value; null when the source value was null. */
  readonly value: string | null;
  readonly confidence: number;
  readonly createdAt: Date;
}

export interface CredentialNode {
  readonly nodeId: string;
  readonly issuer: string;
  readonly issuerName?: string;
  readonly credentialType: string;
  readonly issuanceDate?: Date;
  /** Ingestion event this credential arrived in. */
  readonly eventId: string;
  readonly createdAt: Date;
}

/** A stored claim as returned by the existing-claims lookup. */
export interface ExistingClaim {
  nodeId: string;
  attribute: string;
  value: string | null;
}

/** One CONTRADICTS edge, as listed by the read API. */
export interface ConflictListing {
  conflictId: string;
  attribute: string;
  claimAId: string;
  claimAValue: string;
  claimBId: string;
  claimBValue: string;
}

export interface GraphNodeView {
  node_id: string;
  node_type: string;
  properties: Record<string, unknown>;
  created_at: string;
}

export interface GraphEdgeView {
  edge_id: string;
  edge_type: string;
  source_id: string;
  target_id: string;
  confidence: number;
  created_at: string;
}

export interface IdentityGraph {
  nodes: GraphNodeView[];
  edges: GraphEdgeView[];
}

export interface GraphStatistics {
  nodes: Record<string, number>;
  edges: Record<string, number>;
}

export function newClaimNode(params: {
  attribute: string;
  value: string | null;
  confidence?: number;
}): ClaimNode {
  return {
    nodeId: randomUUID(),
    attribute: params.attribute,
    value: params.value,
    confidence: params.confidence ?? 1.0,
    createdAt: new Date(),
  };
}

export function newCredentialNode(params: {
  issuer: string;
  issuerName?: string;
  credentialType: string;
  issuanceDate?: Date;
  eventId: string;
}): CredentialNode {
  return {
    nodeId: randomUUID(),
    ...params,
    createdAt: new Date(),
  };
}
