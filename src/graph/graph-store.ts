// ============================================================
// Identity Graph Engine — GraphStore
//
// The persistence capability injected into the decomposer and
// the conflict detector. Each call is independent; callers get
// no transaction spanning several calls.
// ============================================================

import {
  ClaimNode,
  ConflictListing,
  CredentialNode,
  ExistingClaim,
  GraphNodeView,
  GraphStatistics,
  IdentityGraph,
  NodeType,
} from './graph.types';

/** Injection token for the active GraphStore implementation. */
export const GRAPH_STORE = Symbol('GRAPH_STORE');

export interface GraphStore {
  /** Create the User node if missing. Returns the subject id. */
  upsertSubject(subjectId: string): Promise<string>;

  /** Create a Credential node owned by the subject (BELONGS_TO). */
  createCredentialNode(credential: CredentialNode, subjectId: string): Promise<string>;

  createClaimNode(claim: ClaimNode): Promise<string>;

  /** Credential → Claim. Returns the new edge id. */
  createSupportsEdge(credentialId: string, claimId: string): Promise<string>;

  /** Claim → Claim. Returns the new edge id. */
  createContradictsEdge(claimAId: string, claimBId: string, confidence: number): Promise<string>;

  /**
   * Claims with this attribute reachable from the subject through
   * Claim -SUPPORTS-> Credential -BELONGS_TO-> User.
   */
  findExistingClaims(subjectId: string, attribute: string): Promise<ExistingClaim[]>;

  /** Every CONTRADICTS edge touching one of the subject's claims, oldest first. */
  getConflicts(subjectId: string): Promise<ConflictListing[]>;

  /** The subject, its credentials, their claims and the edges among them. */
  getUserGraph(subjectId: string): Promise<IdentityGraph>;

  getNode(nodeId: string): Promise<GraphNodeView | null>;

  countNodes(nodeType: NodeType): Promise<number>;

  getStatistics(): Promise<GraphStatistics>;
}

export class GraphStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphStoreError';
  }
}
