// ============================================================
// Identity Graph Engine — Credential Decomposer
//
// Breaks a credential into atomic graph elements:
//   1. Subject (User) node, upserted
//   2. Credential node, BELONGS_TO the subject
//   3. One Claim node per flattened credentialSubject attribute
//   4. One SUPPORTS edge per claim (Credential → Claim)
//
// Store calls are independent. If a claim write fails midway the
// nodes already written stay in the graph and the error propagates.
// ============================================================

import { Inject, Injectable, Logger } from '@nestjs/common';
import { GRAPH_STORE, GraphStore } from '../graph/graph-store';
import {
  ClaimNode,
  CredentialNode,
  newClaimNode,
  newCredentialNode,
} from '../graph/graph.types';
import { extractClaims, stringifyClaimValue } from './claim-extractor';
import {
  Credential,
  SUBJECT_ID_KEY,
  getCredentialType,
  getIssuerId,
  getIssuerName,
  parseIssuanceDate,
} from './credential';

export interface DecompositionResult {
  credentialNode: CredentialNode;
  /** In extraction order. */
  claimNodes: ClaimNode[];
  /** SUPPORTS edges written; always equals claimNodes.length. */
  edgesCreated: number;
}

@Injectable()
export class CredentialDecomposer {
  private readonly logger = new Logger(CredentialDecomposer.name);

  constructor(@Inject(GRAPH_STORE) private readonly store: GraphStore) {}

  async decompose(
    credential: Credential,
    subjectId: string,
    eventId: string,
  ): Promise<DecompositionResult> {
    this.logger.log(`Decomposing credential for user ${subjectId}, event ${eventId}`);

    await this.store.upsertSubject(subjectId);

    let issuanceDate: Date | undefined;
    if (credential.issuanceDate) {
      issuanceDate = parseIssuanceDate(credential.issuanceDate);
      if (!issuanceDate) {
        this.logger.warn(`Could not parse issuance date: ${credential.issuanceDate}`);
      }
    }

    const credentialNode = newCredentialNode({
      issuer: getIssuerId(credential),
      issuerName: getIssuerName(credential),
      credentialType: getCredentialType(credential),
      issuanceDate,
      eventId,
    });
    await this.store.createCredentialNode(credentialNode, subjectId);
    this.logger.debug(`Created credential node: ${credentialNode.nodeId}`);

    const claimNodes: ClaimNode[] = [];
    let edgesCreated = 0;

    for (const [attribute, value] of extractClaims(credential.subject)) {
      if (attribute === SUBJECT_ID_KEY) continue;

      const claimNode = newClaimNode({
        attribute,
        value: stringifyClaimValue(value),
        confidence: 1.0,
      });

      await this.store.createClaimNode(claimNode);
      await this.store.createSupportsEdge(credentialNode.nodeId, claimNode.nodeId);

      claimNodes.push(claimNode);
      edgesCreated++;

      this.logger.debug(`Created claim: ${attribute} = ${claimNode.value}`);
    }

    this.logger.log(
      `Decomposition complete: ${claimNodes.length} claims, ${edgesCreated} edges created`,
    );

    return { credentialNode, claimNodes, edgesCreated };
  }
}
