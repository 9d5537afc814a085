// ============================================================
// Identity Graph Engine — Conflict Detector
//
// A conflict is two claims of one subject with the same
// attribute and different values. Each one found gets a
// CONTRADICTS edge (new claim → existing claim).
//
// Edges are not deduplicated: running detection twice over the
// same claims writes the edges twice. Conflict data is a log.
// ============================================================

import { Inject, Injectable, Logger } from '@nestjs/common';
import { GRAPH_STORE, GraphStore } from '../graph/graph-store';
import { ClaimNode, ConflictListing } from '../graph/graph.types';

export interface ClaimSnapshot {
  nodeId: string;
  attribute: string;
  value: string | null;
}

export interface Conflict {
  /** Id of the CONTRADICTS edge. */
  conflictId: string;
  attribute: string;
  /** The newly created claim. */
  claimA: ClaimSnapshot;
  /** The claim already in the graph. */
  claimB: ClaimSnapshot;
  detectedAt: Date;
}

export interface ConflictResolution {
  conflict_id: string;
  preferred_claim_id: string;
  resolved: true;
  /** Preference storage does not exist yet; nothing is written. */
  persisted: false;
}

/** Comparison text of a stored value; absent compares as ''. */
function valueText(value: string | null | undefined): string {
  return value ?? '';
}

@Injectable()
export class ConflictDetector {
  private readonly logger = new Logger(ConflictDetector.name);

  constructor(@Inject(GRAPH_STORE) private readonly store: GraphStore) {}

  async detectConflicts(subjectId: string, newClaims: readonly ClaimNode[]): Promise<Conflict[]> {
    const conflicts: Conflict[] = [];

    for (const newClaim of newClaims) {
      const existing = await this.store.findExistingClaims(subjectId, newClaim.attribute);

      for (const existingClaim of existing) {
        // The new claim is already stored, so the lookup returns it too
        if (existingClaim.nodeId === newClaim.nodeId) continue;

        const existingValue = valueText(existingClaim.value);
        const newValue = valueText(newClaim.value);
        if (existingValue === newValue) continue;

        const edgeId = await this.store.createContradictsEdge(
          newClaim.nodeId,
          existingClaim.nodeId,
          1.0,
        );

        conflicts.push({
          conflictId: edgeId,
          attribute: newClaim.attribute,
          claimA: {
            nodeId: newClaim.nodeId,
            attribute: newClaim.attribute,
            value: newClaim.value,
          },
          claimB: {
            nodeId: existingClaim.nodeId,
            attribute: existingClaim.attribute,
            value: existingClaim.value,
          },
          detectedAt: new Date(),
        });

        this.logger.warn(
          `Conflict detected: ${newClaim.attribute} = '${newValue}' vs '${existingValue}'`,
        );
      }
    }

    if (conflicts.length > 0) {
      this.logger.log(`Detected ${conflicts.length} conflicts for user ${subjectId}`);
    }

    return conflicts;
  }

  async getUserConflicts(subjectId: string): Promise<ConflictListing[]> {
    return this.store.getConflicts(subjectId);
  }

  /**
   * Mark one claim of a conflict as preferred.
   *
   * Not implemented: the request is logged and acknowledged, and no
   * preference is stored. Callers must not rely on it being read back.
   */
  async resolveConflict(
    conflictId: string,
    preferredClaimId: string,
  ): Promise<ConflictResolution> {
    this.logger.log(`Resolving conflict ${conflictId}, preferred: ${preferredClaimId}`);
    return {
      conflict_id: conflictId,
      preferred_claim_id: preferredClaimId,
      resolved: true,
      persisted: false,
    };
  }
}
