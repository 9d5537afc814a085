// ============================================================
// Identity Graph Engine — Ingest Service
// Event processing pipeline
//
// One event is one sequential unit of work:
//   ledger → normalise (OIDC) → decompose → detect conflicts
//
// Supported source types:
//   VC    payload is a credential document
//   OIDC  payload is remapped into a credential first
// Anything else is logged and skipped without error.
//
// No per-subject lock: two events for the same user processed
// concurrently can race during conflict detection. Callers that
// need ordering must serialise per user themselves.
// ============================================================

import { Injectable, Logger, Optional } from '@nestjs/common';
import { EventsService } from '../events/events.service';
import { SseService } from '../sse/sse.service';
import { CredentialDecomposer } from '../credentials/decomposer.service';
import { ConflictDetector, Conflict } from '../conflicts/conflict-detector.service';
import { Credential, parseCredential, getCredentialType, getIssuerId } from '../credentials/credential';
import { normalizeOidcPayload } from '../credentials/oidc';
import { IngestionEvent, SourceType } from './ingestion-event';

export type ProcessingStatus = 'processed' | 'skipped';

export interface ProcessingOutcome {
  eventId: string;
  userId: string;
  sourceType: string;
  status: ProcessingStatus;
  /** False when the ledger already held this event id. */
  firstDelivery: boolean;
  credentialId: string | null;
  claimsCreated: number;
  edgesCreated: number;
  conflicts: Conflict[];
}

@Injectable()
export class IngestService {
  private readonly logger = new Logger(IngestService.name);

  constructor(
    private readonly events: EventsService,
    private readonly decomposer: CredentialDecomposer,
    private readonly detector: ConflictDetector,
    @Optional() private readonly sse?: SseService,
  ) {}

  // ────────────────────────────────────────────────────────────
  // PROCESS — Main entry point (queue consumer and HTTP ingest)
  // ────────────────────────────────────────────────────────────

  async process(event: IngestionEvent): Promise<ProcessingOutcome> {
    this.logger.log(
      `Processing event ${event.eventId} (type: ${event.sourceType}, user: ${event.userId})`,
    );

    const firstDelivery = await this.events.record(event);

    switch (event.sourceType) {
      case SourceType.VC:
        return this.processCredential(event, parseCredential(event.payload), firstDelivery);

      case SourceType.OIDC: {
        const document = normalizeOidcPayload(event.payload, event.timestamp?.toISOString());
        return this.processCredential(event, parseCredential(document), firstDelivery);
      }

      default:
        return this.skip(event, firstDelivery);
    }
  }

  // ────────────────────────────────────────────────────────────
  // CREDENTIAL — shared by VC and normalised OIDC events
  // ────────────────────────────────────────────────────────────

  private async processCredential(
    event: IngestionEvent,
    credential: Credential,
    firstDelivery: boolean,
  ): Promise<ProcessingOutcome> {
    this.logger.log(
      `Processing ${event.sourceType}: type=${getCredentialType(credential)}, issuer=${getIssuerId(credential)}`,
    );

    const result = await this.decomposer.decompose(credential, event.userId, event.eventId);
    const conflicts = await this.detector.detectConflicts(event.userId, result.claimNodes);

    if (this.sse) {
      this.sse.publish({
        type: 'credential.decomposed',
        data: {
          event_id: event.eventId,
          user_id: event.userId,
          credential_id: result.credentialNode.nodeId,
          credential_type: result.credentialNode.credentialType,
          claims_created: result.claimNodes.length,
          conflicts_detected: conflicts.length,
        },
      });
      for (const conflict of conflicts) {
        this.sse.publish({
          type: 'claim.conflict_detected',
          data: {
            user_id: event.userId,
            conflict_id: conflict.conflictId,
            attribute: conflict.attribute,
            claim_a_id: conflict.claimA.nodeId,
            claim_a_value: conflict.claimA.value,
            claim_b_id: conflict.claimB.nodeId,
            claim_b_value: conflict.claimB.value,
          },
        });
      }
    }

    this.logger.log(
      `${event.sourceType} processed: ${result.claimNodes.length} claims, ` +
        `${result.edgesCreated} edges, ${conflicts.length} conflicts`,
    );

    return {
      eventId: event.eventId,
      userId: event.userId,
      sourceType: event.sourceType,
      status: 'processed',
      firstDelivery,
      credentialId: result.credentialNode.nodeId,
      claimsCreated: result.claimNodes.length,
      edgesCreated: result.edgesCreated,
      conflicts,
    };
  }

  private skip(event: IngestionEvent, firstDelivery: boolean): ProcessingOutcome {
    this.logger.warn(`Unknown source type: ${event.sourceType} (event ${event.eventId} skipped)`);

    if (this.sse) {
      this.sse.publish({
        type: 'ingest.skipped',
        data: {
          event_id: event.eventId,
          user_id: event.userId,
          source_type: event.sourceType,
        },
      });
    }

    return {
      eventId: event.eventId,
      userId: event.userId,
      sourceType: event.sourceType,
      status: 'skipped',
      firstDelivery,
      credentialId: null,
      claimsCreated: 0,
      edgesCreated: 0,
      conflicts: [],
    };
  }
}
