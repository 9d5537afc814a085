// ============================================================
// Identity Graph Engine — Graph Activity Feed
//
// In-process broadcaster behind GET /api/events/stream. The
// ledger and the ingest pipeline publish what happened to a
// user's graph; subscribers receive every activity or only
// those for one user.
// ============================================================

import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter } from 'events';

export interface EventReceivedData {
  event_id: string;
  user_id: string;
  source_type: string;
  checksum: string;
  received_at: string;
}

export interface EventSkippedData {
  event_id: string;
  user_id: string;
  source_type: string;
}

export interface CredentialDecomposedData {
  event_id: string;
  user_id: string;
  credential_id: string;
  credential_type: string;
  claims_created: number;
  conflicts_detected: number;
}

export interface ConflictDetectedData {
  user_id: string;
  conflict_id: string;
  attribute: string;
  claim_a_id: string;
  claim_a_value: string | null;
  claim_b_id: string;
  claim_b_value: string | null;
}

/** What a publisher hands to `publish`: the activity kind and its data. */
export type GraphActivityEvent =
  | { type: 'ingest.received'; data: EventReceivedData }
  | { type: 'ingest.skipped'; data: EventSkippedData }
  | { type: 'credential.decomposed'; data: CredentialDecomposedData }
  | { type: 'claim.conflict_detected'; data: ConflictDetectedData };

export type GraphActivityType = GraphActivityEvent['type'];

/** A published activity as subscribers see it. */
export type GraphActivity = GraphActivityEvent & { timestamp: string };

export interface ActivityFilter {
  /** Only activity concerning this user. */
  userId?: string;
}

const ACTIVITY = 'activity';

/** One Server-Sent Events frame: `event:` line, JSON `data:` line, blank line. */
export function toSseFrame(activity: GraphActivity): string {
  return `event: ${activity.type}\ndata: ${JSON.stringify(activity)}\n\n`;
}

@Injectable()
export class SseService {
  private readonly logger = new Logger(SseService.name);
  private readonly emitter = new EventEmitter();
  private clientCount = 0;

  constructor() {
    this.emitter.setMaxListeners(200);
  }

  /**
   * Subscribe to graph activity. Returns the unsubscribe function.
   */
  subscribe(listener: (activity: GraphActivity) => void, filter: ActivityFilter = {}): () => void {
    const { userId } = filter;
    const deliver = (activity: GraphActivity) => {
      if (userId === undefined || activity.data.user_id === userId) listener(activity);
    };

    this.emitter.on(ACTIVITY, deliver);
    this.clientCount++;
    this.logger.debug(
      `SSE client connected${userId ? ` for ${userId}` : ''} (${this.clientCount} total)`,
    );

    return () => {
      this.emitter.off(ACTIVITY, deliver);
      this.clientCount--;
      this.logger.debug(`SSE client disconnected (${this.clientCount} total)`);
    };
  }

  publish(event: GraphActivityEvent): void {
    const activity: GraphActivity = { ...event, timestamp: new Date().toISOString() };
    this.emitter.emit(ACTIVITY, activity);
  }

  getClientCount(): number {
    return this.clientCount;
  }
}
