// ============================================================
// Identity Graph Engine — Events Service
// Append-Only Ingestion Ledger
//
// One row per received event id, with a SHA-256 checksum of the
// payload. Redeliveries of an event already on record are
// recognised and not written again.
// ============================================================

import { Injectable, Logger, Optional } from '@nestjs/common';
import { createHash } from 'crypto';
import { DatabaseService } from '../database.service';
import { SseService } from '../sse/sse.service';
import { IngestionEvent } from '../ingest/ingestion-event';
import { stringifyJson } from '../common/json';

interface LedgerRow {
  event_id: string;
  user_id: string;
  source_type: string;
  raw_payload: string;
  checksum: string;
  received_at: string;
}

export interface LedgerEntry {
  event_id: string;
  user_id: string;
  source_type: string;
  payload: unknown;
  checksum: string;
  received_at: string;
}

// raw_payload keeps large integers exact; the API view reads them
// back as plain JSON numbers so responses stay serialisable.
function toEntry(row: LedgerRow): LedgerEntry {
  const { raw_payload, ...rest } = row;
  return { ...rest, payload: JSON.parse(raw_payload) };
}

export function payloadChecksum(rawPayload: string): string {
  return createHash('sha256').update(rawPayload).digest('hex');
}

@Injectable()
export class EventsService {
  private readonly logger = new Logger(EventsService.name);

  constructor(
    private readonly database: DatabaseService,
    @Optional() private readonly sse?: SseService,
  ) {}

  /**
   * Record a received event. Returns false when the event id was
   * already on the ledger (a redelivery).
   */
  async record(event: IngestionEvent): Promise<boolean> {
    const rawPayload = stringifyJson(event.payload);
    const checksum = payloadChecksum(rawPayload);
    const receivedAt = new Date().toISOString();

    const result = this.database.connection
      .prepare<[string, string, string, string, string, string]>(
        `INSERT INTO ingestion_events (event_id, user_id, source_type, raw_payload, checksum, received_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (event_id) DO NOTHING`,
      )
      .run(event.eventId, event.userId, event.sourceType, rawPayload, checksum, receivedAt);

    if (result.changes === 0) {
      this.logger.debug(`Event already on ledger: ${event.eventId}`);
      return false;
    }

    this.logger.debug(
      `Event recorded: ${event.eventId} (${event.sourceType}) for ${event.userId}`,
    );

    if (this.sse) {
      this.sse.publish({
        type: 'ingest.received',
        data: {
          event_id: event.eventId,
          user_id: event.userId,
          source_type: event.sourceType,
          checksum,
          received_at: receivedAt,
        },
      });
    }

    return true;
  }

  async getEvent(eventId: string): Promise<LedgerEntry | null> {
    const row = this.database.connection
      .prepare<[string], LedgerRow>(`SELECT * FROM ingestion_events WHERE event_id = ?`)
      .get(eventId);
    return row ? toEntry(row) : null;
  }

  /** Newest first. */
  async getTimeline(userId: string, limit = 100): Promise<LedgerEntry[]> {
    const rows = this.database.connection
      .prepare<[string, number], LedgerRow>(
        `SELECT * FROM ingestion_events
         WHERE user_id = ?
         ORDER BY received_at DESC, rowid DESC
         LIMIT ?`,
      )
      .all(userId, limit);
    return rows.map(toEntry);
  }

  async countBySourceType(): Promise<Record<string, number>> {
    const rows = this.database.connection
      .prepare<[], { source_type: string; count: number }>(
        `SELECT source_type, COUNT(*) AS count FROM ingestion_events
         GROUP BY source_type ORDER BY source_type`,
      )
      .all();

    const counts: Record<string, number> = {};
    for (const row of rows) {
      counts[row.source_type] = row.count;
    }
    return counts;
  }

  async totalCount(): Promise<number> {
    const row = this.database.connection
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ingestion_events`)
      .get();
    return row?.count ?? 0;
  }
}
