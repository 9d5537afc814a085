// ============================================================
// Identity Graph Engine — Ingestion event envelope
//
// Queue deliveries and HTTP requests carry the same envelope:
//   { event_id?, user_id, source_type, payload, timestamp? }
// and are decoded by the same function.
// ============================================================

import { randomUUID } from 'crypto';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { IngestEventDto } from './dto/ingest-event.dto';
import { parseIssuanceDate } from '../credentials/credential';
import { parseJson } from '../common/json';

export enum SourceType {
  VC = 'VC',
  OIDC = 'OIDC',
  MANUAL = 'MANUAL',
}

export interface IngestionEvent {
  eventId: string;
  userId: string;
  /** Usually a SourceType; unrecognised values are skipped, not rejected. */
  sourceType: string;
  payload: Record<string, unknown>;
  timestamp?: Date;
}

/** The envelope could not be decoded. Redelivery would fail the same way. */
export class MalformedEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedEventError';
  }
}

/**
 * Validated DTO → event. Generates the event id when the sender gave none.
 *
 * The validator also passes week and ordinal dates (2024-W05-3) and
 * out-of-range days (2024-02-30); those throw MalformedEventError here.
 */
export function toIngestionEvent(dto: IngestEventDto): IngestionEvent {
  let timestamp: Date | undefined;
  if (dto.timestamp !== undefined) {
    timestamp = parseIssuanceDate(dto.timestamp);
    if (!timestamp) {
      throw new MalformedEventError(
        `Invalid event envelope: timestamp is not a calendar date-time: ${dto.timestamp}`,
      );
    }
  }

  return {
    eventId: dto.event_id ?? randomUUID(),
    userId: dto.user_id,
    sourceType: dto.source_type,
    payload: dto.payload,
    timestamp,
  };
}

/**
 * Decode a raw body from the queue or an HTTP request. Large
 * integers in the payload stay exact (see common/json).
 * Throws MalformedEventError.
 */
export function decodeIngestionEvent(body: Buffer | string): IngestionEvent {
  let decoded: unknown;
  try {
    decoded = parseJson(body.toString());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedEventError(`Invalid JSON in message: ${reason}`);
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    throw new MalformedEventError('Message body is not a JSON object');
  }

  const dto = plainToInstance(IngestEventDto, decoded);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const details = errors
      .flatMap((e) => Object.values(e.constraints ?? {}))
      .join('; ');
    throw new MalformedEventError(`Invalid event envelope: ${details}`);
  }

  return toIngestionEvent(dto);
}
