// ============================================================
// Identity Graph Engine — Ingest Controller
// Routes: POST /api/ingest, POST /api/ingest/process
//
// POST /api/ingest runs one event synchronously through the
// same pipeline the queue consumer uses. The raw request body
// goes through the queue's decoder, so both paths validate and
// keep large integers identically. Protected by ApiKeyGuard
// when INGEST_API_KEY_HASHES is set.
// ============================================================

import {
  Controller,
  Post,
  Req,
  Query,
  UseGuards,
  DefaultValuePipe,
  ParseIntPipe,
  BadRequestException,
  ServiceUnavailableException,
  RawBodyRequest,
} from '@nestjs/common';
import { IngestService, ProcessingOutcome } from './ingest.service';
import { AmqpConsumerService } from './amqp-consumer.service';
import { Request } from 'express';
import { decodeIngestionEvent } from './ingestion-event';
import { ApiKeyGuard } from '../common/guards/api-key.guard';

const MAX_DRAIN = 1000;

function toResponse(outcome: ProcessingOutcome) {
  return {
    event_id: outcome.eventId,
    user_id: outcome.userId,
    source_type: outcome.sourceType,
    status: outcome.status,
    first_delivery: outcome.firstDelivery,
    credential_id: outcome.credentialId,
    claims_created: outcome.claimsCreated,
    edges_created: outcome.edgesCreated,
    conflicts_detected: outcome.conflicts.length,
    conflicts: outcome.conflicts.map((c) => ({
      conflict_id: c.conflictId,
      attribute: c.attribute,
      claim_a_id: c.claimA.nodeId,
      claim_a_value: c.claimA.value,
      claim_b_id: c.claimB.nodeId,
      claim_b_value: c.claimB.value,
    })),
  };
}

@Controller('api/ingest')
@UseGuards(ApiKeyGuard)
export class IngestController {
  constructor(
    private readonly ingestService: IngestService,
    private readonly consumer: AmqpConsumerService,
  ) {}

  /**
   * POST /api/ingest
   *
   * Headers:
   *   X-Ingest-API-Key: <key>   (when keys are configured)
   *
   * Request:  { event_id?, user_id, source_type, payload, timestamp? }
   * Response: { event_id, status, credential_id, claims_created,
   *             edges_created, conflicts_detected, conflicts[] }
   */
  @Post()
  async ingest(@Req() req: RawBodyRequest<Request>) {
    // rawBody is only captured for JSON content types
    if (!req.rawBody) {
      throw new BadRequestException('Request body must be application/json');
    }
    const outcome = await this.ingestService.process(decodeIngestionEvent(req.rawBody));
    return toResponse(outcome);
  }

  /**
   * POST /api/ingest/process?max_messages=N
   *
   * Pull up to N (default 10) waiting queue messages and process
   * them now. 503 when the consumer is not connected.
   */
  @Post('process')
  async drain(
    @Query('max_messages', new DefaultValuePipe(10), ParseIntPipe) maxMessages: number,
  ) {
    if (maxMessages < 1 || maxMessages > MAX_DRAIN) {
      throw new BadRequestException(`max_messages must be between 1 and ${MAX_DRAIN}`);
    }
    if (!this.consumer.isConnected()) {
      throw new ServiceUnavailableException('RabbitMQ consumer is not connected');
    }
    return this.consumer.processPending(maxMessages);
  }
}
