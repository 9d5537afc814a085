// ============================================================
// Identity Graph Engine — Ingest Module
//
// Event processing. Depends on:
//   - CredentialsModule: decomposition into the graph
//   - ConflictsModule:   contradiction detection
//   - EventsModule:      the ingestion ledger
// ============================================================

import { Module } from '@nestjs/common';
import { IngestController } from './ingest.controller';
import { IngestService } from './ingest.service';
import { AmqpConsumerService } from './amqp-consumer.service';
import { CredentialsModule } from '../credentials/credentials.module';
import { ConflictsModule } from '../conflicts/conflicts.module';
import { EventsModule } from '../events/events.module';

@Module({
  imports: [CredentialsModule, ConflictsModule, EventsModule],
  controllers: [IngestController],
  providers: [IngestService, AmqpConsumerService],
  exports: [AmqpConsumerService],
})
export class IngestModule {}
