// ============================================================
// Identity Graph Engine — Events Module
//
// The append-only ingestion ledger. Exported for the ingest
// pipeline (writes) and analytics (counts).
// ============================================================

import { Module } from '@nestjs/common';
import { EventsService } from './events.service';
import { EventsController } from './events.controller';
import { SseModule } from '../sse/sse.module';

@Module({
  imports: [SseModule],
  controllers: [EventsController],
  providers: [EventsService],
  exports: [EventsService],
})
export class EventsModule {}
