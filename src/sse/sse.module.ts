// ============================================================
// Identity Graph Engine — SSE Module
//
// Graph activity feed. Global so the ledger and the ingest
// pipeline can publish without importing this module.
// ============================================================

import { Module, Global } from '@nestjs/common';
import { SseService } from './sse.service';
import { SseController } from './sse.controller';

@Global()
@Module({
  controllers: [SseController],
  providers: [SseService],
  exports: [SseService],
})
export class SseModule {}
