// ============================================================
// Identity Graph Engine — Analytics Module
//
// Imports EventsModule for ledger counts; the graph store is
// provided globally by GraphModule.
// ============================================================

import { Module } from '@nestjs/common';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';
import { EventsModule } from '../events/events.module';

@Module({
  imports: [EventsModule],
  controllers: [AnalyticsController],
  providers: [AnalyticsService],
})
export class AnalyticsModule {}
