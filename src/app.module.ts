// ============================================================
// Identity Graph Engine
// Root Application Module
// ============================================================
import { Module, Global } from '@nestjs/common';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import { DatabaseService } from './database.service';
import { ConfigModule } from './config/config.module';
import { Settings } from './config/settings';
import { GraphModule } from './graph/graph.module';
import { CredentialsModule } from './credentials/credentials.module';
import { ConflictsModule } from './conflicts/conflicts.module';
import { EventsModule } from './events/events.module';
import { IngestModule } from './ingest/ingest.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { SseModule } from './sse/sse.module';
import { HealthModule } from './health/health.module';

@Global()
@Module({
  imports: [
    ConfigModule,

    // ── Rate Limiting ───────────────────────────────────
    // Every route is limited per IP (THROTTLE_LIMIT requests
    // per THROTTLE_TTL_MS). The SSE stream and health probes
    // opt out with @SkipThrottle().
    ThrottlerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [Settings],
      useFactory: (settings: Settings) => [
        {
          name: 'default',
          ttl: settings.throttleTtlMs,
          limit: settings.throttleLimit,
        },
      ],
    }),

    // Feature modules
    GraphModule,
    CredentialsModule,
    ConflictsModule,
    EventsModule,
    IngestModule,
    AnalyticsModule,
    SseModule,
    HealthModule,
  ],
  providers: [
    DatabaseService,
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
  exports: [DatabaseService],
})
export class AppModule {}
