// ============================================================
// Identity Graph Engine — Health Controller
// Routes: GET /health (liveness), GET /ready (readiness)
// ============================================================

import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { DatabaseService } from '../database.service';
import { AmqpConsumerService } from '../ingest/amqp-consumer.service';
import { Settings } from '../config/settings';

export const SERVICE_NAME = 'identity-graph-engine';
export const SERVICE_VERSION = '0.1.0';

@Controller()
@SkipThrottle()
export class HealthController {
  constructor(
    private readonly database: DatabaseService,
    private readonly consumer: AmqpConsumerService,
    private readonly settings: Settings,
  ) {}

  @Get('health')
  health() {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Ready when the database answers and, if the consumer is
   * enabled, the broker channel is open. 503 otherwise.
   */
  @Get('ready')
  ready() {
    const database = this.database.ping();
    const rabbitmq = this.settings.rabbitmqEnabled ? this.consumer.isConnected() : null;
    const ready = database && rabbitmq !== false;

    if (!ready) {
      throw new ServiceUnavailableException(
        `Not ready (database: ${database}, rabbitmq: ${rabbitmq})`,
      );
    }
    return { ready, database, rabbitmq };
  }
}
