// ============================================================
// Identity Graph Engine — Queue Consumer
//
// Consumes ingestion events from RabbitMQ (durable queue,
// manual acknowledgement, bounded prefetch).
//
// Delivery outcomes:
//   processed        → ack
//   malformed body   → reject, no requeue (would fail again)
//   processing error → nack with requeue (transient store faults)
//
// Startup retries the broker connection up to 3 times with a
// linear back-off, then fails application bootstrap.
// ============================================================

import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { connect, Channel, ConsumeMessage } from 'amqplib';
import { Settings } from '../config/settings';
import { IngestService } from './ingest.service';
import { decodeIngestionEvent, MalformedEventError } from './ingestion-event';

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

const CONNECT_ATTEMPTS = 3;
const CONNECT_BACKOFF_MS = 2000;

/** The acknowledgement surface of an amqplib channel. */
export interface DeliveryChannel<M> {
  ack(message: M): void;
  nack(message: M, allUpTo?: boolean, requeue?: boolean): void;
  reject(message: M, requeue?: boolean): void;
}

export type DeliveryOutcome = 'acked' | 'rejected' | 'requeued';

export interface DrainSummary {
  received: number;
  acked: number;
  rejected: number;
  requeued: number;
}

@Injectable()
export class AmqpConsumerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(AmqpConsumerService.name);
  private connection: AmqpConnection | null = null;
  private channel: Channel | null = null;
  private consumerTag: string | null = null;

  constructor(
    private readonly settings: Settings,
    private readonly ingest: IngestService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.settings.rabbitmqEnabled) {
      this.logger.log('RabbitMQ consumer disabled (RABBITMQ_ENABLED=false)');
      return;
    }

    await this.connectWithRetry();
    await this.startConsuming();
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  isConnected(): boolean {
    return this.channel !== null;
  }

  // ────────────────────────────────────────────────────────────
  // DELIVERY — one message, one outcome
  // ────────────────────────────────────────────────────────────

  async handleDelivery<M extends { content: Buffer }>(
    channel: DeliveryChannel<M>,
    message: M,
  ): Promise<DeliveryOutcome> {
    try {
      const event = decodeIngestionEvent(message.content);
      await this.ingest.process(event);
      channel.ack(message);
      return 'acked';
    } catch (error) {
      if (error instanceof MalformedEventError) {
        this.logger.error(`Rejecting malformed message: ${error.message}`);
        channel.reject(message, false);
        return 'rejected';
      }

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error processing message, requeueing: ${reason}`);
      channel.nack(message, false, true);
      return 'requeued';
    }
  }

  /**
   * Pull up to `maxMessages` waiting deliveries and process them
   * one at a time. Stops early when the queue is empty.
   */
  async processPending(maxMessages: number): Promise<DrainSummary> {
    const channel = this.requireChannel();
    const summary: DrainSummary = { received: 0, acked: 0, rejected: 0, requeued: 0 };

    for (let i = 0; i < maxMessages; i++) {
      const message = await channel.get(this.settings.rabbitmqQueue, { noAck: false });
      if (message === false) break;

      summary.received++;
      const outcome = await this.handleDelivery(channel, message);
      summary[outcome]++;
    }

    this.logger.log(
      `Drained ${summary.received} message(s): ${summary.acked} acked, ` +
        `${summary.rejected} rejected, ${summary.requeued} requeued`,
    );
    return summary;
  }

  // ────────────────────────────────────────────────────────────
  // CONNECTION
  // ────────────────────────────────────────────────────────────

  private async connectWithRetry(): Promise<void> {
    let lastError: Error | undefined;
    for (let attempt = 1; attempt <= CONNECT_ATTEMPTS; attempt++) {
      try {
        const connection = await connect(this.settings.rabbitmqUrl);
        connection.on('error', (err: Error) => {
          this.logger.error(`RabbitMQ connection error: ${err.message}`);
        });
        connection.on('close', () => {
          this.logger.warn('RabbitMQ connection closed');
          this.connection = null;
          this.channel = null;
          this.consumerTag = null;
        });

        const channel = await connection.createChannel();
        // The broker closes a channel on a failed assertion or an
        // unknown delivery tag; amqplib reports that as 'error'.
        channel.on('error', (err: Error) => {
          this.logger.error(`RabbitMQ channel error: ${err.message}`);
        });
        channel.on('close', () => {
          if (this.channel !== channel) return;
          this.logger.warn('RabbitMQ channel closed');
          this.channel = null;
          this.consumerTag = null;
        });
        await channel.assertQueue(this.settings.rabbitmqQueue, { durable: true });
        await channel.prefetch(this.settings.rabbitmqPrefetch);

        this.connection = connection;
        this.channel = channel;
        this.logger.log(`Connected to RabbitMQ, queue: ${this.settings.rabbitmqQueue}`);
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(
          `Connection attempt ${attempt}/${CONNECT_ATTEMPTS} failed: ${lastError.message}`,
        );
        if (attempt < CONNECT_ATTEMPTS) {
          await new Promise((r) => setTimeout(r, CONNECT_BACKOFF_MS * attempt));
        }
      }
    }
    this.logger.error(`Failed to connect to RabbitMQ after ${CONNECT_ATTEMPTS} attempts`);
    throw lastError;
  }

  private async startConsuming(): Promise<void> {
    const channel = this.requireChannel();
    const reply = await channel.consume(
      this.settings.rabbitmqQueue,
      (message: ConsumeMessage | null) => {
        // null means the broker cancelled the consumer
        if (message === null) {
          this.logger.warn('Consumer cancelled by broker');
          return;
        }
        this.handleDelivery(channel, message).catch((error: unknown) => {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.error(`Delivery handling failed: ${reason}`);
        });
      },
      { noAck: false },
    );
    this.consumerTag = reply.consumerTag;
    this.logger.log(`Consuming from ${this.settings.rabbitmqQueue}`);
  }

  private requireChannel(): Channel {
    if (!this.channel) {
      throw new Error('RabbitMQ consumer is not connected');
    }
    return this.channel;
  }

  private async close(): Promise<void> {
    const { channel, connection, consumerTag } = this;
    this.channel = null;
    this.connection = null;
    this.consumerTag = null;

    try {
      if (channel && consumerTag) await channel.cancel(consumerTag);
      if (channel) await channel.close();
      if (connection) await connection.close();
      if (connection) this.logger.log('Disconnected from RabbitMQ');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`RabbitMQ shutdown failed: ${reason}`);
    }
  }
}
