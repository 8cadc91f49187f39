import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import type postgres from 'postgres';
import type {
  FanoutBus,
  FanoutListener,
  FanoutMessage,
  Unsubscribe,
} from '../domain/fanout-bus';
import { parseFanoutMessage } from '../domain/fanout-bus';
import { DeliveryError, describeError } from '../../../shared/domain/errors';
import { POSTGRES } from '../../../shared/infrastructure/database/database.module';
import type { PostgresClient } from '../../../shared/infrastructure/database/drizzle.client';

export const FANOUT_CHANNEL = 'notification_fanout';

/** NOTIFY payloads must be shorter than 8000 bytes. */
export const MAX_NOTIFY_PAYLOAD_BYTES = 7999;

/**
 * Cross-process fanout over PostgreSQL LISTEN/NOTIFY. Workers only publish;
 * gateway processes open one LISTEN connection on first subscribe.
 */
@Injectable()
export class PostgresFanoutBus implements FanoutBus, OnModuleDestroy {
  private readonly logger = new Logger(PostgresFanoutBus.name);
  private readonly listeners = new Set<FanoutListener>();
  private listening: Promise<postgres.ListenMeta> | null = null;

  constructor(@Inject(POSTGRES) private readonly sql: PostgresClient) {}

  async publish(message: FanoutMessage): Promise<void> {
    const payload = JSON.stringify(message);
    const size = Buffer.byteLength(payload, 'utf8');

    if (size > MAX_NOTIFY_PAYLOAD_BYTES) {
      throw new DeliveryError(
        'in_app',
        `Fanout payload is ${size} bytes, limit is ${MAX_NOTIFY_PAYLOAD_BYTES}`,
      );
    }

    await this.sql.notify(FANOUT_CHANNEL, payload);
  }

  async subscribe(listener: FanoutListener): Promise<Unsubscribe> {
    this.listeners.add(listener);

    if (!this.listening) {
      this.listening = this.sql.listen(
        FANOUT_CHANNEL,
        (payload) => this.dispatch(payload),
        () => this.logger.log(`Listening on ${FANOUT_CHANNEL}`),
      );
    }

    try {
      await this.listening;
    } catch (error) {
      this.listeners.delete(listener);
      this.listening = null;
      throw error;
    }

    return async () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0) {
        await this.stopListening();
      }
    };
  }

  async onModuleDestroy(): Promise<void> {
    this.listeners.clear();
    await this.stopListening();
  }

  private async stopListening(): Promise<void> {
    const listening = this.listening;
    this.listening = null;
    if (listening) {
      const meta = await listening;
      await meta.unlisten();
    }
  }

  private dispatch(payload: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      this.logger.warn(`Unparseable fanout payload: ${describeError(error)}`);
      return;
    }

    const message = parseFanoutMessage(parsed);
    if (!message) {
      this.logger.warn('Discarding malformed fanout payload');
      return;
    }

    for (const listener of this.listeners) {
      void Promise.resolve()
        .then(() => listener(message))
        .catch((error: unknown) =>
        this.logger.error(
          `Fanout listener failed for recipient ${message.recipientId}: ${describeError(error)}`,
        ),
      );
    }
  }
}
