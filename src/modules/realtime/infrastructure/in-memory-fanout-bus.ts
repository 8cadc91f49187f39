import { Injectable, Logger } from '@nestjs/common';
import type {
  FanoutBus,
  FanoutListener,
  FanoutMessage,
  Unsubscribe,
} from '../domain/fanout-bus';
import { describeError } from '../../../shared/domain/errors';

/**
 * Single-process fanout: workers and the gateway share one Node process.
 * A failing listener is logged and does not affect the others.
 */
@Injectable()
export class InMemoryFanoutBus implements FanoutBus {
  private readonly logger = new Logger(InMemoryFanoutBus.name);
  private readonly listeners = new Set<FanoutListener>();

  async publish(message: FanoutMessage): Promise<void> {
    if (this.listeners.size === 0) {
      this.logger.debug(
        `No live subscribers for recipient ${message.recipientId}`,
      );
      return;
    }

    await Promise.all(
      Array.from(this.listeners).map(async (listener) => {
        try {
          await listener(message);
        } catch (error) {
          this.logger.error(
            `Fanout listener failed for recipient ${message.recipientId}: ${describeError(error)}`,
          );
        }
      }),
    );
  }

  async subscribe(listener: FanoutListener): Promise<Unsubscribe> {
    this.listeners.add(listener);
    return async () => {
      this.listeners.delete(listener);
    };
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}
