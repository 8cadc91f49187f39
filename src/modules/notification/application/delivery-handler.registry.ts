import { Injectable, Inject } from '@nestjs/common';
import {
  DELIVERY_HANDLERS,
  type DeliveryHandler,
} from '../domain/delivery-handler';

/**
 * Static channel -> handler table, fixed at module construction.
 */
@Injectable()
export class DeliveryHandlerRegistry {
  private readonly handlers: ReadonlyMap<string, DeliveryHandler>;

  constructor(@Inject(DELIVERY_HANDLERS) handlers: DeliveryHandler[]) {
    const byChannel = new Map<string, DeliveryHandler>();
    for (const handler of handlers) {
      if (byChannel.has(handler.channel)) {
        throw new Error(`Duplicate delivery handler for channel ${handler.channel}`);
      }
      byChannel.set(handler.channel, handler);
    }
    this.handlers = byChannel;
  }

  resolve(channel: string): DeliveryHandler | undefined {
    return this.handlers.get(channel);
  }

  get channels(): string[] {
    return [...this.handlers.keys()];
  }
}
