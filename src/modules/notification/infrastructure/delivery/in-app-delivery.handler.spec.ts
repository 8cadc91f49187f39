import { describe, it, expect, vi } from 'vitest';
import { InAppDeliveryHandler } from './in-app-delivery.handler';
import { InMemoryFanoutBus } from '../../../realtime/infrastructure/in-memory-fanout-bus';
import { DeliveryError } from '../../../../shared/domain/errors';

describe('InAppDeliveryHandler', () => {
  it('should publish the payload to the recipient group', async () => {
    const bus = new InMemoryFanoutBus();
    const listener = vi.fn();
    await bus.subscribe(listener);
    const handler = new InAppDeliveryHandler(bus);

    await handler.send(7, { message: 'Hello' }, 12);

    expect(listener).toHaveBeenCalledWith({
      recipientId: 7,
      jobId: 12,
      data: { message: 'Hello' },
    });
  });

  it('should succeed when nobody is connected', async () => {
    const handler = new InAppDeliveryHandler(new InMemoryFanoutBus());

    await expect(handler.send(7, {}, 12)).resolves.toBeUndefined();
  });

  it('should fail when no fanout layer is configured', async () => {
    const handler = new InAppDeliveryHandler();

    await expect(handler.send(7, {}, 12)).rejects.toThrow(
      'Realtime fanout layer is not configured',
    );
  });

  it('should turn publish failures into DeliveryError', async () => {
    const bus = new InMemoryFanoutBus();
    vi.spyOn(bus, 'publish').mockRejectedValue(new Error('ECONNREFUSED'));
    const handler = new InAppDeliveryHandler(bus);

    const error = await handler.send(7, {}, 12).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({
      message: 'Fanout layer unavailable: ECONNREFUSED',
    });
  });

  it('should pass DeliveryErrors from the bus through unchanged', async () => {
    const bus = new InMemoryFanoutBus();
    const original = new DeliveryError('in_app', 'payload too large');
    vi.spyOn(bus, 'publish').mockRejectedValue(original);

    await expect(new InAppDeliveryHandler(bus).send(7, {}, 12)).rejects.toBe(
      original,
    );
  });
});
