import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryFanoutBus } from './in-memory-fanout-bus';

describe('InMemoryFanoutBus', () => {
  let bus: InMemoryFanoutBus;
  const message = { recipientId: 7, jobId: 3, data: { message: 'Hello' } };

  beforeEach(() => {
    bus = new InMemoryFanoutBus();
  });

  it('should deliver to every subscriber', async () => {
    const first = vi.fn();
    const second = vi.fn();
    await bus.subscribe(first);
    await bus.subscribe(second);

    await bus.publish(message);

    expect(first).toHaveBeenCalledWith(message);
    expect(second).toHaveBeenCalledWith(message);
  });

  it('should resolve with no subscribers', async () => {
    await expect(bus.publish(message)).resolves.toBeUndefined();
  });

  it('should isolate a failing subscriber', async () => {
    const healthy = vi.fn();
    await bus.subscribe(vi.fn().mockRejectedValue(new Error('socket gone')));
    await bus.subscribe(healthy);

    await expect(bus.publish(message)).resolves.toBeUndefined();
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it('should stop delivering after unsubscribe', async () => {
    const listener = vi.fn();
    const unsubscribe = await bus.subscribe(listener);

    await unsubscribe();
    await bus.publish(message);

    expect(listener).not.toHaveBeenCalled();
    expect(bus.subscriberCount).toBe(0);
  });
});
