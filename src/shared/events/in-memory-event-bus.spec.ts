import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryEventBus } from './in-memory-event-bus';
import { BaseDomainEvent } from './domain-event';

class AccountEvent extends BaseDomainEvent<{ email: string }> {
  readonly eventType = 'account.changed';
  readonly aggregateType = 'User';

  constructor(aggregateId: string, email: string) {
    super(aggregateId, { email });
  }
}

describe('InMemoryEventBus', () => {
  let eventBus: InMemoryEventBus;

  beforeEach(() => {
    eventBus = new InMemoryEventBus();
  });

  describe('publish', () => {
    it('should deliver the event to every subscribed handler', async () => {
      const first = vi.fn().mockResolvedValue(undefined);
      const second = vi.fn().mockResolvedValue(undefined);
      eventBus.subscribe('account.changed', first);
      eventBus.subscribe('account.changed', second);

      const event = new AccountEvent('7', 'ada@example.com');
      await eventBus.publish(event);

      expect(first).toHaveBeenCalledWith(event);
      expect(second).toHaveBeenCalledWith(event);
    });

    it('should resolve when nobody listens', async () => {
      await expect(
        eventBus.publish(new AccountEvent('7', 'ada@example.com')),
      ).resolves.toBeUndefined();
    });

    it('should run the remaining handlers before rejecting with the first failure', async () => {
      const failing = vi.fn().mockRejectedValue(new Error('smtp down'));
      const healthy = vi.fn().mockResolvedValue(undefined);
      eventBus.subscribe('account.changed', failing);
      eventBus.subscribe('account.changed', healthy);

      await expect(
        eventBus.publish(new AccountEvent('7', 'ada@example.com')),
      ).rejects.toThrow('smtp down');
      expect(healthy).toHaveBeenCalledTimes(1);
    });
  });

  describe('unsubscribe', () => {
    it('should stop delivering to a removed handler', async () => {
      const handler = vi.fn().mockResolvedValue(undefined);
      eventBus.subscribe('account.changed', handler);
      eventBus.unsubscribe('account.changed', handler);

      await eventBus.publish(new AccountEvent('7', 'ada@example.com'));

      expect(handler).not.toHaveBeenCalled();
      expect(eventBus.hasHandlers('account.changed')).toBe(false);
      expect(eventBus.getRegisteredEventTypes()).toEqual([]);
    });
  });
});
