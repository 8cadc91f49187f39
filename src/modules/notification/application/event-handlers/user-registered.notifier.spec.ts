import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import {
  UserRegisteredNotifier,
  welcomeEmail,
  welcomeInApp,
} from './user-registered.notifier';
import { NotificationEnqueueService } from '../notification-enqueue.service';
import { EmailVerificationTokenService } from '../email-verification-token.service';
import {
  EVENT_BUS,
  InMemoryEventBus,
  UserRegisteredEvent,
} from '../../../../shared/events';

describe('UserRegisteredNotifier', () => {
  const verificationUrl =
    'http://localhost:3000/api/users/verify-email?token=test-token';
  let eventBus: InMemoryEventBus;
  let enqueue: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    eventBus = new InMemoryEventBus();
    enqueue = vi.fn().mockResolvedValueOnce(1).mockResolvedValueOnce(2);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UserRegisteredNotifier,
        { provide: EVENT_BUS, useValue: eventBus },
        { provide: NotificationEnqueueService, useValue: { enqueue } },
        {
          provide: EmailVerificationTokenService,
          useValue: { verificationUrl: vi.fn().mockReturnValue(verificationUrl) },
        },
      ],
    }).compile();

    module.get(UserRegisteredNotifier).onModuleInit();
  });

  it('should subscribe to user.registered', () => {
    expect(eventBus.hasHandlers('user.registered')).toBe(true);
  });

  it('should enqueue a welcome email and a welcome in-app notification', async () => {
    await eventBus.publish(
      new UserRegisteredEvent({ userId: 5, email: 'ada@example.com' }),
    );

    expect(enqueue).toHaveBeenCalledTimes(2);
    expect(enqueue).toHaveBeenNthCalledWith(
      1,
      5,
      'email',
      welcomeEmail('ada@example.com', verificationUrl),
      'welcome_email',
    );
    expect(enqueue).toHaveBeenNthCalledWith(
      2,
      5,
      'in_app',
      welcomeInApp('ada@example.com'),
      'welcome_in_app',
    );
  });

  it('should still enqueue the in-app notification when email is vetoed', async () => {
    enqueue.mockReset();
    enqueue.mockResolvedValueOnce(null).mockResolvedValueOnce(9);

    await eventBus.publish(
      new UserRegisteredEvent({ userId: 5, email: 'ada@example.com' }),
    );

    expect(enqueue).toHaveBeenCalledTimes(2);
    expect(enqueue.mock.calls[1]?.[1]).toBe('in_app');
  });

  it('should surface storage failures to the publisher', async () => {
    enqueue.mockReset();
    enqueue.mockRejectedValue(new Error('connection refused'));

    await expect(
      eventBus.publish(
        new UserRegisteredEvent({ userId: 5, email: 'ada@example.com' }),
      ),
    ).rejects.toThrow('connection refused');
  });

  describe('message content', () => {
    it('should put the verification link in both email bodies', () => {
      const message = welcomeEmail('ada@example.com', verificationUrl);

      expect(message.subject).toBe('Welcome! Please verify your email');
      expect(message.body_text).toContain(`\n\n${verificationUrl}\n\n`);
      expect(message.body_html).toContain(`<a href="${verificationUrl}">`);
    });

    it('should escape markup in the html body only', () => {
      const message = welcomeEmail('"a<b>"@example.com', 'https://app.test/verify?token=x&next=/');

      expect(message.body_html).toContain(
        '<p>Hi <b>&quot;a&lt;b&gt;&quot;@example.com</b>,</p>',
      );
      expect(message.body_html).toContain(
        '<a href="https://app.test/verify?token=x&amp;next=/">',
      );
      expect(message.body_text).toContain('Hi "a<b>"@example.com,');
    });

    it('should address the in-app welcome to the user', () => {
      expect(welcomeInApp('ada@example.com')).toEqual({
        title: 'Welcome aboard!',
        body: 'Hi ada@example.com, have a look around.',
      });
    });
  });
});
