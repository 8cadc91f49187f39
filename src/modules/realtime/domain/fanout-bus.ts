import type { MessageData } from '../../notification/domain/notification-job.entity';

/**
 * One in-app payload addressed to every live connection of a recipient.
 */
export interface FanoutMessage {
  recipientId: number;
  jobId: number | null;
  data: MessageData;
}

export type FanoutListener = (message: FanoutMessage) => void | Promise<void>;

export type Unsubscribe = () => Promise<void>;

/**
 * Broadcast channel between whoever delivers in-app jobs (workers) and
 * whoever holds the live connections (gateway processes). No durability:
 * a message with no subscriber is dropped; the job table covers the gap.
 */
export interface FanoutBus {
  publish(message: FanoutMessage): Promise<void>;
  subscribe(listener: FanoutListener): Promise<Unsubscribe>;
}

export const FANOUT_BUS = Symbol('FANOUT_BUS');

export function groupName(recipientId: number): string {
  return `user_${recipientId}_notifications`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shape check for messages that crossed a process boundary.
 */
export function parseFanoutMessage(value: unknown): FanoutMessage | null {
  if (!isRecord(value)) {
    return null;
  }

  const { recipientId, jobId, data } = value;
  if (
    typeof recipientId !== 'number' ||
    !Number.isInteger(recipientId) ||
    !(jobId === null || (typeof jobId === 'number' && Number.isInteger(jobId))) ||
    !isRecord(data)
  ) {
    return null;
  }

  return { recipientId, jobId, data };
}
