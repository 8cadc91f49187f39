import { WebSocket } from 'ws';
import type { MessageData } from '../../notification/domain/notification-job.entity';

export const SOCKET_OPEN = WebSocket.OPEN;

/**
 * The part of a `ws` WebSocket the fanout layer uses.
 */
export interface LiveSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export type ServerFrameType = 'notification' | 'notification_missed';

export interface ServerFrame {
  type: ServerFrameType;
  data: MessageData;
  job_id?: number;
}
