import { Injectable, Inject, Logger } from '@nestjs/common';
import {
  SOCKET_OPEN,
  type LiveSocket,
  type ServerFrame,
} from '../domain/live-socket';
import { groupName } from '../domain/fanout-bus';
import { describeError } from '../../../shared/domain/errors';
import {
  NOTIFICATION_CONFIG,
  type NotificationConfig,
} from '../../../config/notification.config';

/**
 * Recipient groups of live connections held by this process.
 */
@Injectable()
export class ConnectionRegistry {
  private readonly logger = new Logger(ConnectionRegistry.name);
  private readonly groups = new Map<number, Set<LiveSocket>>();
  private readonly owners = new Map<LiveSocket, number>();

  constructor(
    @Inject(NOTIFICATION_CONFIG) private readonly config: NotificationConfig,
  ) {}

  add(recipientId: number, socket: LiveSocket): void {
    let group = this.groups.get(recipientId);
    if (!group) {
      group = new Set();
      this.groups.set(recipientId, group);
    }
    group.add(socket);
    this.owners.set(socket, recipientId);
    this.logger.debug(
      `Joined ${groupName(recipientId)} (${group.size} connection(s))`,
    );
  }

  remove(socket: LiveSocket): void {
    const recipientId = this.owners.get(socket);
    if (recipientId === undefined) {
      return;
    }
    this.owners.delete(socket);

    const group = this.groups.get(recipientId);
    group?.delete(socket);
    if (group && group.size === 0) {
      this.groups.delete(recipientId);
    }
    this.logger.debug(`Left ${groupName(recipientId)}`);
  }

  recipientOf(socket: LiveSocket): number | undefined {
    return this.owners.get(socket);
  }

  connectionCount(recipientId: number): number {
    return this.groups.get(recipientId)?.size ?? 0;
  }

  /**
   * @returns how many of the recipient's connections the frame was written to
   */
  sendToGroup(recipientId: number, frame: ServerFrame): number {
    const group = this.groups.get(recipientId);
    if (!group) {
      return 0;
    }

    const payload = JSON.stringify(frame);
    let delivered = 0;
    for (const socket of [...group]) {
      if (this.write(socket, payload)) {
        delivered++;
      }
    }
    return delivered;
  }

  /**
   * @returns false if the socket was dropped instead of written to
   */
  sendTo(socket: LiveSocket, frame: ServerFrame): boolean {
    return this.write(socket, JSON.stringify(frame));
  }

  private write(socket: LiveSocket, payload: string): boolean {
    if (socket.readyState !== SOCKET_OPEN) {
      this.remove(socket);
      return false;
    }

    if (socket.bufferedAmount > this.config.maxBufferedBytes) {
      this.logger.warn(
        `Terminating slow consumer of ${groupName(this.owners.get(socket) ?? 0)}: ${socket.bufferedAmount} bytes buffered`,
      );
      this.drop(socket);
      return false;
    }

    try {
      socket.send(payload);
      return true;
    } catch (error) {
      this.logger.warn(`Dropping connection after send failure: ${describeError(error)}`);
      this.drop(socket);
      return false;
    }
  }

  private drop(socket: LiveSocket): void {
    this.remove(socket);
    socket.terminate();
  }
}
