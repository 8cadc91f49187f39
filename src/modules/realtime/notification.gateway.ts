import {
  Inject,
  Logger,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  SubscribeMessage,
  WebSocketGateway,
  type OnGatewayConnection,
  type OnGatewayDisconnect,
  type OnGatewayInit,
} from '@nestjs/websockets';
import type { IncomingMessage } from 'node:http';
import type { Server as WebSocketServer, VerifyClientCallbackAsync } from 'ws';
import { ConnectionRegistry } from './application/connection-registry';
import {
  LiveConnectionAuthenticator,
  selectSubprotocol,
} from './application/live-connection.authenticator';
import {
  FANOUT_BUS,
  groupName,
  type FanoutBus,
  type FanoutMessage,
  type Unsubscribe,
} from './domain/fanout-bus';
import {
  SOCKET_OPEN,
  type LiveSocket,
  type ServerFrame,
} from './domain/live-socket';
import {
  NOTIFICATION_JOB_REPOSITORY,
  type NotificationJobRepository,
} from '../notification/domain/notification-job.repository';
import { describeError } from '../../shared/domain/errors';

export const NOTIFICATIONS_PATH = '/ws/notifications';

/** Close code sent when the upgrade request carries no usable credentials. */
export const CLOSE_UNAUTHORIZED = 4401;
const CLOSE_INTERNAL_ERROR = 1011;

export type HandshakeCallback = (
  accepted: boolean,
  status?: number,
  message?: string,
) => void;

/**
 * Live in-app notification endpoint.
 *
 * Frames sent to clients: `{"type":"notification","data":{...},"job_id":n}`
 * for fanout pushes and `type: "notification_missed"` for the replay that
 * follows every successful connect. Clients may send
 * `{"event":"ack","data":{"job_id":n}}`; pushes are marked read on delivery,
 * so an ack only matters for jobs the server could not confirm.
 */
@WebSocketGateway({ path: NOTIFICATIONS_PATH, handleProtocols: selectSubprotocol })
export class NotificationGateway
  implements
    OnGatewayInit<WebSocketServer>,
    OnGatewayConnection<LiveSocket>,
    OnGatewayDisconnect<LiveSocket>,
    OnModuleInit,
    OnModuleDestroy
{
  private readonly logger = new Logger(NotificationGateway.name);
  private unsubscribe: Unsubscribe | null = null;
  private readonly verified = new WeakMap<IncomingMessage, number>();

  constructor(
    private readonly authenticator: LiveConnectionAuthenticator,
    private readonly registry: ConnectionRegistry,
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    @Inject(FANOUT_BUS)
    private readonly fanout: FanoutBus,
  ) {}

  async onModuleInit(): Promise<void> {
    this.unsubscribe = await this.fanout.subscribe(async (message) => {
      await this.handleFanout(message);
    });
  }

  async onModuleDestroy(): Promise<void> {
    if (this.unsubscribe) {
      await this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  /**
   * Refuses bad credentials during the HTTP upgrade, before 101 is sent.
   */
  afterInit(server: WebSocketServer): void {
    const verifyClient: VerifyClientCallbackAsync<IncomingMessage> = (
      info,
      callback,
    ) => {
      void this.verifyHandshake(info.req, callback);
    };
    server.options.verifyClient = verifyClient;
  }

  async verifyHandshake(
    request: IncomingMessage,
    callback: HandshakeCallback,
  ): Promise<void> {
    let recipientId: number | null;
    try {
      recipientId = await this.authenticator.authenticate(request);
    } catch (error) {
      this.logger.error(
        `Could not authenticate live connection: ${describeError(error)}`,
      );
      callback(false, 503, 'Authentication unavailable');
      return;
    }

    if (recipientId === null) {
      callback(false, 401, 'Unauthorized');
      return;
    }

    this.verified.set(request, recipientId);
    callback(true);
  }

  async handleConnection(
    client: LiveSocket,
    request: IncomingMessage,
  ): Promise<void> {
    let recipientId: number | null;
    try {
      recipientId =
        this.verified.get(request) ??
        (await this.authenticator.authenticate(request));
    } catch (error) {
      this.logger.error(
        `Could not authenticate live connection: ${describeError(error)}`,
      );
      client.close(CLOSE_INTERNAL_ERROR, 'Authentication unavailable');
      return;
    }

    if (recipientId === null) {
      client.close(CLOSE_UNAUTHORIZED, 'Unauthorized');
      return;
    }

    // the client may have gone away while the token was checked
    if (client.readyState !== SOCKET_OPEN) {
      return;
    }

    this.registry.add(recipientId, client);
    this.logger.log(`Recipient ${recipientId} joined ${groupName(recipientId)}`);

    try {
      await this.replayMissed(recipientId, client);
    } catch (error) {
      this.logger.error(
        `Replay of missed notifications failed for recipient ${recipientId}: ${describeError(error)}`,
      );
    }
  }

  handleDisconnect(client: LiveSocket): void {
    this.registry.remove(client);
  }

  @SubscribeMessage('ack')
  async handleAck(
    @ConnectedSocket() client: LiveSocket,
    @MessageBody() body: unknown,
  ): Promise<void> {
    const recipientId = this.registry.recipientOf(client);
    const jobId = parseAckJobId(body);
    if (recipientId === undefined || jobId === null) {
      return;
    }

    await this.jobs.markRead(jobId, recipientId);
  }

  /**
   * @returns number of live connections the message was written to
   */
  async handleFanout(message: FanoutMessage): Promise<number> {
    const frame: ServerFrame = { type: 'notification', data: message.data };
    if (message.jobId !== null) {
      frame.job_id = message.jobId;
    }

    const delivered = this.registry.sendToGroup(message.recipientId, frame);
    if (delivered > 0 && message.jobId !== null) {
      await this.jobs.markRead(message.jobId);
    }
    return delivered;
  }

  private async replayMissed(
    recipientId: number,
    client: LiveSocket,
  ): Promise<void> {
    const missed = await this.jobs.findMissedInApp(recipientId);
    for (const job of missed) {
      const written = this.registry.sendTo(client, {
        type: 'notification_missed',
        data: job.messageData,
        job_id: job.id,
      });
      if (!written) {
        return;
      }
      await this.jobs.markRead(job.id);
    }

    if (missed.length > 0) {
      this.logger.log(
        `Replayed ${missed.length} missed notification(s) to recipient ${recipientId}`,
      );
    }
  }
}

function parseAckJobId(body: unknown): number | null {
  if (typeof body !== 'object' || body === null || !('job_id' in body)) {
    return null;
  }
  const jobId = body.job_id;
  return typeof jobId === 'number' && Number.isSafeInteger(jobId) && jobId > 0
    ? jobId
    : null;
}
