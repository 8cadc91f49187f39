import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { IncomingMessage } from 'node:http';
import {
  RECIPIENT_DIRECTORY,
  type RecipientDirectory,
} from '../../notification/domain/recipient-directory.port';
import { describeError } from '../../../shared/domain/errors';

/** Subprotocol the server selects when a client offers it. */
export const NOTIFICATIONS_SUBPROTOCOL = 'notifications.v1';

const BEARER_SUBPROTOCOL_PREFIX = 'bearer.';
const POSITIVE_INTEGER = /^[1-9]\d*$/;

interface AccessTokenPayload {
  sub?: unknown;
  /** set on single-use tokens such as email verification links */
  purpose?: unknown;
}

/**
 * `handleProtocols` hook for the WebSocket server. Browsers cannot set an
 * Authorization header, so they offer `bearer.<token>` next to the real
 * subprotocol; the token is never echoed back.
 */
export function selectSubprotocol(protocols: Set<string>): string | false {
  return protocols.has(NOTIFICATIONS_SUBPROTOCOL)
    ? NOTIFICATIONS_SUBPROTOCOL
    : false;
}

/**
 * Resolves the upgrade request of a live connection to an active recipient.
 */
@Injectable()
export class LiveConnectionAuthenticator {
  private readonly logger = new Logger(LiveConnectionAuthenticator.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(RECIPIENT_DIRECTORY)
    private readonly directory: RecipientDirectory,
  ) {}

  /**
   * Token lookup order: Authorization header, `token` query parameter,
   * `bearer.` subprotocol.
   */
  extractToken(request: IncomingMessage): string | null {
    const authorization = request.headers.authorization;
    if (authorization) {
      const [scheme, token] = authorization.split(' ');
      if (scheme?.toLowerCase() === 'bearer' && token) {
        return token;
      }
    }

    const url = new URL(request.url ?? '/', 'http://localhost');
    const queryToken = url.searchParams.get('token');
    if (queryToken) {
      return queryToken;
    }

    const offered = request.headers['sec-websocket-protocol'];
    if (offered) {
      const bearer = offered
        .split(',')
        .map((protocol) => protocol.trim())
        .find((protocol) => protocol.startsWith(BEARER_SUBPROTOCOL_PREFIX));
      if (bearer && bearer.length > BEARER_SUBPROTOCOL_PREFIX.length) {
        return bearer.slice(BEARER_SUBPROTOCOL_PREFIX.length);
      }
    }

    return null;
  }

  /**
   * @returns the recipient id, or null when the connection must be refused
   */
  async authenticate(request: IncomingMessage): Promise<number | null> {
    const token = this.extractToken(request);
    if (!token) {
      return null;
    }

    let payload: AccessTokenPayload;
    try {
      payload = await this.jwtService.verifyAsync<AccessTokenPayload>(token);
    } catch (error) {
      this.logger.debug(`Rejected live connection token: ${describeError(error)}`);
      return null;
    }

    if (payload.purpose !== undefined) {
      return null;
    }

    const recipientId = parseRecipientId(payload.sub);
    if (recipientId === null) {
      return null;
    }

    const recipient = await this.directory.findById(recipientId);
    if (!recipient || !recipient.isActive) {
      return null;
    }
    return recipient.id;
  }
}

function parseRecipientId(sub: unknown): number | null {
  if (typeof sub === 'number') {
    return Number.isSafeInteger(sub) && sub > 0 ? sub : null;
  }
  if (typeof sub === 'string' && POSITIVE_INTEGER.test(sub)) {
    const id = Number(sub);
    return Number.isSafeInteger(id) ? id : null;
  }
  return null;
}
