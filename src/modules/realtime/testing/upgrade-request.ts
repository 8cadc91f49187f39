import { IncomingMessage, type IncomingHttpHeaders } from 'node:http';
import { Socket } from 'node:net';

/** Builds the HTTP upgrade request a WebSocket handshake carries. */
export function upgradeRequest(
  init: { url?: string; headers?: IncomingHttpHeaders } = {},
): IncomingMessage {
  const request = new IncomingMessage(new Socket());
  request.url = init.url ?? '/ws/notifications';
  request.headers = init.headers ?? {};
  return request;
}
