import { randomUUID } from 'node:crypto';
import { LS_CONNECT_PROTOCOL_VERSION, LS_LOOPBACK_HOST, LS_SERVICE_PATH, LS_TOKEN_HEADER } from './constants.js';
import { CLIENT_MESSAGE_TYPES, type ClientMessageType, type WsMessage } from './messages.js';
import type { Connection, ConnectionSummary } from './discovery.js';

export function createMessage<K extends string, T>(type: K, payload: T): WsMessage<T> & { type: K } {
  return { type, id: randomUUID(), timestamp: Date.now(), payload };
}

export function parseMessage(raw: string): WsMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) return null;
  const { type } = parsed;
  if (typeof type !== 'string') return null;
  const id = 'id' in parsed && typeof parsed.id === 'string' ? parsed.id : '';
  const timestamp = 'timestamp' in parsed && typeof parsed.timestamp === 'number' ? parsed.timestamp : 0;
  const payload = 'payload' in parsed ? parsed.payload : undefined;
  return { type, id, timestamp, payload };
}

export function isClientMessageType(type: string): type is ClientMessageType {
  return CLIENT_MESSAGE_TYPES.some((known) => known === type);
}

export function summarizeConnection(connection: Connection): ConnectionSummary {
  return { port: connection.port, pid: connection.pid, advertisedPort: connection.advertisedPort };
}

/** `https://127.0.0.1:<port>/<service>/<method>` */
export function buildServiceUrl(port: number, method: string): string {
  return `https://${LS_LOOPBACK_HOST}:${port}/${LS_SERVICE_PATH}/${method}`;
}

/** Headers every control API call carries. */
export function buildLsHeaders(token: string): Record<string, string> {
  return {
    'content-type': 'application/json',
    'connect-protocol-version': LS_CONNECT_PROTOCOL_VERSION,
    [LS_TOKEN_HEADER.toLowerCase()]: token,
  };
}
