import type { QuotaError, QuotaReport } from './quota.js';
import type { ConnectionSummary } from './discovery.js';

// Protocol version
export const PROTOCOL_VERSION = '0.1.0';

// Message envelope
export interface WsMessage<T = unknown> {
  type: string;
  id: string;        // unique message id
  timestamp: number;
  payload: T;
}

// Client → Gateway
export const CLIENT_MESSAGE_TYPES = ['refresh', 'invalidate', 'ping'] as const;
export type ClientMessageType = (typeof CLIENT_MESSAGE_TYPES)[number];

// Gateway → Client
export interface ConnectedPayload {
  protocolVersion: string;
  sessionId: string;
}

export interface QuotaUpdatePayload {
  report: QuotaReport;
}

export interface QuotaErrorPayload {
  error: QuotaError;
}

export interface InvalidatedPayload {
  ok: boolean;
}

// GET /api/connection
export interface ConnectionStatusPayload {
  connection: ConnectionSummary | null;
}

export type ServerMessage =
  | WsMessage<ConnectedPayload> & { type: 'connected' }
  | WsMessage<QuotaUpdatePayload> & { type: 'quota:update' }
  | WsMessage<QuotaErrorPayload> & { type: 'quota:error' }
  | WsMessage<InvalidatedPayload> & { type: 'invalidated' }
  | WsMessage<Record<string, never>> & { type: 'pong' };
