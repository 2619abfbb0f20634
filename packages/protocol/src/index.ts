// Protocol version
export { PROTOCOL_VERSION, CLIENT_MESSAGE_TYPES } from './messages.js';

// Message types
export type {
  WsMessage,
  ClientMessageType,
  ServerMessage,
  ConnectedPayload,
  QuotaUpdatePayload,
  QuotaErrorPayload,
  InvalidatedPayload,
  ConnectionStatusPayload,
} from './messages.js';

// Quota report types
export type {
  CreditBlock,
  ModelQuota,
  QuotaPool,
  QuotaReport,
  QuotaError,
  QuotaErrorType,
  QuotaResult,
  QuotaServiceState,
} from './quota.js';

// Discovery types
export type { ProcessCandidate, Connection, ConnectionSummary } from './discovery.js';

// Constants
export {
  DEFAULT_GATEWAY_PORT,
  DEFAULT_GATEWAY_HOST,
  GATEWAY_PATH,
  HEARTBEAT_INTERVAL_MS,
  DEFAULT_POLL_INTERVAL_MS,
  LS_LOOPBACK_HOST,
  LS_SERVICE_PATH,
  LS_PROBE_METHOD,
  LS_STATUS_METHOD,
  LS_REQUEST_TIMEOUT_MS,
  LS_CONNECT_PROTOCOL_VERSION,
  LS_TOKEN_HEADER,
  LS_PROBE_BODY,
  LS_STATUS_BODY,
  LS_PROCESS_NAMES,
  LS_FALLBACK_PROCESS_NAME,
  LS_TOKEN_FLAG,
  LS_PORT_FLAG,
} from './constants.js';

// Helpers
export {
  createMessage,
  parseMessage,
  isClientMessageType,
  summarizeConnection,
  buildServiceUrl,
  buildLsHeaders,
} from './helpers.js';
