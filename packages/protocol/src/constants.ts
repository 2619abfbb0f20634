export const DEFAULT_GATEWAY_PORT = 5050;
export const DEFAULT_GATEWAY_HOST = '127.0.0.1';
export const GATEWAY_PATH = '/ws';
export const HEARTBEAT_INTERVAL_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 60_000;

// ──────────────────────────────────────────────
// Language server control API
// ──────────────────────────────────────────────

export const LS_LOOPBACK_HOST = '127.0.0.1';
export const LS_SERVICE_PATH = 'exa.language_server_pb.LanguageServerService';
export const LS_PROBE_METHOD = 'GetUnleashData';
export const LS_STATUS_METHOD = 'GetUserStatus';
export const LS_REQUEST_TIMEOUT_MS = 30_000;

export const LS_CONNECT_PROTOCOL_VERSION = '1';
export const LS_TOKEN_HEADER = 'X-Codeium-Csrf-Token';

/** Body of the probe call. */
export const LS_PROBE_BODY = { wrapper_data: {} } as const;

/** Body of the status call; the language server expects these identifiers. */
export const LS_STATUS_BODY = {
  metadata: {
    ideName: 'antigravity',
    extensionName: 'antigravity',
    locale: 'en',
  },
} as const;

// ──────────────────────────────────────────────
// Process discovery
// ──────────────────────────────────────────────

/** Binary name fragment per `process.platform`. */
export const LS_PROCESS_NAMES: Readonly<Partial<Record<NodeJS.Platform, string>>> = {
  linux: 'language_server_linux',
  darwin: 'language_server_macos',
  win32: 'language_server_windows',
};

export const LS_FALLBACK_PROCESS_NAME = 'language_server';
export const LS_TOKEN_FLAG = '--csrf_token';
export const LS_PORT_FLAG = '--extension_server_port';
