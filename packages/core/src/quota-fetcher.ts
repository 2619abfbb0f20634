import {
  LS_STATUS_BODY,
  LS_STATUS_METHOD,
  buildLsHeaders,
  buildServiceUrl,
} from '@quotascope/protocol';
import { LanguageServerError, errorMessage } from './errors.js';
import type { ConnectionLease } from './connection-cache.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * GetUserStatus against a cached connection. Rejects with LanguageServerError;
 * retrying is QuotaService's job.
 */
export async function fetchUserStatus(lease: ConnectionLease): Promise<Record<string, unknown>> {
  const { connection, client } = lease;
  const response = await client.postJson(
    buildServiceUrl(connection.port, LS_STATUS_METHOD),
    LS_STATUS_BODY,
    buildLsHeaders(connection.token),
  );

  if (response.status < 200 || response.status >= 300) {
    throw new LanguageServerError(
      'http_status',
      `${LS_STATUS_METHOD} returned HTTP ${response.status}`,
      { status: response.status },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(response.body);
  } catch (err) {
    throw new LanguageServerError(
      'malformed',
      `${LS_STATUS_METHOD} returned invalid JSON: ${errorMessage(err)}`,
      { status: response.status, cause: err },
    );
  }

  if (!isRecord(parsed)) {
    throw new LanguageServerError(
      'malformed',
      `${LS_STATUS_METHOD} returned ${Array.isArray(parsed) ? 'an array' : typeof parsed} instead of an object`,
      { status: response.status },
    );
  }

  return parsed;
}
