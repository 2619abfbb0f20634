import type { IncomingMessage, ServerResponse } from 'node:http';
import { summarizeConnection, type ConnectionStatusPayload, type QuotaResult } from '@quotascope/protocol';
import { errorMessage } from '@quotascope/core';
import { handleCorsPreflight } from './cors.js';
import type { QuotaSource } from './quota-source.js';

export interface ApiHandlerOptions {
  service: QuotaSource;
  /** Read per request; the gateway learns its port only after binding */
  allowedOrigins?: () => readonly string[];
  /** Called with every quota result served over HTTP */
  onQuotaResult?: (result: QuotaResult) => void;
  onInvalidated?: () => void;
}

const ERROR_STATUS = {
  not_found: 503,
  remote_error: 500,
} as const;

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
    Pragma: 'no-cache',
    Expires: '0',
  });
  res.end(JSON.stringify(data));
}

function parsePath(url: string): string {
  const { pathname } = new URL(url, 'http://localhost');
  return pathname.length > 1 ? pathname.replace(/\/+$/, '') : pathname;
}

export function createApiHandler(options: ApiHandlerOptions) {
  const { service, onQuotaResult, onInvalidated } = options;
  const allowedOrigins = options.allowedOrigins ?? (() => []);

  return async function handleApi(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (handleCorsPreflight(req, res, allowedOrigins())) {
      return;
    }

    const path = parsePath(req.url || '/');
    const method = req.method || 'GET';

    try {
      if (path === '/healthz' && method === 'GET') {
        sendJson(res, 200, {
          status: 'ok',
          uptime: process.uptime(),
          timestamp: Date.now(),
        });
        return;
      }

      if (path === '/api/quota' && method === 'GET') {
        const result = await service.getQuotaReport();
        onQuotaResult?.(result);
        if (result.success) {
          sendJson(res, 200, result.report);
        } else {
          sendJson(res, ERROR_STATUS[result.error.type], {
            error: result.error.message,
            type: result.error.type,
          });
        }
        return;
      }

      if (path === '/api/quota/invalidate' && method === 'POST') {
        await service.invalidateConnection();
        onInvalidated?.();
        sendJson(res, 200, { ok: true });
        return;
      }

      if (path === '/api/connection' && method === 'GET') {
        const connection = await service.peekConnection();
        const body: ConnectionStatusPayload = {
          connection: connection ? summarizeConnection(connection) : null,
        };
        sendJson(res, 200, body);
        return;
      }

      sendJson(res, 404, { error: 'Not Found' });
    } catch (err) {
      console.error(`[Gateway] ${method} ${path} failed: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal Server Error', message: errorMessage(err) });
      } else {
        res.end();
      }
    }
  };
}
