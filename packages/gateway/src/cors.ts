import type { IncomingMessage, ServerResponse } from 'node:http';

const LOOPBACK_NAMES = ['localhost', '127.0.0.1'];

/**
 * Origins a page served by the gateway itself would send. A loopback or
 * wildcard bind answers on both loopback names.
 */
export function gatewayOrigins(host: string, port: number): string[] {
  const names = LOOPBACK_NAMES.includes(host) || host === '0.0.0.0' ? LOOPBACK_NAMES : [host];
  return names.map((name) => `http://${name}:${port}`);
}

/**
 * Echo the request origin when it is allowed. Requests without an Origin
 * (curl, scripts) need no CORS headers and get none.
 */
export function setCorsHeaders(req: IncomingMessage, res: ServerResponse, allowedOrigins: readonly string[]): void {
  const origin = req.headers.origin;
  if (!origin || !allowedOrigins.includes(origin)) return;

  res.setHeader('Access-Control-Allow-Origin', origin);
  res.setHeader('Vary', 'Origin');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
  res.setHeader('Access-Control-Max-Age', '86400');
}

/**
 * Answers an OPTIONS preflight.
 * Returns true if the request was handled.
 */
export function handleCorsPreflight(
  req: IncomingMessage,
  res: ServerResponse,
  allowedOrigins: readonly string[],
): boolean {
  setCorsHeaders(req, res, allowedOrigins);

  if (req.method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    return true;
  }

  return false;
}
