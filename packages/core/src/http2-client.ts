import { connect, constants, type ClientHttp2Session } from 'node:http2';
import { LS_REQUEST_TIMEOUT_MS } from '@quotascope/protocol';
import { LanguageServerError, errorMessage } from './errors.js';

export interface LsHttpResponse {
  status: number;
  body: string;
}

/** Reusable client for the control API. One instance is owned by ConnectionCache. */
export interface LsHttpClient {
  postJson(url: string, body: unknown, headers: Record<string, string>): Promise<LsHttpResponse>;
  /** Let open streams finish, then release every session. */
  close(): Promise<void>;
  /** Tear every session down immediately. */
  destroy(): void;
}

export interface Http2ClientOptions {
  timeoutMs?: number;
  /** Loopback endpoints present self-signed certificates */
  rejectUnauthorized?: boolean;
}

/**
 * HTTP/2 client keeping one session per origin.
 * Sessions that error or close are dropped and reopened on the next request.
 */
export class Http2Client implements LsHttpClient {
  private readonly sessions = new Map<string, ClientHttp2Session>();
  private readonly timeoutMs: number;
  private readonly rejectUnauthorized: boolean;
  private closed = false;

  constructor(options: Http2ClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? LS_REQUEST_TIMEOUT_MS;
    this.rejectUnauthorized = options.rejectUnauthorized ?? false;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  postJson(url: string, body: unknown, headers: Record<string, string>): Promise<LsHttpResponse> {
    if (this.closed) {
      return Promise.reject(new LanguageServerError('transport', 'HTTP/2 client is closed'));
    }

    const target = new URL(url);
    const payload = JSON.stringify(body);

    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (err: LanguageServerError) => {
        if (settled) return;
        settled = true;
        reject(err);
      };

      let session: ClientHttp2Session;
      try {
        session = this.session(target.origin);
      } catch (err) {
        fail(new LanguageServerError('transport', `Connect to ${target.host} failed: ${errorMessage(err)}`, { cause: err }));
        return;
      }

      const lowered: Record<string, string> = {};
      for (const [name, value] of Object.entries(headers)) {
        lowered[name.toLowerCase()] = value;
      }

      const req = session.request({
        ...lowered,
        [constants.HTTP2_HEADER_METHOD]: 'POST',
        [constants.HTTP2_HEADER_PATH]: `${target.pathname}${target.search}`,
        [constants.HTTP2_HEADER_CONTENT_LENGTH]: Buffer.byteLength(payload),
      });

      let status = 0;
      const chunks: Buffer[] = [];

      req.setTimeout(this.timeoutMs, () => {
        fail(new LanguageServerError('timeout', `Request to ${target.host} timed out after ${this.timeoutMs}ms`));
        req.close(constants.NGHTTP2_CANCEL);
      });
      req.on('response', (responseHeaders) => {
        const raw = responseHeaders[':status'];
        status = typeof raw === 'number' ? raw : Number(raw ?? 0);
      });
      req.on('data', (chunk: Buffer | string) => {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      });
      req.on('end', () => {
        if (settled) return;
        settled = true;
        resolve({ status, body: Buffer.concat(chunks).toString('utf-8') });
      });
      req.on('error', (err) => {
        fail(new LanguageServerError('transport', `Request to ${target.host} failed: ${err.message}`, { cause: err }));
      });
      req.on('close', () => {
        fail(new LanguageServerError('transport', `Stream to ${target.host} closed before the response completed`));
      });

      req.end(payload);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(open.map((session) => new Promise<void>((resolve) => {
      if (session.closed || session.destroyed) {
        resolve();
        return;
      }
      session.close(() => resolve());
    })));
  }

  destroy(): void {
    this.closed = true;
    for (const session of this.sessions.values()) {
      session.destroy();
    }
    this.sessions.clear();
  }

  private session(origin: string): ClientHttp2Session {
    const existing = this.sessions.get(origin);
    if (existing && !existing.closed && !existing.destroyed) {
      return existing;
    }

    const session = connect(origin, { rejectUnauthorized: this.rejectUnauthorized });
    const forget = () => {
      if (this.sessions.get(origin) === session) {
        this.sessions.delete(origin);
      }
    };
    // Stream-level listeners report the failure to the caller
    session.on('error', (err) => {
      if (process.env.QUOTASCOPE_DEBUG) {
        console.debug(`[Http2Client] Session ${origin} error: ${err.message}`);
      }
      forget();
    });
    session.on('close', forget);
    session.on('goaway', forget);

    this.sessions.set(origin, session);
    return session;
  }
}
