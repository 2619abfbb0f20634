import { LS_REQUEST_TIMEOUT_MS, type Connection } from '@quotascope/protocol';
import { Http2Client, type LsHttpClient } from './http2-client.js';
import { LanguageServerProbe } from './port-probe.js';
import { ProcessLocator, type Locator, type PortProbe } from './process-locator.js';
import { SerialQueue } from './serial-queue.js';

/** A validated connection plus the client it must be used with. */
export interface ConnectionLease {
  connection: Connection;
  client: LsHttpClient;
}

export interface ConnectionCacheOptions {
  requestTimeoutMs?: number;
  processName?: string;
  createClient?: () => LsHttpClient;
  createLocator?: (probe: PortProbe) => Locator;
}

/**
 * Holds at most one validated Connection and one pooled HTTP/2 client.
 * Every read or replacement goes through a SerialQueue, so a reset never
 * interleaves with a detection in progress.
 */
export class ConnectionCache {
  private connection: Connection | null = null;
  private client: LsHttpClient | null = null;
  private readonly queue = new SerialQueue();
  private readonly locator: Locator;
  private readonly createClient: () => LsHttpClient;

  constructor(options: ConnectionCacheOptions = {}) {
    const timeoutMs = options.requestTimeoutMs ?? LS_REQUEST_TIMEOUT_MS;
    this.createClient = options.createClient ?? (() => new Http2Client({ timeoutMs }));

    // Probes run inside get(), which already holds the queue
    const probe = new LanguageServerProbe(() => this.ensureClient());
    this.locator = options.createLocator
      ? options.createLocator(probe)
      : new ProcessLocator({ probe, processName: options.processName });
  }

  /** Cached connection, or a fresh detection. A failed detection is not remembered. */
  get(): Promise<ConnectionLease | null> {
    return this.queue.run(async () => {
      if (!this.connection) {
        const located = await this.locator.locate();
        if (!located) return null;

        const { candidate, port } = located;
        this.connection = {
          port,
          token: candidate.token,
          pid: candidate.pid,
          advertisedPort: candidate.advertisedPort,
        };
        console.log(`[ConnectionCache] Connected to language server pid=${candidate.pid} on port ${port}`);
      }
      return { connection: this.connection, client: this.ensureClient() };
    });
  }

  /** Cached connection without detecting. */
  peek(): Promise<Connection | null> {
    return this.queue.run(() => this.connection);
  }

  /** Drop the connection and close the client gracefully; a new client opens on demand. */
  invalidate(): Promise<void> {
    return this.queue.run(async () => {
      this.connection = null;
      const client = this.client;
      this.client = null;
      if (client) await client.close();
      console.log('[ConnectionCache] Connection invalidated');
    });
  }

  /** Drop connection and client unconditionally, tearing open sessions down. */
  reset(): Promise<void> {
    return this.queue.run(() => {
      this.connection = null;
      this.client?.destroy();
      this.client = null;
      console.warn('[ConnectionCache] Reset (stale connection discarded)');
    });
  }

  get hasClient(): boolean {
    return this.client !== null;
  }

  private ensureClient(): LsHttpClient {
    if (!this.client) {
      this.client = this.createClient();
    }
    return this.client;
  }
}
