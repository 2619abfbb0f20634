import { EventEmitter } from 'node:events';
import type { Connection, QuotaReport, QuotaResult, QuotaServiceState } from '@quotascope/protocol';
import { ConnectionCache, type ConnectionLease } from './connection-cache.js';
import { errorMessage } from './errors.js';
import { fetchUserStatus } from './quota-fetcher.js';
import { normalizeQuota } from './quota-normalizer.js';

export const NOT_FOUND_MESSAGE = 'Language Server not found. Is Antigravity running?';

export interface QuotaServiceEvents {
  state: [QuotaServiceState, { attempt: number }];
  report: [QuotaReport];
}

export interface QuotaServiceOptions {
  cache?: ConnectionCache;
  fetch?: (lease: ConnectionLease) => Promise<unknown>;
  now?: () => Date;
  /** Used only when no cache is given */
  requestTimeoutMs?: number;
  processName?: string;
}

/**
 * Facade over detection, fetch and normalization.
 * A failed fetch is treated as a stale connection: the cache is reset and the
 * whole flow runs once more before giving up.
 */
export class QuotaService extends EventEmitter<QuotaServiceEvents> {
  private readonly cache: ConnectionCache;
  private readonly fetchStatus: (lease: ConnectionLease) => Promise<unknown>;
  private readonly now: () => Date;

  constructor(options: QuotaServiceOptions = {}) {
    super();
    this.cache = options.cache ?? new ConnectionCache({
      requestTimeoutMs: options.requestTimeoutMs,
      processName: options.processName,
    });
    this.fetchStatus = options.fetch ?? fetchUserStatus;
    this.now = options.now ?? (() => new Date());
  }

  async getQuotaReport(): Promise<QuotaResult> {
    this.emit('state', 'idle', { attempt: 1 });
    const lease = await this.cache.get();
    if (!lease) {
      this.emit('state', 'failed', { attempt: 1 });
      return { success: false, error: { type: 'not_found', message: NOT_FOUND_MESSAGE } };
    }

    try {
      return this.succeed(await this.fetchAndNormalize(lease, 1), 1);
    } catch (err) {
      console.warn(`[QuotaService] Fetch failed on port ${lease.connection.port}, re-detecting: ${errorMessage(err)}`);
      this.emit('state', 'failed', { attempt: 1 });
      return this.retry(err);
    }
  }

  invalidateConnection(): Promise<void> {
    return this.cache.invalidate();
  }

  peekConnection(): Promise<Connection | null> {
    return this.cache.peek();
  }

  close(): Promise<void> {
    return this.cache.reset();
  }

  private async retry(firstError: unknown): Promise<QuotaResult> {
    await this.cache.reset();

    this.emit('state', 'idle', { attempt: 2 });
    const lease = await this.cache.get();
    if (!lease) {
      this.emit('state', 'failed', { attempt: 2 });
      return this.remoteError(firstError);
    }

    try {
      return this.succeed(await this.fetchAndNormalize(lease, 2), 2);
    } catch (err) {
      console.error(`[QuotaService] Retry failed: ${errorMessage(err)}`);
      await this.cache.reset();
      this.emit('state', 'failed', { attempt: 2 });
      return this.remoteError(err);
    }
  }

  private async fetchAndNormalize(lease: ConnectionLease, attempt: number): Promise<QuotaReport> {
    this.emit('state', 'has_connection', { attempt });
    this.emit('state', 'fetching', { attempt });
    const raw = await this.fetchStatus(lease);
    return normalizeQuota(raw, this.now());
  }

  private succeed(report: QuotaReport, attempt: number): QuotaResult {
    this.emit('state', 'succeeded', { attempt });
    this.emit('report', report);
    return { success: true, report };
  }

  private remoteError(err: unknown): QuotaResult {
    return {
      success: false,
      error: { type: 'remote_error', message: `Quota fetch failed: ${errorMessage(err)}` },
    };
  }
}
