import { EventEmitter } from 'node:events';
import type { QuotaResult } from '@quotascope/protocol';
import { errorMessage } from '@quotascope/core';
import type { QuotaSource } from './quota-source.js';

export interface QuotaMonitorEvents {
  update: [QuotaResult];
}

/**
 * Polls the quota source and emits every result.
 * Overlapping refreshes share one in-flight request.
 */
export class QuotaMonitor extends EventEmitter<QuotaMonitorEvents> {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<QuotaResult> | null = null;
  private last: QuotaResult | null = null;

  constructor(
    private readonly source: QuotaSource,
    private readonly intervalMs: number,
  ) {
    super();
  }

  /** Polls immediately, then every intervalMs. An interval of 0 disables polling. */
  start(): void {
    if (this.intervalMs <= 0 || this.timer) return;
    this.poll();
    this.timer = setInterval(() => this.poll(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  getLast(): QuotaResult | null {
    return this.last;
  }

  refresh(): Promise<QuotaResult> {
    if (!this.inFlight) {
      this.inFlight = this.source.getQuotaReport()
        .then((result) => {
          this.record(result);
          return result;
        })
        .finally(() => {
          this.inFlight = null;
        });
    }
    return this.inFlight;
  }

  /** Store a result obtained elsewhere (e.g. an HTTP request) and emit it. */
  record(result: QuotaResult): void {
    this.last = result;
    this.emit('update', result);
  }

  private poll(): void {
    this.refresh().catch((err: unknown) => {
      console.error(`[QuotaMonitor] Poll failed: ${errorMessage(err)}`);
    });
  }
}
