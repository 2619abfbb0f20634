import type { Connection, QuotaResult } from '@quotascope/protocol';

/** What the gateway needs from QuotaService. */
export interface QuotaSource {
  getQuotaReport(): Promise<QuotaResult>;
  invalidateConnection(): Promise<void>;
  peekConnection(): Promise<Connection | null>;
  close(): Promise<void>;
}
