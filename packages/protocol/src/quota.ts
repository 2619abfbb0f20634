/** Prompt or flow credit allotment. Absent from the report when no quota applies. */
export interface CreditBlock {
  monthly: number;
  available: number;
  used: number;
  usedPercentage: number;
  remainingPercentage: number;
}

export interface ModelQuota {
  label: string;
  modelId: string;
  /** 0..1, or null when the server reports no fraction */
  remainingFraction: number | null;
  remainingPercentage: number | null;
  usedPercentage: number | null;
  isExhausted: boolean;
  /** ISO-8601 text as sent by the server, may be empty */
  resetTime: string;
  /** Signed milliseconds until reset, 0 when resetTime is unusable */
  timeUntilResetMs: number;
}

/** Models sharing one (resetTime, remainingFraction) pair. */
export interface QuotaPool {
  name: string;
  models: ModelQuota[];
  modelCount: number;
  remainingFraction: number | null;
  remainingPercentage: number | null;
  usedPercentage: number | null;
  isExhausted: boolean;
  resetTime: string;
  timeUntilResetMs: number;
}

export interface QuotaReport {
  timestamp: string;
  planName: string;
  planTier: string;
  promptCredits: CreditBlock | null;
  flowCredits: CreditBlock | null;
  models: ModelQuota[];
  pools: QuotaPool[];
  userName: string;
  userEmail: string;
}

export type QuotaErrorType = 'not_found' | 'remote_error';

export interface QuotaError {
  type: QuotaErrorType;
  message: string;
}

export type QuotaResult =
  | { success: true; report: QuotaReport }
  | { success: false; error: QuotaError };

/** Lifecycle of a single getQuotaReport call. */
export type QuotaServiceState = 'idle' | 'has_connection' | 'fetching' | 'succeeded' | 'failed';
