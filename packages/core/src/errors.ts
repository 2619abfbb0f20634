export type LanguageServerErrorReason = 'transport' | 'timeout' | 'http_status' | 'malformed';

/**
 * Failure of an authenticated call against the language server.
 * Every reason is treated as possible staleness by QuotaService.
 */
export class LanguageServerError extends Error {
  readonly reason: LanguageServerErrorReason;
  readonly status: number | undefined;

  constructor(
    reason: LanguageServerErrorReason,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'LanguageServerError';
    this.reason = reason;
    this.status = options.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
