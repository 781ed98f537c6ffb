export type ErrorCode =
  | 'invalid_input'
  | 'invalid_range'
  | 'slot_unavailable'
  | 'not_found'
  | 'invalid_state'
  | 'store_unavailable';

export class DomainError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DomainError';
    this.code = code;
  }

  /** Only store failures are worth retrying; everything else is terminal for the request. */
  get retryable(): boolean {
    return this.code === 'store_unavailable';
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
