export interface WindowGuardErrorOptions {
  /** Extra data relayed to the HTTP response body. */
  data?: Record<string, unknown>;
}

/**
 * Base error class for rate-limit failures.
 * Consumers can extend this for domain-specific error handling.
 */
export class WindowGuardError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly data?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    options?: WindowGuardErrorOptions,
  ) {
    super(message);
    this.name = 'WindowGuardError';
    this.code = code;
    this.statusCode = statusCode;
    this.data = options?.data;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
