/**
 * Base error class for every failure raised by the streaming client.
 * Carries a machine-readable type, a retry hint and optional details.
 */
export class ChatStreamError extends Error {
  /**
   * The type of error (e.g., 'missing_credential', 'transport_error')
   */
  readonly type: string;

  /**
   * Whether the failed operation may be retried by the host.
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    type: string;
    message: string;
    isRetryable?: boolean;
    details?: Record<string, unknown>;
  }) {
    super(options.message);
    this.name = 'ChatStreamError';
    this.type = options.type;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
