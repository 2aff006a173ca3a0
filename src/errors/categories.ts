import { ChatStreamError } from './error.js';

/**
 * Error thrown when the API key environment variable is unset or empty.
 * Raised before any transport process is spawned.
 */
export class MissingCredentialError extends ChatStreamError {
  readonly variable: string;

  constructor(variable: string) {
    super({
      type: 'missing_credential',
      message:
        `ERROR: api key is set to ${variable} and is missing from your environment variables.\n\n` +
        `Load somewhere safely from config \`export ${variable}=<api_key>\``,
      isRetryable: false,
      details: { variable },
    });
    this.name = 'MissingCredentialError';
    this.variable = variable;
  }
}

/**
 * Error thrown when the client is misconfigured (e.g., invalid URL, model index out of range)
 */
export class ConfigurationError extends ChatStreamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the transport process writes to stderr, cannot be spawned
 * or exits with a non-zero code
 */
export class TransportError extends ChatStreamError {
  constructor(message: string, cause?: Error, details?: Record<string, unknown>) {
    super({
      type: 'transport_error',
      message,
      isRetryable: false,
      details: cause ? { ...details, cause: cause.message } : details,
    });
    this.name = 'TransportError';
  }
}

/**
 * Malformed JSON in a `data:` line. The parser logs it and moves on.
 */
export class DecodeError extends ChatStreamError {
  constructor(eventType: string, data: string, cause?: Error) {
    super({
      type: 'decode_error',
      message: `Failed to decode ${eventType} payload`,
      isRetryable: false,
      details: { eventType, data, cause: cause?.message },
    });
    this.name = 'DecodeError';
  }
}
